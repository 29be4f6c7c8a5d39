import { Inject, Injectable } from '@nestjs/common';
import type { FleetConfig } from '../../config/config.types';
import { FleetRequestError } from '../fleet.errors';
import { isDeploymentStatus, isInstance, isRecord } from '../fleet.guards';
import { FLEET_CONFIG } from '../fleet.tokens';
import type { ComputeService, DeploymentHandle, DeploymentRequest, DeploymentStatus, Instance } from '../interfaces';
import { FleetHttpClient } from './fleet-http.client';

/**
 * Compute orchestration service reached over HTTP.
 *
 * - `GET {url}/layers/:layerId/instances` returns an array of instances
 * - `POST {url}/deployments` returns `{ deploymentId }`
 * - `GET {url}/deployments/:id` returns `{ deploymentId, status }`
 */
@Injectable()
export class HttpComputeService implements ComputeService {
  private readonly baseUrl: string;

  constructor(
    @Inject(FLEET_CONFIG) config: FleetConfig,
    private readonly client: FleetHttpClient,
  ) {
    this.baseUrl = config.compute.url.replace(/\/$/, '');
  }

  async listInstances(layerId: string): Promise<Instance[]> {
    const url = `${this.baseUrl}/layers/${encodeURIComponent(layerId)}/instances`;
    const data = await this.client.get(url);

    if (!Array.isArray(data) || !data.every(isInstance)) {
      throw new FleetRequestError(`GET ${url} returned an unexpected instance list`, 'GET', url);
    }
    return data;
  }

  async createDeployment(request: DeploymentRequest): Promise<DeploymentHandle> {
    const url = `${this.baseUrl}/deployments`;
    const data = await this.client.post(url, request);

    if (!isRecord(data) || typeof data.deploymentId !== 'string') {
      throw new FleetRequestError(`POST ${url} did not return a deployment id`, 'POST', url);
    }
    return { deploymentId: data.deploymentId };
  }

  async pollDeployment(handle: DeploymentHandle): Promise<DeploymentStatus> {
    const url = `${this.baseUrl}/deployments/${encodeURIComponent(handle.deploymentId)}`;
    const data = await this.client.get(url);

    if (!isRecord(data) || !isDeploymentStatus(data.status)) {
      throw new FleetRequestError(`GET ${url} returned an unknown deployment status`, 'GET', url);
    }
    return data.status;
  }
}
