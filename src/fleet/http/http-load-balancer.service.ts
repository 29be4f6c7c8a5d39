import { Inject, Injectable } from '@nestjs/common';
import type { FleetConfig } from '../../config/config.types';
import { FleetRequestError } from '../fleet.errors';
import { isLoadBalancer, isLoadBalancerInstanceState, isRecord, isStringArray } from '../fleet.guards';
import { FLEET_CONFIG } from '../fleet.tokens';
import type {
  LoadBalancer,
  LoadBalancerInstanceState,
  LoadBalancerService,
  RegistrationResult,
} from '../interfaces';
import { FleetHttpClient } from './fleet-http.client';

/**
 * Load balancer service reached over HTTP.
 *
 * - `GET {url}/load-balancers` returns `[{ name, instanceIds }]`
 * - `POST {url}/load-balancers/:name/deregister` and `/register` take
 *   `{ instanceIds }` and return the attached `{ instanceIds }` afterwards
 * - `GET {url}/load-balancers/:name/instances/:targetId` returns `{ state }`
 */
@Injectable()
export class HttpLoadBalancerService implements LoadBalancerService {
  private readonly baseUrl: string;

  constructor(
    @Inject(FLEET_CONFIG) config: FleetConfig,
    private readonly client: FleetHttpClient,
  ) {
    this.baseUrl = config.loadBalancer.url.replace(/\/$/, '');
  }

  async listLoadBalancers(): Promise<LoadBalancer[]> {
    const url = `${this.baseUrl}/load-balancers`;
    const data = await this.client.get(url);

    if (!Array.isArray(data) || !data.every(isLoadBalancer)) {
      throw new FleetRequestError(`GET ${url} returned an unexpected load balancer list`, 'GET', url);
    }
    return data;
  }

  async deregister(loadBalancerName: string, targetIds: string[]): Promise<string[]> {
    return this.changeMembership(loadBalancerName, 'deregister', targetIds);
  }

  async register(loadBalancerName: string, targetIds: string[]): Promise<RegistrationResult> {
    const instanceIds = await this.changeMembership(loadBalancerName, 'register', targetIds);
    return { loadBalancerName, instanceIds };
  }

  async pollInstanceState(loadBalancerName: string, targetId: string): Promise<LoadBalancerInstanceState> {
    const url = `${this.loadBalancerUrl(loadBalancerName)}/instances/${encodeURIComponent(targetId)}`;
    const data = await this.client.get(url);

    if (!isRecord(data) || !isLoadBalancerInstanceState(data.state)) {
      throw new FleetRequestError(`GET ${url} returned an unknown instance state`, 'GET', url);
    }
    return data.state;
  }

  private async changeMembership(
    loadBalancerName: string,
    action: 'deregister' | 'register',
    targetIds: string[],
  ): Promise<string[]> {
    const url = `${this.loadBalancerUrl(loadBalancerName)}/${action}`;
    const data = await this.client.post(url, { instanceIds: targetIds });

    if (!isRecord(data) || !isStringArray(data.instanceIds)) {
      throw new FleetRequestError(`POST ${url} did not return the attached instances`, 'POST', url);
    }
    return data.instanceIds;
  }

  private loadBalancerUrl(name: string): string {
    return `${this.baseUrl}/load-balancers/${encodeURIComponent(name)}`;
  }
}
