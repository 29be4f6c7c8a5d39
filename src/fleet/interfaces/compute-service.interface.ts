import type { Instance } from './instance.interface';

export const DEPLOYMENT_STATUSES = ['running', 'successful', 'failed'] as const;

export type DeploymentStatus = (typeof DEPLOYMENT_STATUSES)[number];

export interface DeploymentCommand {
  name: 'deploy';
  args: Record<string, string[]>;
}

export interface DeploymentRequest {
  stackId: string;
  appId: string;
  instanceIds: string[];
  command: DeploymentCommand;
}

export interface DeploymentHandle {
  deploymentId: string;
}

/**
 * Port to the compute orchestration service.
 */
export interface ComputeService {
  /** Instances of a layer, in the order the service reports them */
  listInstances(layerId: string): Promise<Instance[]>;

  createDeployment(request: DeploymentRequest): Promise<DeploymentHandle>;

  pollDeployment(handle: DeploymentHandle): Promise<DeploymentStatus>;
}
