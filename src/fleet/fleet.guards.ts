import { DEPLOYMENT_STATUSES, LOAD_BALANCER_INSTANCE_STATES } from './interfaces';
import type { DeploymentStatus, Instance, LoadBalancer, LoadBalancerInstanceState } from './interfaces';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isInstance(value: unknown): value is Instance {
  return (
    isRecord(value) &&
    typeof value.instanceId === 'string' &&
    typeof value.targetId === 'string' &&
    typeof value.hostname === 'string' &&
    typeof value.status === 'string'
  );
}

export function isLoadBalancer(value: unknown): value is LoadBalancer {
  return isRecord(value) && typeof value.name === 'string' && isStringArray(value.instanceIds);
}

export function isDeploymentStatus(value: unknown): value is DeploymentStatus {
  return DEPLOYMENT_STATUSES.some((status) => status === value);
}

export function isLoadBalancerInstanceState(value: unknown): value is LoadBalancerInstanceState {
  return LOAD_BALANCER_INSTANCE_STATES.some((state) => state === value);
}
