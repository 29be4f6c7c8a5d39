/**
 * Read-only snapshot of a compute instance, owned by the compute orchestration service.
 */
export interface Instance {
  /** Identifier the compute orchestration service deploys to */
  instanceId: string;
  /** Identifier the load balancers know the instance by */
  targetId: string;
  hostname: string;
  /** Only `online` instances take part in a rollout */
  status: string;
}

export const ONLINE_STATUS = 'online';
