export interface BatchReport {
  /** 1-based batch position */
  index: number;
  hostnames: string[];
  /** Load balancers the batch was drained from and restored to */
  loadBalancers: string[];
  deploymentId: string;
}

export interface RolloutSummary {
  stackId: string;
  layerId: string;
  appId: string;
  eligibleInstances: number;
  batches: BatchReport[];
}
