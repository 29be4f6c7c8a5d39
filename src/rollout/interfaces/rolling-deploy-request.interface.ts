export interface RollingDeployRequest {
  stackId: string;
  layerId: string;
  appId: string;
  /** Fraction of eligible instances per batch, in (0, 1]. Omit to deploy everything at once. */
  percent?: number;
}
