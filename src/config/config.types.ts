import type { ALLOWED_FLEET_DRIVERS, ALLOWED_LOCK_BACKENDS } from './config.constants';

export type LockBackendKind = (typeof ALLOWED_LOCK_BACKENDS)[number];
export type FleetDriver = (typeof ALLOWED_FLEET_DRIVERS)[number];

/**
 * Configuration type definition for type-safe access
 */
export interface RolloutConfiguration {
  environment: string;
  lock: LockConfig;
  fleet: FleetConfig;
  deploy: DeployConfig;
  loadBalancer: LoadBalancerWaitConfig;
  target: {
    stackId: string;
    layerId: string;
    appId: string;
    percent?: number;
  };
}

export interface DeployConfig {
  /** Per-batch deployment deadline in milliseconds. */
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface LoadBalancerWaitConfig {
  /** Deadline for each deregistration/registration confirmation, in milliseconds. */
  waitTimeoutMs: number;
  pollIntervalMs: number;
}

export interface LockConfig {
  backend: LockBackendKind;
  name: string;
  nodeId: string;
  maxWaitMs: number;
  leaseMs: number;
  pollIntervalMs: number;
  redis: {
    host: string;
    port: number;
    db: number;
    keyPrefix: string;
  };
  http: {
    url: string;
    apiKey: string;
    timeout: number;
  };
}

export interface FleetConfig {
  driver: FleetDriver;
  compute: {
    url: string;
  };
  loadBalancer: {
    url: string;
  };
  apiKey: string;
  timeout: number;
  simulated: {
    seedPath?: string;
    settlePolls: number;
  };
}
