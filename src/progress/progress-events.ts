import type { RolloutSummary } from '../rollout/interfaces';

/**
 * Progress events emitted over the application event bus while a rollout runs.
 */
export const ROLLOUT_EVENTS = {
  LOCK_WAITING: 'lock.waiting',
  LOCK_ACQUIRED: 'lock.acquired',
  LOCK_RELEASED: 'lock.released',
  LOCK_TIMEOUT: 'lock.timeout',
  LOCK_DISABLED: 'lock.disabled',
  BATCH_STARTED: 'batch.started',
  BATCH_DONE: 'batch.done',
  LOAD_BALANCER_DETACHED: 'load-balancer.detached',
  LOAD_BALANCER_SKIPPED: 'load-balancer.skipped',
  LOAD_BALANCER_NONE_FOUND: 'load-balancer.none-found',
  LOAD_BALANCER_REATTACHED: 'load-balancer.reattached',
  DEPLOY_STARTED: 'deploy.started',
  DEPLOY_COMPLETED: 'deploy.completed',
  ROLLOUT_COMPLETED: 'rollout.completed',
} as const;

export type RolloutEventType = (typeof ROLLOUT_EVENTS)[keyof typeof ROLLOUT_EVENTS];

export const ALL_ROLLOUT_EVENTS: RolloutEventType[] = Object.values(ROLLOUT_EVENTS);

export interface LockWaitingEvent {
  lockName: string;
  maxWaitMs: number;
}

export interface LockAcquiredEvent {
  lockName: string;
  waitedMs: number;
}

export interface LockReleasedEvent {
  lockName: string;
  heldMs: number;
}

export type LockTimeoutEvent = LockWaitingEvent;

export interface LockDisabledEvent {
  lockName: string;
}

export interface BatchEvent {
  /** 1-based batch position */
  index: number;
  total: number;
  hostnames: string[];
}

export interface LoadBalancerDetachedEvent {
  loadBalancerName: string;
  /** Target ids deregistered for the batch */
  detached: string[];
  /** Target ids still in rotation */
  remaining: string[];
}

export interface LoadBalancerSkippedEvent {
  loadBalancerName: string;
  targetIds: string[];
}

export interface LoadBalancerNoneFoundEvent {
  hostnames: string[];
}

export interface LoadBalancerReattachedEvent {
  loadBalancerName: string;
  targetIds: string[];
}

export interface DeployStartedEvent {
  deploymentId: string;
  appId: string;
  instanceIds: string[];
}

export interface DeployCompletedEvent {
  deploymentId: string;
  durationMs: number;
}

export interface RolloutCompletedEvent {
  summary: RolloutSummary;
}
