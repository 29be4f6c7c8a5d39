import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ROLLOUT_EVENTS } from './progress-events';
import type {
  BatchEvent,
  DeployCompletedEvent,
  DeployStartedEvent,
  LoadBalancerDetachedEvent,
  LoadBalancerNoneFoundEvent,
  LoadBalancerReattachedEvent,
  LoadBalancerSkippedEvent,
  LockAcquiredEvent,
  LockDisabledEvent,
  LockReleasedEvent,
  LockTimeoutEvent,
  LockWaitingEvent,
  RolloutCompletedEvent,
} from './progress-events';

/**
 * Turns rollout progress events into operator-facing log lines.
 *
 * Listeners are synchronous and never throw back into the emitter.
 */
@Injectable()
export class ProgressLoggerService {
  private readonly logger = new Logger('Rollout');

  // ============================================
  // Lock
  // ============================================

  @OnEvent(ROLLOUT_EVENTS.LOCK_WAITING)
  handleLockWaiting(payload: LockWaitingEvent): void {
    this.logger.log(`Waiting up to ${formatDuration(payload.maxWaitMs)} for lock "${payload.lockName}"`);
  }

  @OnEvent(ROLLOUT_EVENTS.LOCK_ACQUIRED)
  handleLockAcquired(payload: LockAcquiredEvent): void {
    this.logger.log(`Acquired lock "${payload.lockName}" after ${formatDuration(payload.waitedMs)}`);
  }

  @OnEvent(ROLLOUT_EVENTS.LOCK_RELEASED)
  handleLockReleased(payload: LockReleasedEvent): void {
    this.logger.log(`Released lock "${payload.lockName}" after holding it ${formatDuration(payload.heldMs)}`);
  }

  @OnEvent(ROLLOUT_EVENTS.LOCK_TIMEOUT)
  handleLockTimeout(payload: LockTimeoutEvent): void {
    this.logger.error(`Gave up on lock "${payload.lockName}" after ${formatDuration(payload.maxWaitMs)}`);
  }

  @OnEvent(ROLLOUT_EVENTS.LOCK_DISABLED)
  handleLockDisabled(payload: LockDisabledEvent): void {
    this.logger.warn(`Lock "${payload.lockName}" is disabled; rollouts are not serialized`);
  }

  // ============================================
  // Batches
  // ============================================

  @OnEvent(ROLLOUT_EVENTS.BATCH_STARTED)
  handleBatchStarted(payload: BatchEvent): void {
    this.logger.log(`Batch ${payload.index}/${payload.total} started: ${payload.hostnames.join(', ')}`);
  }

  @OnEvent(ROLLOUT_EVENTS.BATCH_DONE)
  handleBatchDone(payload: BatchEvent): void {
    this.logger.log(`Batch ${payload.index}/${payload.total} done: ${payload.hostnames.join(', ')}`);
  }

  // ============================================
  // Load balancers
  // ============================================

  @OnEvent(ROLLOUT_EVENTS.LOAD_BALANCER_DETACHED)
  handleLoadBalancerDetached(payload: LoadBalancerDetachedEvent): void {
    this.logger.log(
      `Detached ${payload.detached.join(', ')} from ${payload.loadBalancerName}; ` +
        `still in service: ${payload.remaining.join(', ')}`,
    );
  }

  @OnEvent(ROLLOUT_EVENTS.LOAD_BALANCER_SKIPPED)
  handleLoadBalancerSkipped(payload: LoadBalancerSkippedEvent): void {
    this.logger.warn(
      `Skipped ${payload.loadBalancerName}: detaching ${payload.targetIds.join(', ')} would leave it empty`,
    );
  }

  @OnEvent(ROLLOUT_EVENTS.LOAD_BALANCER_NONE_FOUND)
  handleLoadBalancerNoneFound(payload: LoadBalancerNoneFoundEvent): void {
    this.logger.log(`No load balancers to detach for ${payload.hostnames.join(', ')}`);
  }

  @OnEvent(ROLLOUT_EVENTS.LOAD_BALANCER_REATTACHED)
  handleLoadBalancerReattached(payload: LoadBalancerReattachedEvent): void {
    this.logger.log(`Reattached ${payload.targetIds.join(', ')} to ${payload.loadBalancerName}`);
  }

  // ============================================
  // Deployments
  // ============================================

  @OnEvent(ROLLOUT_EVENTS.DEPLOY_STARTED)
  handleDeployStarted(payload: DeployStartedEvent): void {
    this.logger.log(
      `Deployment ${payload.deploymentId} of ${payload.appId} started on ${payload.instanceIds.join(', ')}`,
    );
  }

  @OnEvent(ROLLOUT_EVENTS.DEPLOY_COMPLETED)
  handleDeployCompleted(payload: DeployCompletedEvent): void {
    this.logger.log(`Deployment ${payload.deploymentId} completed in ${formatDuration(payload.durationMs)}`);
  }

  @OnEvent(ROLLOUT_EVENTS.ROLLOUT_COMPLETED)
  handleRolloutCompleted(payload: RolloutCompletedEvent): void {
    const { summary } = payload;
    this.logger.log(
      `Rollout of ${summary.appId} to layer ${summary.layerId} completed: ` +
        `${summary.eligibleInstances} instance(s) in ${summary.batches.length} batch(es)`,
    );
  }
}

/** Formats milliseconds as `850ms`, `12.5s` or `3m 5s`. */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${Math.round(ms / 100) / 10}s`;
  }
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds === 0 ? `${minutes}m` : `${minutes}m ${seconds}s`;
}
