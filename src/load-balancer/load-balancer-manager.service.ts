import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { LoadBalancerWaitConfig } from '../config/config.types';
import { isInstance, isLoadBalancer } from '../fleet/fleet.guards';
import { LOAD_BALANCER_SERVICE } from '../fleet/fleet.tokens';
import type {
  Instance,
  LoadBalancer,
  LoadBalancerInstanceState,
  LoadBalancerService,
  RegistrationResult,
} from '../fleet/interfaces';
import { ROLLOUT_EVENTS } from '../progress/progress-events';
import type {
  LoadBalancerDetachedEvent,
  LoadBalancerNoneFoundEvent,
  LoadBalancerReattachedEvent,
  LoadBalancerSkippedEvent,
} from '../progress/progress-events';
import { getErrorMessage } from '../shared/error.utils';
import { InvalidArgumentError } from '../shared/errors';
import { pollDone, pollPending, pollUntil } from '../shared/poll.utils';
import { LoadBalancerWaitTimeoutError } from './load-balancer.errors';
import type { LoadBalancerPhase } from './load-balancer.errors';
import { LOAD_BALANCER_WAIT_CONFIG } from './load-balancer.tokens';

const DEREGISTERED_STATES: readonly LoadBalancerInstanceState[] = ['out-of-service', 'not-registered'];
const REGISTERED_STATES: readonly LoadBalancerInstanceState[] = ['in-service'];

/**
 * Takes batches of instances out of load balancer rotation and puts them back.
 *
 * Every transition blocks until the load balancer confirms it, so callers
 * never deploy to an instance that still receives traffic, and never move
 * on before restored instances serve again.
 *
 * @remarks
 * - Load balancers are re-fetched on every detach; nothing is cached between batches
 * - A load balancer whose every attached instance is in the batch is skipped,
 *   so a batch can never drain a load balancer to zero
 * - The snapshots returned by {@link detach} are the input to {@link attach}
 */
@Injectable()
export class LoadBalancerManagerService {
  private readonly logger = new Logger(LoadBalancerManagerService.name);

  constructor(
    @Inject(LOAD_BALANCER_SERVICE) private readonly loadBalancerService: LoadBalancerService,
    @Inject(LOAD_BALANCER_WAIT_CONFIG) private readonly config: LoadBalancerWaitConfig,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Deregisters `instances` from every load balancer that keeps at least one
   * other instance attached, and waits until each is out of service.
   *
   * @returns Pre-detach snapshots of the load balancers actually drained; may be empty
   * @throws {InvalidArgumentError} If `instances` is empty or holds anything but instances
   * @throws {LoadBalancerWaitTimeoutError} If a deregistration is not confirmed in time
   */
  async detach(instances: readonly Instance[]): Promise<LoadBalancer[]> {
    this.assertInstances(instances);
    const targetIds = instances.map((instance) => instance.targetId);

    const loadBalancers = await this.loadBalancerService.listLoadBalancers();
    const detached: LoadBalancer[] = [];

    for (const loadBalancer of loadBalancers) {
      const matched = loadBalancer.instanceIds.filter((targetId) => targetIds.includes(targetId));
      if (matched.length === 0) {
        continue;
      }

      if (matched.length === loadBalancer.instanceIds.length) {
        this.logger.warn(
          `Not detaching from ${loadBalancer.name}: the batch holds all of its ${matched.length} attached instance(s)`,
        );
        this.eventEmitter.emit(ROLLOUT_EVENTS.LOAD_BALANCER_SKIPPED, {
          loadBalancerName: loadBalancer.name,
          targetIds: matched,
        } satisfies LoadBalancerSkippedEvent);
        continue;
      }

      const remaining = await this.loadBalancerService.deregister(loadBalancer.name, matched);
      this.logger.log(`Instances remaining on ${loadBalancer.name}: ${remaining.join(', ')}`);

      await this.waitFor(loadBalancer.name, matched, DEREGISTERED_STATES, 'deregistration');

      detached.push({ name: loadBalancer.name, instanceIds: [...loadBalancer.instanceIds] });
      this.eventEmitter.emit(ROLLOUT_EVENTS.LOAD_BALANCER_DETACHED, {
        loadBalancerName: loadBalancer.name,
        detached: matched,
        remaining,
      } satisfies LoadBalancerDetachedEvent);
    }

    if (detached.length === 0) {
      this.eventEmitter.emit(ROLLOUT_EVENTS.LOAD_BALANCER_NONE_FOUND, {
        hostnames: instances.map((instance) => instance.hostname),
      } satisfies LoadBalancerNoneFoundEvent);
    }

    return detached;
  }

  /**
   * Registers `instances` back into the load balancers returned by {@link detach}
   * and waits until each serves again.
   *
   * Only the batch instances a snapshot held before detach are registered,
   * which restores each load balancer's membership exactly. Every load
   * balancer is attempted even if an earlier one fails; the first failure is
   * rethrown afterwards.
   *
   * @returns Registration result per load balancer name; `{}` when `loadBalancers` is empty
   * @throws {InvalidArgumentError} If `instances` or `loadBalancers` hold the wrong kind of entity
   * @throws {LoadBalancerWaitTimeoutError} If a registration is not confirmed in time
   */
  async attach(
    instances: readonly Instance[],
    loadBalancers: readonly LoadBalancer[],
  ): Promise<Record<string, RegistrationResult>> {
    this.assertInstances(instances);
    this.assertLoadBalancers(loadBalancers);

    const results: Record<string, RegistrationResult> = {};
    if (loadBalancers.length === 0) {
      return results;
    }

    const targetIds = instances.map((instance) => instance.targetId);
    let firstError: unknown = null;

    for (const loadBalancer of loadBalancers) {
      const targets = loadBalancer.instanceIds.filter((targetId) => targetIds.includes(targetId));
      if (targets.length === 0) {
        this.logger.debug(`No batch instance was attached to ${loadBalancer.name} before detach; nothing to restore`);
        continue;
      }

      try {
        const result = await this.loadBalancerService.register(loadBalancer.name, targets);
        await this.waitFor(loadBalancer.name, targets, REGISTERED_STATES, 'registration');

        results[loadBalancer.name] = result;
        this.eventEmitter.emit(ROLLOUT_EVENTS.LOAD_BALANCER_REATTACHED, {
          loadBalancerName: loadBalancer.name,
          targetIds: targets,
        } satisfies LoadBalancerReattachedEvent);
      } catch (error) {
        this.logger.error(`Failed to reattach instances to ${loadBalancer.name}: ${getErrorMessage(error)}`);
        if (firstError === null) {
          firstError = error;
        }
      }
    }

    if (firstError !== null) {
      throw firstError;
    }
    return results;
  }

  private async waitFor(
    loadBalancerName: string,
    targetIds: string[],
    accepted: readonly LoadBalancerInstanceState[],
    phase: LoadBalancerPhase,
  ): Promise<void> {
    const pending = new Set(targetIds);

    const confirmed = await pollUntil<boolean>(
      async () => {
        for (const targetId of [...pending]) {
          const state = await this.loadBalancerService.pollInstanceState(loadBalancerName, targetId);
          if (accepted.includes(state)) {
            pending.delete(targetId);
          }
        }
        return pending.size === 0 ? pollDone(true) : pollPending();
      },
      {
        intervalMs: this.config.pollIntervalMs,
        timeoutMs: this.config.waitTimeoutMs,
        onAttempt: (attempt) => {
          this.logger.debug(
            `Waiting for ${phase} on ${loadBalancerName} (attempt ${attempt}, pending: ${[...pending].join(', ')})`,
          );
        },
      },
    );

    if (!confirmed) {
      throw new LoadBalancerWaitTimeoutError(loadBalancerName, phase, this.config.waitTimeoutMs, [...pending]);
    }
  }

  private assertInstances(instances: readonly unknown[]): void {
    if (!Array.isArray(instances) || instances.length === 0) {
      throw new InvalidArgumentError('Expected a non-empty list of instances');
    }
    const invalid = instances.findIndex((instance) => !isInstance(instance));
    if (invalid !== -1) {
      throw new InvalidArgumentError(`Expected an instance at position ${invalid}`);
    }
  }

  private assertLoadBalancers(loadBalancers: readonly unknown[]): void {
    if (!Array.isArray(loadBalancers)) {
      throw new InvalidArgumentError('Expected a list of load balancers');
    }
    const invalid = loadBalancers.findIndex((loadBalancer) => !isLoadBalancer(loadBalancer));
    if (invalid !== -1) {
      throw new InvalidArgumentError(`Expected a load balancer at position ${invalid}`);
    }
  }
}
