import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { getErrorMessage } from '../shared/error.utils';
import { ROLLOUT_EVENTS } from '../progress/progress-events';
import type {
  LockAcquiredEvent,
  LockDisabledEvent,
  LockReleasedEvent,
  LockTimeoutEvent,
  LockWaitingEvent,
} from '../progress/progress-events';
import type { LockConfig } from '../config/config.types';
import type { LockBackend, LockToken } from './lock-backend.interface';
import { LockTimeoutError } from './lock.errors';
import { LOCK_BACKEND, LOCK_CONFIG } from './lock.tokens';

/**
 * Cluster-wide mutual exclusion for rollouts.
 *
 * Wraps a {@link LockBackend} so that a body runs only while the named lock
 * is held, and the lock is released on every exit path.
 *
 * @remarks
 * - The backend is resolved once by {@link LockModule}; `null` means the
 *   operator opted out of locking (`ROLLOUT_LOCK_BACKEND=none`)
 * - Without a backend the body runs immediately and a warning is logged
 * - While the body runs the lease is renewed every third of `leaseMs`, so
 *   it only lapses once the holder stops renewing (a crashed process)
 * - Renewal and release failures are logged and never mask the body's own outcome
 */
@Injectable()
export class DistributedLockService {
  private readonly logger = new Logger(DistributedLockService.name);

  constructor(
    @Inject(LOCK_BACKEND) private readonly backend: LockBackend | null,
    @Inject(LOCK_CONFIG) private readonly config: LockConfig,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Runs `body` while holding the lock `name`.
   *
   * @param name - Cluster-wide lock name
   * @param maxWaitMs - How long to wait for the lock before giving up
   * @param body - Work to run exclusively
   * @returns Whatever `body` resolves to
   * @throws {LockTimeoutError} If the lock was not acquired within `maxWaitMs`; `body` never ran
   */
  async withLock<T>(name: string, maxWaitMs: number, body: () => Promise<T>): Promise<T> {
    if (!this.backend) {
      this.logger.warn(
        `No lock backend configured; running "${name}" without cluster-wide exclusion. ` +
          'A concurrent rollout could drain the same load balancer.',
      );
      this.eventEmitter.emit(ROLLOUT_EVENTS.LOCK_DISABLED, { lockName: name } satisfies LockDisabledEvent);
      return body();
    }

    this.eventEmitter.emit(ROLLOUT_EVENTS.LOCK_WAITING, { lockName: name, maxWaitMs } satisfies LockWaitingEvent);

    const waitStartedAt = Date.now();
    const token = await this.backend.acquire(name, maxWaitMs);
    if (!token) {
      this.eventEmitter.emit(ROLLOUT_EVENTS.LOCK_TIMEOUT, { lockName: name, maxWaitMs } satisfies LockTimeoutEvent);
      throw new LockTimeoutError(name, maxWaitMs);
    }

    const acquiredAt = Date.now();
    this.eventEmitter.emit(ROLLOUT_EVENTS.LOCK_ACQUIRED, {
      lockName: name,
      waitedMs: acquiredAt - waitStartedAt,
    } satisfies LockAcquiredEvent);

    const stopRenewal = this.startRenewal(this.backend, token);
    try {
      return await body();
    } finally {
      await stopRenewal();
      try {
        await this.backend.release(token);
      } catch (error) {
        this.logger.error(`Failed to release lock "${name}": ${getErrorMessage(error)}`);
      }
      this.eventEmitter.emit(ROLLOUT_EVENTS.LOCK_RELEASED, {
        lockName: name,
        heldMs: Date.now() - acquiredAt,
      } satisfies LockReleasedEvent);
    }
  }

  /**
   * Renews the lease of `token` until the returned function is called.
   * Stopping waits for a renewal in flight, so release never races it.
   */
  private startRenewal(backend: LockBackend, token: LockToken): () => Promise<void> {
    let inFlight: Promise<void> | null = null;

    const timer = setInterval(() => {
      if (inFlight) {
        return;
      }
      inFlight = this.renew(backend, token).finally(() => {
        inFlight = null;
      });
    }, this.renewIntervalMs());

    return async () => {
      clearInterval(timer);
      if (inFlight) {
        await inFlight;
      }
    };
  }

  private async renew(backend: LockBackend, token: LockToken): Promise<void> {
    try {
      const extended = await backend.extend(token);
      if (extended) {
        this.logger.debug(`Renewed lease of lock "${token.name}" for ${this.config.leaseMs}ms`);
      } else {
        this.logger.warn(`Lock "${token.name}" is no longer held by this rollout; another rollout may take it`);
      }
    } catch (error) {
      this.logger.error(`Failed to renew lock "${token.name}": ${getErrorMessage(error)}`);
    }
  }

  private renewIntervalMs(): number {
    return Math.max(1, Math.floor(this.config.leaseMs / 3));
  }
}
