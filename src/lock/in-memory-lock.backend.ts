import { randomUUID } from 'crypto';
import { Inject, Injectable } from '@nestjs/common';
import { pollDone, pollPending, pollUntil } from '../shared/poll.utils';
import type { LockConfig } from '../config/config.types';
import type { LockBackend, LockToken } from './lock-backend.interface';
import { LOCK_CONFIG } from './lock.tokens';

/**
 * Process-local lock. Serializes rollouts started inside one process only;
 * used for single-host runs and tests. Locks have no lease: they are held
 * until released.
 */
@Injectable()
export class InMemoryLockBackend implements LockBackend {
  private readonly holders = new Map<string, string>();

  constructor(@Inject(LOCK_CONFIG) private readonly config: LockConfig) {}

  async acquire(name: string, maxWaitMs: number): Promise<LockToken | null> {
    const value = `${this.config.nodeId}:${randomUUID()}`;

    const acquired = await pollUntil<boolean>(
      async () => {
        if (this.holders.has(name)) {
          return pollPending();
        }
        this.holders.set(name, value);
        return pollDone(true);
      },
      { intervalMs: this.config.pollIntervalMs, timeoutMs: maxWaitMs },
    );

    return acquired ? { name, value } : null;
  }

  async extend(token: LockToken): Promise<boolean> {
    return this.holders.get(token.name) === token.value;
  }

  async release(token: LockToken): Promise<void> {
    if (this.holders.get(token.name) === token.value) {
      this.holders.delete(token.name);
    }
  }
}
