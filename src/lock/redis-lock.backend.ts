import { randomUUID } from 'crypto';
import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { getErrorMessage } from '../shared/error.utils';
import { pollDone, pollPending, pollUntil } from '../shared/poll.utils';
import type { LockConfig } from '../config/config.types';
import type { LockBackend, LockToken } from './lock-backend.interface';
import { LOCK_CONFIG } from './lock.tokens';

// Delete the key only if it still holds our value.
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

// Restart the lease only if the key still holds our value.
const EXTEND_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
end
return 0
`;

/**
 * Redis-backed deploy lock.
 *
 * Acquire is `SET key value PX lease NX`, retried every poll interval until
 * the wait window closes. A Redis error during acquire counts as "not
 * acquired yet". The holder renews the lease while it works, so the lease
 * only bounds how long a crashed holder keeps everyone else out.
 */
@Injectable()
export class RedisLockBackend implements LockBackend, OnModuleDestroy {
  private readonly logger = new Logger(RedisLockBackend.name);
  private client: Redis | null = null;

  constructor(@Inject(LOCK_CONFIG) private readonly config: LockConfig) {}

  private ensureClient(): Redis {
    if (!this.client) {
      this.client = new Redis({
        host: this.config.redis.host,
        port: this.config.redis.port,
        db: this.config.redis.db,
      });
    }
    return this.client;
  }

  private keyFor(name: string): string {
    return `${this.config.redis.keyPrefix}${name}`;
  }

  async acquire(name: string, maxWaitMs: number): Promise<LockToken | null> {
    const client = this.ensureClient();
    const key = this.keyFor(name);
    const value = `${this.config.nodeId}:${randomUUID()}`;

    const acquired = await pollUntil<boolean>(
      async () => {
        try {
          const result = await client.set(key, value, 'PX', this.config.leaseMs, 'NX');
          return result === 'OK' ? pollDone(true) : pollPending();
        } catch (error) {
          this.logger.warn(`Failed to acquire lock "${name}": ${getErrorMessage(error)}`);
          return pollPending();
        }
      },
      {
        intervalMs: this.config.pollIntervalMs,
        timeoutMs: maxWaitMs,
        onAttempt: (attempt, elapsedMs) => {
          this.logger.debug(`Lock "${name}" is held elsewhere (attempt ${attempt}, waited ${elapsedMs}ms)`);
        },
      },
    );

    return acquired ? { name, value } : null;
  }

  async extend(token: LockToken): Promise<boolean> {
    const client = this.ensureClient();
    const extended = await client.eval(
      EXTEND_SCRIPT,
      1,
      this.keyFor(token.name),
      token.value,
      this.config.leaseMs,
    );
    return extended === 1;
  }

  async release(token: LockToken): Promise<void> {
    const client = this.ensureClient();
    const deleted = await client.eval(RELEASE_SCRIPT, 1, this.keyFor(token.name), token.value);

    if (deleted !== 1) {
      this.logger.warn(`Lock "${token.name}" was no longer held by this node at release; its lease may have expired`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }
}
