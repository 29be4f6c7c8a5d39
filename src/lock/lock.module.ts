import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import {
  DEFAULT_LOCK_LEASE,
  DEFAULT_LOCK_MAX_WAIT,
  DEFAULT_LOCK_NAME,
  DEFAULT_LOCK_POLL_INTERVAL,
  DEFAULT_REDIS_DB,
  DEFAULT_REDIS_HOST,
  DEFAULT_REDIS_KEY_PREFIX,
  DEFAULT_REDIS_PORT,
  DEFAULT_BACKEND_REQUEST_TIMEOUT,
} from '../config/config.constants';
import type { LockConfig } from '../config/config.types';
import { DistributedLockService } from './distributed-lock.service';
import { HttpLockBackend } from './http-lock.backend';
import { InMemoryLockBackend } from './in-memory-lock.backend';
import { RedisLockBackend } from './redis-lock.backend';
import type { LockBackend } from './lock-backend.interface';
import { LOCK_BACKEND, LOCK_CONFIG } from './lock.tokens';

/**
 * Factory provider for LockConfig.
 * Falls back to an unlocked configuration when the rollout namespace is absent.
 */
const lockConfigProvider = {
  provide: LOCK_CONFIG,
  useFactory: (configService: ConfigService): LockConfig => {
    const config = configService.get<LockConfig>('rollout.lock');
    return (
      config ??
      ({
        backend: 'none',
        name: DEFAULT_LOCK_NAME,
        nodeId: 'node-unknown',
        maxWaitMs: DEFAULT_LOCK_MAX_WAIT * 1000,
        leaseMs: DEFAULT_LOCK_LEASE * 1000,
        pollIntervalMs: DEFAULT_LOCK_POLL_INTERVAL,
        redis: {
          host: DEFAULT_REDIS_HOST,
          port: DEFAULT_REDIS_PORT,
          db: DEFAULT_REDIS_DB,
          keyPrefix: DEFAULT_REDIS_KEY_PREFIX,
        },
        http: { url: '', apiKey: '', timeout: DEFAULT_BACKEND_REQUEST_TIMEOUT },
      } satisfies LockConfig)
    );
  },
  inject: [ConfigService],
};

/**
 * Resolves the configured backend once; `null` disables locking.
 */
const lockBackendProvider = {
  provide: LOCK_BACKEND,
  useFactory: (
    config: LockConfig,
    redis: RedisLockBackend,
    http: HttpLockBackend,
    memory: InMemoryLockBackend,
  ): LockBackend | null => {
    switch (config.backend) {
      case 'redis':
        return redis;
      case 'http':
        return http;
      case 'memory':
        return memory;
      case 'none':
        return null;
    }
  },
  inject: [LOCK_CONFIG, RedisLockBackend, HttpLockBackend, InMemoryLockBackend],
};

@Module({
  imports: [HttpModule],
  providers: [
    lockConfigProvider,
    RedisLockBackend,
    HttpLockBackend,
    InMemoryLockBackend,
    lockBackendProvider,
    DistributedLockService,
  ],
  exports: [DistributedLockService, LOCK_CONFIG],
})
export class LockModule {}
