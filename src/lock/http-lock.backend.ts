import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { AxiosError } from 'axios';
import { getErrorMessage } from '../shared/error.utils';
import { pollDone, pollPending, pollUntil } from '../shared/poll.utils';
import type { LockConfig } from '../config/config.types';
import type {
  LockAcquireResponse,
  LockBackend,
  LockReleaseResponse,
  LockRenewResponse,
  LockToken,
} from './lock-backend.interface';
import { LOCK_CONFIG } from './lock.tokens';

/**
 * Deploy lock held by a remote lock API.
 *
 * @remarks
 * - `POST {url}/locks/acquire` is retried every poll interval until it grants
 *   the lock or the wait window closes
 * - Transport errors on acquire count as "not acquired yet"
 * - `POST {url}/locks/renew` restarts the server-side TTL of a held lock
 * - Transport errors on renew and release are logged; the server-side TTL
 *   reclaims the lock
 */
@Injectable()
export class HttpLockBackend implements LockBackend {
  private readonly logger = new Logger(HttpLockBackend.name);

  constructor(
    @Inject(LOCK_CONFIG) private readonly config: LockConfig,
    private readonly httpService: HttpService,
  ) {}

  async acquire(name: string, maxWaitMs: number): Promise<LockToken | null> {
    const lockId = await pollUntil<string>(
      async () => {
        const id = await this.tryAcquire(name);
        return id ? pollDone(id) : pollPending();
      },
      { intervalMs: this.config.pollIntervalMs, timeoutMs: maxWaitMs },
    );

    return lockId ? { name, value: lockId } : null;
  }

  async extend(token: LockToken): Promise<boolean> {
    try {
      const response = await firstValueFrom(
        this.httpService.post<LockRenewResponse>(
          `${this.config.http.url}/locks/renew`,
          {
            name: token.name,
            nodeId: this.config.nodeId,
            lockId: token.value,
            ttl: this.leaseSeconds(),
          },
          this.requestOptions(),
        ),
      );

      return response.data.renewed;
    } catch (error) {
      this.logHttpError(`Failed to renew lock "${token.name}"`, error);
      return false;
    }
  }

  async release(token: LockToken): Promise<void> {
    try {
      const response = await firstValueFrom(
        this.httpService.post<LockReleaseResponse>(
          `${this.config.http.url}/locks/release`,
          {
            name: token.name,
            nodeId: this.config.nodeId,
            lockId: token.value,
          },
          this.requestOptions(),
        ),
      );

      if (response.data.released) {
        this.logger.log(`Lock "${token.name}" released`, { releasedAt: response.data.releasedAt });
      } else {
        this.logger.warn(`Lock API did not confirm release of "${token.name}"`, response.data);
      }
    } catch (error) {
      this.logHttpError(`Failed to release lock "${token.name}"`, error);
    }
  }

  private async tryAcquire(name: string): Promise<string | null> {
    try {
      const response = await firstValueFrom(
        this.httpService.post<LockAcquireResponse>(
          `${this.config.http.url}/locks/acquire`,
          {
            name,
            nodeId: this.config.nodeId,
            ttl: this.leaseSeconds(),
          },
          this.requestOptions(),
        ),
      );

      if (response.data.acquired && response.data.lockId) {
        return response.data.lockId;
      }

      this.logger.debug(`Lock "${name}" is held elsewhere`, {
        holder: response.data.holder,
        holderExpiresAt: response.data.holderExpiresAt,
      });
      return null;
    } catch (error) {
      this.logHttpError(`Failed to acquire lock "${name}"`, error);
      return null;
    }
  }

  private leaseSeconds(): number {
    return Math.ceil(this.config.leaseMs / 1000);
  }

  private requestOptions() {
    return {
      headers: {
        'X-API-Key': this.config.http.apiKey,
        'Content-Type': 'application/json',
      },
      timeout: this.config.http.timeout,
    };
  }

  private logHttpError(message: string, error: unknown): void {
    if (error instanceof AxiosError) {
      const details: string = JSON.stringify({
        status: error.response?.status,
        data: error.response?.data as unknown,
      });
      this.logger.error(`${message}: ${error.message} ${details}`, error.stack);
      return;
    }

    this.logger.error(`${message}: ${getErrorMessage(error)}`);
  }
}
