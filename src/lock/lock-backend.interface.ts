/**
 * Proof of ownership returned by a successful acquire.
 * Opaque outside the backend that issued it.
 */
export interface LockToken {
  name: string;
  value: string;
}

/**
 * Storage behind the cluster-wide deploy lock.
 */
export interface LockBackend {
  /**
   * Tries to take `name` until `maxWaitMs` elapses.
   *
   * @returns The ownership token, or `null` if the lock stayed held by someone else
   */
  acquire(name: string, maxWaitMs: number): Promise<LockToken | null>;

  /**
   * Restarts the lease of a held lock.
   *
   * @returns `false` if `token` no longer holds the lock
   */
  extend(token: LockToken): Promise<boolean>;

  /**
   * Releases a lock previously returned by {@link acquire}. Releasing a lock
   * whose lease already expired or that another holder took over is a no-op.
   */
  release(token: LockToken): Promise<void>;
}

export interface LockAcquireResponse {
  acquired: boolean;
  lockId?: string;
  expiresAt?: string;
  holder?: string;
  holderExpiresAt?: string;
}

export interface LockRenewResponse {
  renewed: boolean;
  expiresAt?: string;
}

export interface LockReleaseResponse {
  released: boolean;
  releasedAt?: string;
  error?: string;
}
