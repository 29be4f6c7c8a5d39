/**
 * The deploy lock stayed held by another rollout for the whole wait window.
 * Nothing was touched; the caller may retry later.
 */
export class LockTimeoutError extends Error {
  constructor(
    public readonly lockName: string,
    public readonly maxWaitMs: number,
  ) {
    super(`Timed out after ${maxWaitMs}ms waiting for lock "${lockName}"`);
    this.name = 'LockTimeoutError';
    Object.setPrototypeOf(this, LockTimeoutError.prototype);
  }
}
