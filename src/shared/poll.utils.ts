/**
 * Deadline-bounded polling for eventually-consistent remote state.
 */

export interface PollOptions {
  /** Delay between attempts in milliseconds */
  intervalMs: number;
  /** Overall wall-clock budget in milliseconds */
  timeoutMs: number;
  /** Called after every attempt that did not satisfy the condition */
  onAttempt?: (attempt: number, elapsedMs: number) => void;
}

export type PollOutcome<T> = { done: true; value: T } | { done: false };

/**
 * Resolves a poll outcome as complete.
 */
export function pollDone<T>(value: T): PollOutcome<T> {
  return { done: true, value };
}

/**
 * Resolves a poll outcome as pending.
 */
export function pollPending<T>(): PollOutcome<T> {
  return { done: false };
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Repeatedly calls `check` until it reports completion or the deadline passes.
 *
 * The attempt count is unbounded; only elapsed time ends the loop. The
 * deadline is checked between attempts, so a single slow `check` is not
 * interrupted. Errors thrown by `check` propagate immediately.
 *
 * @returns The completed value, or `null` when the deadline passed first
 *
 * @example
 * ```typescript
 * const state = await pollUntil(
 *   async () => {
 *     const status = await compute.pollDeployment(handle);
 *     return status === 'successful' ? pollDone(status) : pollPending();
 *   },
 *   { intervalMs: 15_000, timeoutMs: 1_800_000 },
 * );
 * ```
 */
export async function pollUntil<T>(check: () => Promise<PollOutcome<T>>, options: PollOptions): Promise<T | null> {
  const startedAt = Date.now();
  const deadline = startedAt + options.timeoutMs;

  for (let attempt = 1; ; attempt++) {
    const outcome = await check();
    if (outcome.done) {
      return outcome.value;
    }

    const now = Date.now();
    options.onAttempt?.(attempt, now - startedAt);

    const remaining = deadline - now;
    if (remaining <= 0) {
      return null;
    }

    await sleep(Math.min(options.intervalMs, remaining));
  }
}
