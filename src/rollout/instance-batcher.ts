import { InvalidArgumentError } from '../shared/errors';

/**
 * Number of instances per batch for `count` eligible instances.
 *
 * With `percent` the size is `ceil(count * percent)`, never below one;
 * without it everything goes in a single batch.
 *
 * @throws {InvalidArgumentError} If `percent` is outside (0, 1]
 */
export function batchSize(count: number, percent?: number): number {
  if (percent === undefined) {
    return Math.max(1, count);
  }
  if (!Number.isFinite(percent) || percent <= 0 || percent > 1) {
    throw new InvalidArgumentError(`Batch percent must be greater than 0 and at most 1, got ${percent}`);
  }
  return Math.max(1, Math.ceil(count * percent));
}

/**
 * Splits `items` into consecutive batches, preserving order.
 *
 * The batches partition the input exactly: no gaps, duplicates or
 * reordering. An empty input yields no batches.
 *
 * @example
 * ```typescript
 * batchInstances(['a', 'b', 'c', 'd'], 0.5);
 * // Returns: [['a', 'b'], ['c', 'd']]
 * ```
 */
export function batchInstances<T>(items: readonly T[], percent?: number): T[][] {
  const size = batchSize(items.length, percent);
  const batches: T[][] = [];

  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}
