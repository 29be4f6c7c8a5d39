export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ensure integer for configuration values (ports, timeouts, intervals)
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Parses one of a fixed set of lowercase values.
 *
 * @param name - Environment variable name, used in the error message
 * @throws {Error} If the value is set but not one of `allowed`
 * @example
 * ```
 * parseEnumWithDefault('ROLLOUT_LOCK_BACKEND', 'Redis', ['redis', 'none'], 'none')
 * // Returns: 'redis'
 * ```
 */
export function parseEnumWithDefault<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T,
): T {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new Error(`Invalid ${name}: "${value}". Must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Parses a batch fraction in the range (0, 1].
 *
 * Returns undefined when unset, which means "deploy everything in one batch".
 *
 * @throws {Error} If the value is not a number in (0, 1]
 */
export function parseOptionalPercent(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 1) {
    throw new Error(`Invalid percent value: "${value}" (must be greater than 0 and at most 1)`);
  }

  return parsed;
}
