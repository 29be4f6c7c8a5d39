import { Logger } from '@nestjs/common';
import type { FleetConfig, LockConfig } from './config.types';

const logger = new Logger('ConfigValidation');

/**
 * Validates an http(s) base URL.
 *
 * @param url - URL to validate
 * @returns True if the URL parses and uses http or https
 */
export function isValidHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validates the settings of the selected lock backend.
 *
 * Only the chosen backend is checked; settings of the others are ignored.
 *
 * @throws {Error} If the http backend has no valid URL
 */
export function validateLockConfig(config: LockConfig): void {
  if (config.backend === 'http' && !isValidHttpUrl(config.http.url)) {
    throw new Error(
      'ROLLOUT_LOCK_BACKEND=http requires a lock API:\n' +
        '  - ROLLOUT_LOCK_URL: Lock API base URL (required, http or https)\n' +
        '  - ROLLOUT_LOCK_API_KEY: Lock API key (optional)',
    );
  }

  if (config.backend === 'memory') {
    logger.warn('ROLLOUT_LOCK_BACKEND=memory only serializes rollouts inside this process');
  }

  if (config.pollIntervalMs === 0) {
    throw new Error('ROLLOUT_LOCK_POLL_INTERVAL must be greater than 0');
  }
}

/**
 * Validates fleet adapter settings.
 *
 * @throws {Error} If the http driver is selected without both service URLs
 */
export function validateFleetConfig(config: FleetConfig): void {
  if (config.driver !== 'http') {
    return;
  }

  const missing: string[] = [];
  if (!isValidHttpUrl(config.compute.url)) {
    missing.push('ROLLOUT_COMPUTE_URL');
  }
  if (!isValidHttpUrl(config.loadBalancer.url)) {
    missing.push('ROLLOUT_LOAD_BALANCER_URL');
  }

  if (missing.length > 0) {
    throw new Error(`ROLLOUT_FLEET_DRIVER=http requires valid URLs for: ${missing.join(', ')}`);
  }
}
