import * as process from 'process';
import { randomBytes } from 'crypto';
import { Logger } from '@nestjs/common';
import { parseStringWithDefault } from './config.parsers';
import type { RolloutConfiguration } from './config.types';

/**
 * Generate Node ID
 *
 * Creates a unique lock holder identifier using hostname and cryptographic random bytes.
 * Used for distributed coordination when ROLLOUT_NODE_ID is not explicitly configured.
 *
 * @returns Node ID in format: hostname-randomhex
 */
export function generateNodeId(): string {
  const hostname = parseStringWithDefault(process.env.HOSTNAME, 'unknown');
  const randomId = randomBytes(4).toString('hex');
  return `${hostname}-${randomId}`;
}

/* c8 ignore start */
export function logConfigurationSummary(config: RolloutConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);

  if (config.lock.backend === 'none') {
    summaryLogger.log('Deploy Lock: disabled');
  } else {
    summaryLogger.log(
      `Deploy Lock: ${config.lock.backend} (name: ${config.lock.name}, node: ${config.lock.nodeId}, max wait: ${config.lock.maxWaitMs}ms)`,
    );
  }
  if (config.lock.backend === 'redis') {
    summaryLogger.log(`Redis: ${config.lock.redis.host}:${config.lock.redis.port}/${config.lock.redis.db}`);
  }
  if (config.lock.backend === 'http') {
    summaryLogger.log(`Lock API: ${config.lock.http.url}`);
  }

  if (config.fleet.driver === 'http') {
    summaryLogger.log(`Compute API: ${config.fleet.compute.url}`);
    summaryLogger.log(`Load Balancer API: ${config.fleet.loadBalancer.url}`);
  } else {
    summaryLogger.log(`Fleet: simulated (seed: ${config.fleet.simulated.seedPath ?? 'empty'})`);
  }

  summaryLogger.log(
    `Deploy Timeout: ${config.deploy.timeoutMs}ms (poll every ${config.deploy.pollIntervalMs}ms)`,
  );
  summaryLogger.log(
    `Load Balancer Wait: ${config.loadBalancer.waitTimeoutMs}ms (poll every ${config.loadBalancer.pollIntervalMs}ms)`,
  );

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
