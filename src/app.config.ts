import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  ALLOWED_FLEET_DRIVERS,
  ALLOWED_LOCK_BACKENDS,
  DEFAULT_BACKEND_REQUEST_TIMEOUT,
  DEFAULT_DEPLOY_POLL_INTERVAL,
  DEFAULT_DEPLOY_TIMEOUT,
  DEFAULT_FLEET_DRIVER,
  DEFAULT_LB_POLL_INTERVAL,
  DEFAULT_LB_WAIT_TIMEOUT,
  DEFAULT_LOCK_BACKEND,
  DEFAULT_LOCK_LEASE,
  DEFAULT_LOCK_MAX_WAIT,
  DEFAULT_LOCK_NAME,
  DEFAULT_LOCK_POLL_INTERVAL,
  DEFAULT_REDIS_DB,
  DEFAULT_REDIS_HOST,
  DEFAULT_REDIS_KEY_PREFIX,
  DEFAULT_REDIS_PORT,
  DEFAULT_SIMULATED_SETTLE_POLLS,
} from './config/config.constants';
import {
  parseEnumWithDefault,
  parseNumberWithDefault,
  parseOptionalPercent,
  parseStringWithDefault,
} from './config/config.parsers';
import { validateFleetConfig, validateLockConfig } from './config/config.validators';
import { generateNodeId } from './config/config.utils';
import type {
  DeployConfig,
  FleetConfig,
  LoadBalancerWaitConfig,
  LockConfig,
  RolloutConfiguration,
} from './config/config.types';

/**
 * Build Lock Configuration
 *
 * Configures the cluster-wide deploy lock that serializes rolling deploys
 * started from different processes or hosts.
 *
 * Optional environment variables:
 * - ROLLOUT_LOCK_BACKEND: 'redis', 'http', 'memory' or 'none' (default: 'none')
 * - ROLLOUT_LOCK_NAME: Lock name shared by every rollout of the cluster (default: 'deploy')
 * - ROLLOUT_LOCK_MAX_WAIT: Seconds to wait in the queue before failing (default: 600)
 * - ROLLOUT_LOCK_LEASE: Lock lease TTL in seconds (default: 3600)
 * - ROLLOUT_LOCK_POLL_INTERVAL: Milliseconds between acquire attempts (default: 1000)
 * - ROLLOUT_NODE_ID: Lock holder identity (default: auto-generated from hostname)
 * - ROLLOUT_REDIS_HOST / ROLLOUT_REDIS_PORT / ROLLOUT_REDIS_DB / ROLLOUT_REDIS_KEY_PREFIX
 * - ROLLOUT_LOCK_URL / ROLLOUT_LOCK_API_KEY / ROLLOUT_LOCK_TIMEOUT: HTTP lock API
 *
 * @returns Lock configuration object
 * @throws {Error} If the selected backend is missing required settings
 */
function buildLockConfig(): LockConfig {
  const config: LockConfig = {
    backend: parseEnumWithDefault(
      'ROLLOUT_LOCK_BACKEND',
      process.env.ROLLOUT_LOCK_BACKEND,
      ALLOWED_LOCK_BACKENDS,
      DEFAULT_LOCK_BACKEND,
    ),
    name: parseStringWithDefault(process.env.ROLLOUT_LOCK_NAME, DEFAULT_LOCK_NAME),
    nodeId: parseStringWithDefault(process.env.ROLLOUT_NODE_ID, generateNodeId()),
    maxWaitMs: parseNumberWithDefault(process.env.ROLLOUT_LOCK_MAX_WAIT, DEFAULT_LOCK_MAX_WAIT) * 1000,
    leaseMs: parseNumberWithDefault(process.env.ROLLOUT_LOCK_LEASE, DEFAULT_LOCK_LEASE) * 1000,
    pollIntervalMs: parseNumberWithDefault(process.env.ROLLOUT_LOCK_POLL_INTERVAL, DEFAULT_LOCK_POLL_INTERVAL),
    redis: {
      host: parseStringWithDefault(process.env.ROLLOUT_REDIS_HOST, DEFAULT_REDIS_HOST),
      port: parseNumberWithDefault(process.env.ROLLOUT_REDIS_PORT, DEFAULT_REDIS_PORT),
      db: parseNumberWithDefault(process.env.ROLLOUT_REDIS_DB, DEFAULT_REDIS_DB),
      keyPrefix: parseStringWithDefault(process.env.ROLLOUT_REDIS_KEY_PREFIX, DEFAULT_REDIS_KEY_PREFIX),
    },
    http: {
      url: parseStringWithDefault(process.env.ROLLOUT_LOCK_URL?.trim(), ''),
      apiKey: parseStringWithDefault(process.env.ROLLOUT_LOCK_API_KEY?.trim(), ''),
      timeout: parseNumberWithDefault(process.env.ROLLOUT_LOCK_TIMEOUT, DEFAULT_BACKEND_REQUEST_TIMEOUT),
    },
  };

  validateLockConfig(config);
  return config;
}

/**
 * Build Fleet Configuration
 *
 * Selects the adapters used to reach the compute orchestration service and
 * the load balancer service.
 *
 * Optional environment variables:
 * - ROLLOUT_FLEET_DRIVER: 'http' or 'simulated' (default: 'http')
 * - ROLLOUT_COMPUTE_URL: Compute orchestration API base URL (required for 'http')
 * - ROLLOUT_LOAD_BALANCER_URL: Load balancer API base URL (required for 'http')
 * - ROLLOUT_FLEET_API_KEY: API key sent as X-API-Key (default: none)
 * - ROLLOUT_FLEET_TIMEOUT: Request timeout in ms (default: 10000)
 * - ROLLOUT_SIMULATED_FLEET_PATH: JSON file seeding the simulated fleet
 * - ROLLOUT_SIMULATED_SETTLE_POLLS: Polls before a simulated transition settles (default: 1)
 *
 * @returns Fleet configuration object
 * @throws {Error} If the http driver is selected without both URLs
 */
function buildFleetConfig(): FleetConfig {
  const seedPath = process.env.ROLLOUT_SIMULATED_FLEET_PATH?.trim();

  const config: FleetConfig = {
    driver: parseEnumWithDefault(
      'ROLLOUT_FLEET_DRIVER',
      process.env.ROLLOUT_FLEET_DRIVER,
      ALLOWED_FLEET_DRIVERS,
      DEFAULT_FLEET_DRIVER,
    ),
    compute: {
      url: parseStringWithDefault(process.env.ROLLOUT_COMPUTE_URL?.trim(), ''),
    },
    loadBalancer: {
      url: parseStringWithDefault(process.env.ROLLOUT_LOAD_BALANCER_URL?.trim(), ''),
    },
    apiKey: parseStringWithDefault(process.env.ROLLOUT_FLEET_API_KEY?.trim(), ''),
    timeout: parseNumberWithDefault(process.env.ROLLOUT_FLEET_TIMEOUT, DEFAULT_BACKEND_REQUEST_TIMEOUT),
    simulated: {
      seedPath: seedPath || undefined,
      settlePolls: parseNumberWithDefault(
        process.env.ROLLOUT_SIMULATED_SETTLE_POLLS,
        DEFAULT_SIMULATED_SETTLE_POLLS,
      ),
    },
  };

  validateFleetConfig(config);
  return config;
}

/**
 * Build Deploy Configuration
 *
 * Optional environment variables:
 * - ROLLOUT_DEPLOY_TIMEOUT: Seconds a batch deployment may take (default: 1800)
 * - ROLLOUT_DEPLOY_POLL_INTERVAL: Milliseconds between deployment status polls (default: 15000)
 */
function buildDeployConfig(): DeployConfig {
  return {
    timeoutMs: parseNumberWithDefault(process.env.ROLLOUT_DEPLOY_TIMEOUT, DEFAULT_DEPLOY_TIMEOUT) * 1000,
    pollIntervalMs: parseNumberWithDefault(process.env.ROLLOUT_DEPLOY_POLL_INTERVAL, DEFAULT_DEPLOY_POLL_INTERVAL),
  };
}

/**
 * Build Load Balancer Configuration
 *
 * Optional environment variables:
 * - ROLLOUT_LB_WAIT_TIMEOUT: Seconds to wait for each deregistration/registration (default: 600)
 * - ROLLOUT_LB_POLL_INTERVAL: Milliseconds between instance state polls (default: 15000)
 */
function buildLoadBalancerConfig(): LoadBalancerWaitConfig {
  return {
    waitTimeoutMs: parseNumberWithDefault(process.env.ROLLOUT_LB_WAIT_TIMEOUT, DEFAULT_LB_WAIT_TIMEOUT) * 1000,
    pollIntervalMs: parseNumberWithDefault(process.env.ROLLOUT_LB_POLL_INTERVAL, DEFAULT_LB_POLL_INTERVAL),
  };
}

/**
 * Build Target Configuration
 *
 * The rollout the entrypoint runs. Identifiers are not validated here; the
 * rolling deploy service validates the request before taking the lock.
 *
 * Optional environment variables:
 * - ROLLOUT_STACK_ID, ROLLOUT_LAYER_ID, ROLLOUT_APP_ID: Deploy target
 * - ROLLOUT_PERCENT: Fraction of eligible instances per batch, in (0, 1] (default: all at once)
 */
function buildTargetConfig(): RolloutConfiguration['target'] {
  return {
    stackId: parseStringWithDefault(process.env.ROLLOUT_STACK_ID?.trim(), ''),
    layerId: parseStringWithDefault(process.env.ROLLOUT_LAYER_ID?.trim(), ''),
    appId: parseStringWithDefault(process.env.ROLLOUT_APP_ID?.trim(), ''),
    percent: parseOptionalPercent(process.env.ROLLOUT_PERCENT),
  };
}

/**
 * Register Config Rollout
 */
export default registerAs(
  'rollout',
  (): RolloutConfiguration => ({
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    lock: buildLockConfig(),
    fleet: buildFleetConfig(),
    deploy: buildDeployConfig(),
    loadBalancer: buildLoadBalancerConfig(),
    target: buildTargetConfig(),
  }),
);
