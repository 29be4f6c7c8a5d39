/**
 * Lock backends the rollout can coordinate through.
 * `none` runs rollouts unlocked (single operator, explicit opt-out).
 */
export const ALLOWED_LOCK_BACKENDS = ['redis', 'http', 'memory', 'none'] as const;

/** Fleet drivers: real HTTP adapters or the in-process simulation. */
export const ALLOWED_FLEET_DRIVERS = ['http', 'simulated'] as const;

// Configuration defaults
export const DEFAULT_LOCK_BACKEND = 'none';
export const DEFAULT_LOCK_NAME = 'deploy';
export const DEFAULT_LOCK_MAX_WAIT = 600; // seconds in the queue before giving up
export const DEFAULT_LOCK_LEASE = 3600; // seconds; bounds how long a crashed holder blocks others
export const DEFAULT_LOCK_POLL_INTERVAL = 1000;
export const DEFAULT_REDIS_HOST = 'localhost';
export const DEFAULT_REDIS_PORT = 6379;
export const DEFAULT_REDIS_DB = 0;
export const DEFAULT_REDIS_KEY_PREFIX = 'rollout:lock:';
export const DEFAULT_BACKEND_REQUEST_TIMEOUT = 10000;

export const DEFAULT_FLEET_DRIVER = 'http';
export const DEFAULT_SIMULATED_SETTLE_POLLS = 1;

export const DEFAULT_DEPLOY_TIMEOUT = 30 * 60; // seconds
export const DEFAULT_DEPLOY_POLL_INTERVAL = 15000;
export const DEFAULT_LB_WAIT_TIMEOUT = 600; // 40 attempts x 15s
export const DEFAULT_LB_POLL_INTERVAL = 15000;
