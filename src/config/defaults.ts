/**
 * Default Configuration Constants
 *
 * Values components fall back to when constructed without explicit
 * configuration (tests, embedding). runtime.yaml mirrors these.
 */

/**
 * Lifecycle Controller Configuration
 */
export const LIFECYCLE = {
  /** Upper bound for a standby slot to pass its readiness probe (ms) */
  READINESS_TIMEOUT_MS: 300_000, // 5 minutes

  /** Delay between readiness probes while STARTING (ms) */
  READINESS_POLL_INTERVAL_MS: 1_000,

  /** Upper bound for the superseded slot to finish in-flight requests (ms) */
  DRAIN_TIMEOUT_MS: 30_000,

  /** Consecutive failed probes/forwards before a READY slot is UNHEALTHY */
  UNHEALTHY_THRESHOLD: 3,

  /** Health sweep period for active slots (ms, 0 disables) */
  HEALTH_CHECK_INTERVAL_MS: 10_000,

  /** Restart attempts for a crashed active slot before giving up */
  MAX_RESTARTS: 3,
} as const;

/**
 * Request Queue Configuration
 */
export const QUEUE = {
  /** Maximum time a request may be held while no slot is active (ms, 0 = unlimited) */
  MAX_HOLD_MS: 600_000, // 10 minutes

  /** Maximum held requests per model (0 = unlimited) */
  MAX_DEPTH: 1_000,
} as const;

/**
 * Worker Process Configuration
 */
export const WORKERS = {
  HOST: '127.0.0.1',
  BASE_PORT: 5005,
  INFERENCE_PATH: '/webhooks/rest/webhook',
  HEALTH_PATH: '/',
  PROBE_TIMEOUT_MS: 2_000,
  FORWARD_TIMEOUT_MS: 60_000,
} as const;

/**
 * Supervisor Gateway Configuration
 */
export const SUPERVISOR = {
  COMMAND: 'supervisorctl',
  COMMAND_TIMEOUT_MS: 10_000,
  GROUP_TEMPLATE: '{model}-{slot}',
} as const;

/**
 * Artifact Store Configuration
 */
export const ARTIFACTS = {
  ARTIFACT_FILE_NAME: 'model.tar.gz',
} as const;
