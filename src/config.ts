/**
 * Centralized configuration for stagehub
 *
 * Priority order:
 * 1. CLI arguments (highest priority)
 * 2. Environment variables
 * 3. Default values (lowest priority)
 */

function parsePositiveIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  const n = raw === undefined ? Number.NaN : Number.parseInt(String(raw).trim(), 10);
  return Number.isFinite(n) && n > 0 ? Math.trunc(n) : fallback;
}

function parseStringEnv(key: string): string | undefined {
  const raw = process.env[key]?.trim();
  return raw ? raw : undefined;
}

export interface StageHubConfig {
  /** Interval between registry lookups while a spawned daemon starts */
  pollIntervalMs: number;
  /** Ceiling on how long a spawned daemon may take to register */
  startTimeoutMs: number;
  /** Find-or-start attempts before an unreachable daemon becomes fatal */
  connectAttempts: number;
  /** Base backoff between find-or-start attempts (multiplied by attempt number) */
  connectBackoffMs: number;
  /** Longest stream line accepted by the client, in bytes */
  maxLineBytes: number;
  /** Outbound lines a subscriber may have queued before it is closed */
  subscriberQueueLimit: number;
  /** Daemon inactivity timeout in seconds (counted while nobody is attached) */
  daemonTimeoutSeconds: number;
  /** Overrides the per-project registry directory */
  stateDir?: string;
  /** Engine module the daemon loads */
  engine?: string;
  /** Diagnostic output */
  debug: boolean;
}

/**
 * Environment variable names for configuration
 */
export const ENV_VARS = {
  STAGEHUB_POLL_INTERVAL_MS: 'STAGEHUB_POLL_INTERVAL_MS',
  STAGEHUB_START_TIMEOUT_MS: 'STAGEHUB_START_TIMEOUT_MS',
  STAGEHUB_CONNECT_ATTEMPTS: 'STAGEHUB_CONNECT_ATTEMPTS',
  STAGEHUB_CONNECT_BACKOFF_MS: 'STAGEHUB_CONNECT_BACKOFF_MS',
  STAGEHUB_MAX_LINE_BYTES: 'STAGEHUB_MAX_LINE_BYTES',
  STAGEHUB_SUBSCRIBER_QUEUE_LIMIT: 'STAGEHUB_SUBSCRIBER_QUEUE_LIMIT',
  /** Daemon inactivity timeout in seconds */
  STAGEHUB_DAEMON_TIMEOUT: 'STAGEHUB_DAEMON_TIMEOUT',
  STAGEHUB_STATE_DIR: 'STAGEHUB_STATE_DIR',
  STAGEHUB_ENGINE: 'STAGEHUB_ENGINE',
  STAGEHUB_DEBUG: 'STAGEHUB_DEBUG',
} as const;

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: StageHubConfig = {
  pollIntervalMs: 100,
  startTimeoutMs: 30_000,
  connectAttempts: 3,
  connectBackoffMs: 250,
  maxLineBytes: 100 * 1024 * 1024, // 100MB
  subscriberQueueLimit: 1024,
  daemonTimeoutSeconds: 1800, // 30 minutes
  debug: false,
};

/**
 * Get the current stagehub configuration, considering environment variables
 */
export function getConfig(): StageHubConfig {
  return {
    pollIntervalMs: parsePositiveIntEnv(
      ENV_VARS.STAGEHUB_POLL_INTERVAL_MS,
      DEFAULT_CONFIG.pollIntervalMs,
    ),
    startTimeoutMs: parsePositiveIntEnv(
      ENV_VARS.STAGEHUB_START_TIMEOUT_MS,
      DEFAULT_CONFIG.startTimeoutMs,
    ),
    connectAttempts: parsePositiveIntEnv(
      ENV_VARS.STAGEHUB_CONNECT_ATTEMPTS,
      DEFAULT_CONFIG.connectAttempts,
    ),
    connectBackoffMs: parsePositiveIntEnv(
      ENV_VARS.STAGEHUB_CONNECT_BACKOFF_MS,
      DEFAULT_CONFIG.connectBackoffMs,
    ),
    maxLineBytes: parsePositiveIntEnv(ENV_VARS.STAGEHUB_MAX_LINE_BYTES, DEFAULT_CONFIG.maxLineBytes),
    subscriberQueueLimit: parsePositiveIntEnv(
      ENV_VARS.STAGEHUB_SUBSCRIBER_QUEUE_LIMIT,
      DEFAULT_CONFIG.subscriberQueueLimit,
    ),
    daemonTimeoutSeconds: parsePositiveIntEnv(
      ENV_VARS.STAGEHUB_DAEMON_TIMEOUT,
      DEFAULT_CONFIG.daemonTimeoutSeconds,
    ),
    stateDir: parseStringEnv(ENV_VARS.STAGEHUB_STATE_DIR),
    engine: parseStringEnv(ENV_VARS.STAGEHUB_ENGINE),
    debug: process.env[ENV_VARS.STAGEHUB_DEBUG] === '1',
  };
}

/**
 * Resolve the daemon timeout to use, with priority:
 * 1. CLI argument (if provided)
 * 2. Environment variable
 * 3. Default value
 */
export function resolveDaemonTimeout(cliTimeout?: number): number {
  if (cliTimeout != null && Number.isFinite(cliTimeout)) {
    return Math.max(1, Math.trunc(cliTimeout));
  }

  const config = getConfig();
  return config.daemonTimeoutSeconds;
}

/**
 * Get daemon timeout in milliseconds (for internal use)
 */
export function getDaemonTimeoutMs(cliTimeout?: number): number {
  return resolveDaemonTimeout(cliTimeout) * 1000;
}
