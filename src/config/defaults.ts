/**
 * Default configuration values.
 * All values are overridable per driver via the config schema.
 */

export const TIMEOUTS = {
  LOCK_PORT_TIMEOUT: 60_000,
  LOCK_RETRY_INTERVAL: 1_000,
  START_TIMEOUT: 20_000,
  PROBE_INTERVAL: 1_000,
  STDIO_DRAIN_TIMEOUT: 5_000,
} as const;

export const PORTS = {
  STANDALONE_BASE: 9515,
  EXTENSION_BASE: 7055,
  MAX_PORT: 65_535,
} as const;

export const LIMITS = {
  MAX_REDIRECTS: 3,
  HTTP_THREADS: 4,
  LOGGED_BODY_CHARS: 1_024,
} as const;

export const LOOPBACK_HOST = '127.0.0.1';
