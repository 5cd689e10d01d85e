/**
 * Error taxonomy.
 * Every failure surfaced by the supervisor, the transport and the client
 * is one of these classes, so callers can branch with `instanceof`.
 */

// ── Base ──────────────────────────────────────────────────────

export class DriverError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DriverError';
  }
}

// ── Lifecycle ─────────────────────────────────────────────────

/** Start while not idle, or stop while not running. */
export class StateError extends DriverError {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}

/** A bounded wait (port lock, readiness probe) ran out of time. */
export class TimeoutError extends DriverError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Bad archive, missing extension id, unwritable path, bad preference. */
export class ConfigError extends DriverError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** The driver binary could not be spawned. */
export class LaunchError extends DriverError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LaunchError';
  }
}

// ── Protocol ──────────────────────────────────────────────────

/** The server answered in a shape the protocol does not allow. */
export class ProtocolError extends DriverError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

// ── Helpers ───────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Re-raise `err` under a stage prefix such as `create profile failed: `.
 * Taxonomy errors keep their class; anything else becomes `fallback`.
 */
export function withStage(
  prefix: string,
  err: unknown,
  fallback: new (message: string, options?: ErrorOptions) => DriverError,
): DriverError {
  const message = prefix + errorMessage(err);
  if (err instanceof TimeoutError) {
    return new TimeoutError(message, err.timeoutMs);
  }
  if (err instanceof StateError) return new StateError(message);
  if (err instanceof ConfigError) return new ConfigError(message, { cause: err });
  if (err instanceof LaunchError) return new LaunchError(message, { cause: err });
  if (err instanceof ProtocolError) return new ProtocolError(message, { cause: err });
  return new fallback(message, { cause: err });
}
