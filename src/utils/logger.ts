/**
 * Structured logger for wiredriver.
 *
 * All output goes to stderr so stdout stays clean for the driver's own
 * output and for CLI results. Emoji prefixes give instant visual context
 * in the terminal. Loggers are created per component and injected; there
 * is no process-wide debug switch.
 */

import { z } from 'zod';

// ── Types ───────────────────────────────────────────────────

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel | undefined;
  scope?: string | undefined;
  write?: ((line: string) => void) | undefined;
}

// ── Core write ──────────────────────────────────────────────

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_ICON: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: '🔎',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '💥',
};

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') {
    return /^[\w./:@-]+$/.test(value) ? value : JSON.stringify(value);
  }
  return JSON.stringify(value) ?? String(value);
}

/** `key=value` pairs appended to the message, in insertion order. */
export function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

// ── Public API ──────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const write = options.write ?? writeStderr;
  const prefix = options.scope ? `[${options.scope}] ` : '';

  function emit(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    fields?: LogFields,
  ): void {
    if (LEVEL_RANK[level] < threshold) return;
    write(`${LEVEL_ICON[level]} ${prefix}${message}${formatFields(fields)}`);
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child(scope: string): Logger {
      return createLogger({
        level: options.level,
        write,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      });
    },
  };
}

/** Discards everything. Default for library callers that inject nothing. */
export const silentLogger: Logger = createLogger({ level: 'silent' });

export function parseLogLevel(raw: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(raw?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}
