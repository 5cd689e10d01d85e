import { z } from 'zod';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import { logLevelSchema } from '../utils/logger.js';

// ── Preferences ─────────────────────────────────────────────

export const prefValueSchema = z.union([
  z.boolean(),
  z.number().int(),
  z.string(),
]);

export type PrefValue = z.infer<typeof prefValueSchema>;

export const prefsSchema = z.record(prefValueSchema);

export type Prefs = z.infer<typeof prefsSchema>;

// ── Shared driver fields ────────────────────────────────────

const baseDriverFields = {
  binaryPath: z.string().min(1),
  /** 0 selects a free port at or above the family's base port. */
  port: z.number().int().min(0).max(65_535).default(0),
  lockTimeout: z.number().int().positive().default(TIMEOUTS.LOCK_PORT_TIMEOUT),
  startTimeout: z.number().int().positive().default(TIMEOUTS.START_TIMEOUT),
  probeInterval: z.number().int().positive().default(TIMEOUTS.PROBE_INTERVAL),
  stdioDrainTimeout: z
    .number()
    .int()
    .nonnegative()
    .default(TIMEOUTS.STDIO_DRAIN_TIMEOUT),
  /** Where the child's stdout/stderr go. Omitted: the parent's own streams. */
  logFile: z.string().min(1).optional(),
  env: z.record(z.string()).default({}),
};

// ── Standalone driver binary ────────────────────────────────

export const standaloneDriverConfigSchema = z.object({
  kind: z.literal('standalone'),
  ...baseDriverFields,
  urlBase: z.string().default(''),
  logPath: z.string().min(1).default('driver.log'),
  threads: z.number().int().positive().default(LIMITS.HTTP_THREADS),
});

export type StandaloneDriverConfig = z.infer<typeof standaloneDriverConfigSchema>;

// ── Browser with extension profile ──────────────────────────

export const extensionDriverConfigSchema = z.object({
  kind: z.literal('extension'),
  ...baseDriverFields,
  extensionPath: z.string().min(1),
  prefs: prefsSchema.default({}),
  useDefaultPrefs: z.boolean().default(true),
  /** Directory for the extension's own log files. */
  logDir: z.string().min(1).optional(),
  deleteProfileOnStop: z.boolean().default(true),
});

export type ExtensionDriverConfig = z.infer<typeof extensionDriverConfigSchema>;

// ── Either family ───────────────────────────────────────────

export const driverConfigSchema = z.discriminatedUnion('kind', [
  standaloneDriverConfigSchema,
  extensionDriverConfigSchema,
]);

export type DriverConfig = z.infer<typeof driverConfigSchema>;
export type DriverConfigInput = z.input<typeof driverConfigSchema>;
export type DriverKind = DriverConfig['kind'];

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  logLevel: logLevelSchema.optional(),
  driver: driverConfigSchema,
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
