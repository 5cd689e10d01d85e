import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import { ConfigError, errorMessage } from '../errors/index.js';
import { fileConfigSchema } from '../schema/config.js';
import type { DriverConfig, FileConfig } from '../schema/config.js';

// ── Path resolution ─────────────────────────────────────────

function resolveFrom(baseDir: string, file: string): string;
function resolveFrom(baseDir: string, file: string | undefined): string | undefined;
function resolveFrom(baseDir: string, file: string | undefined): string | undefined {
  return file === undefined ? undefined : path.resolve(baseDir, file);
}

/**
 * Relative paths in a config file mean "next to the config file", not
 * "next to wherever the CLI was started". A bare binary name such as
 * `chromedriver` is left for PATH lookup.
 */
export function resolveConfigPaths(driver: DriverConfig, baseDir: string): DriverConfig {
  const binaryPath = driver.binaryPath.includes('/')
    ? resolveFrom(baseDir, driver.binaryPath)
    : driver.binaryPath;
  const logFile = resolveFrom(baseDir, driver.logFile);

  switch (driver.kind) {
    case 'standalone':
      return { ...driver, binaryPath, logFile, logPath: resolveFrom(baseDir, driver.logPath) };
    case 'extension':
      return {
        ...driver,
        binaryPath,
        logFile,
        extensionPath: resolveFrom(baseDir, driver.extensionPath),
        logDir: resolveFrom(baseDir, driver.logDir),
      };
  }
}

function describeIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a driver config file (YAML, or JSON by extension).
 * Any failure is a `ConfigError` naming the file.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let parsed: unknown;
  try {
    const raw = await readFile(configPath, 'utf-8');
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`cannot read ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`invalid ${configPath}: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }

  return {
    ...result.data,
    driver: resolveConfigPaths(result.data.driver, path.dirname(path.resolve(configPath))),
  };
}
