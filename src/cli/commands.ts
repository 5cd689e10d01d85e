import { once } from 'node:events';

import type { Command } from 'commander';
import { z } from 'zod';

import { WireClient } from '../client/client.js';
import { loadConfigFile } from '../config/loader.js';
import { DriverSupervisor } from '../driver/supervisor.js';
import { ConfigError, errorMessage } from '../errors/index.js';
import { Transport } from '../protocol/transport.js';
import type { FileConfig } from '../schema/config.js';
import { createLogger, parseLogLevel } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

const EXIT = {
  OK: 0,
  FAILURE: 1,
  CONFIG: 4,
} as const;

// ── Shared helpers ───────────────────────────────────────────

const portOptionSchema = z.coerce.number().int().min(0).max(65_535);

function cliLogger(level: string | undefined, fileLevel?: string): Logger {
  return createLogger({
    level: parseLogLevel(level ?? fileLevel ?? process.env['WIREDRIVER_LOG_LEVEL']),
    scope: 'wiredriver',
  });
}

function fail(message: string, exitCode: number): void {
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = exitCode;
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return Promise.race([
    once(process, 'SIGINT').then((): NodeJS.Signals => 'SIGINT'),
    once(process, 'SIGTERM').then((): NodeJS.Signals => 'SIGTERM'),
  ]);
}

// ── start ────────────────────────────────────────────────────

export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('Start a driver from a config file and keep it running until interrupted')
    .option('--config <path>', 'Path to config file', 'wiredriver.yaml')
    .option('--port <n>', 'Override the configured port (0 = auto-select)')
    .option('--log-level <level>', 'debug | info | warn | error | silent')
    .action(async (opts: { config: string; port?: string; logLevel?: string }) => {
      let config: FileConfig;
      try {
        config = await loadConfigFile(opts.config);
      } catch (err) {
        fail(`config error: ${errorMessage(err)}`, EXIT.CONFIG);
        return;
      }

      let driverConfig = config.driver;
      if (opts.port !== undefined) {
        const port = portOptionSchema.safeParse(opts.port);
        if (!port.success) {
          fail(`config error: invalid --port: ${opts.port}`, EXIT.CONFIG);
          return;
        }
        driverConfig = { ...config.driver, port: port.data };
      }

      const logger = cliLogger(opts.logLevel, config.logLevel);
      const driver = new DriverSupervisor(driverConfig, { logger });

      try {
        await driver.start();
      } catch (err) {
        fail(errorMessage(err), err instanceof ConfigError ? EXIT.CONFIG : EXIT.FAILURE);
        return;
      }

      process.stdout.write(`${driver.url}\n`);
      const signal = await waitForShutdownSignal();
      logger.info('shutting down', { signal });

      await driver.stop();
      process.exitCode = EXIT.OK;
    });
}

// ── status ───────────────────────────────────────────────────

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description("Print a running driver's build and OS details as JSON")
    .requiredOption('--url <url>', 'Driver base URL, e.g. http://127.0.0.1:9515')
    .option('--log-level <level>', 'debug | info | warn | error | silent')
    .action(async (opts: { url: string; logLevel?: string }) => {
      const transport = new Transport({ baseUrl: opts.url, logger: cliLogger(opts.logLevel) });
      try {
        const status = await new WireClient(transport).status();
        process.stdout.write(JSON.stringify(status, null, 2) + '\n');
      } catch (err) {
        fail(errorMessage(err), EXIT.FAILURE);
      }
    });
}

// ── sessions ─────────────────────────────────────────────────

export function registerSessionsCommand(program: Command): void {
  program
    .command('sessions')
    .description('List the sessions active on a running driver as JSON')
    .requiredOption('--url <url>', 'Driver base URL, e.g. http://127.0.0.1:9515')
    .option('--log-level <level>', 'debug | info | warn | error | silent')
    .action(async (opts: { url: string; logLevel?: string }) => {
      const transport = new Transport({ baseUrl: opts.url, logger: cliLogger(opts.logLevel) });
      try {
        const sessions = await new WireClient(transport).sessions();
        const listing = sessions.map((s) => ({ id: s.id, capabilities: s.capabilities }));
        process.stdout.write(JSON.stringify(listing, null, 2) + '\n');
      } catch (err) {
        fail(errorMessage(err), EXIT.FAILURE);
      }
    });
}
