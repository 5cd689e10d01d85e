import { open, rm } from 'node:fs/promises';

import { LOOPBACK_HOST, PORTS } from '../config/defaults.js';
import { loadDefaultPrefs, logDirPrefs, PORT_PREF } from '../config/prefs.js';
import { WireClient } from '../client/client.js';
import { ConfigError, LaunchError, StateError, errorMessage, withStage } from '../errors/index.js';
import { Transport } from '../protocol/transport.js';
import { driverConfigSchema } from '../schema/config.js';
import type {
  DriverConfig,
  DriverConfigInput,
  DriverKind,
  ExtensionDriverConfig,
  Prefs,
  StandaloneDriverConfig,
} from '../schema/config.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { allocatePort } from './ports.js';
import type { PortLease } from './ports.js';
import { probePort } from './probe.js';
import { launchProcess } from './process.js';
import type { LaunchedProcess } from './process.js';
import { createTempProfile } from './profile.js';

const START_STAGE = 'driver start failed: ';

// ── Public types ─────────────────────────────────────────────

export type DriverState = 'idle' | 'starting' | 'running' | 'stopping';

export interface DriverOptions {
  logger?: Logger | undefined;
}

/** What the kind-specific half of start hands to the shared half. */
export interface LaunchPlan {
  args: string[];
  baseUrl: string;
  profileDir?: string | undefined;
}

interface ActiveDriver {
  process: LaunchedProcess;
  port: number;
  profileDir: string | undefined;
}

// ── Kind-specific launch plans ───────────────────────────────

export function basePortFor(kind: DriverKind): number {
  return kind === 'standalone' ? PORTS.STANDALONE_BASE : PORTS.EXTENSION_BASE;
}

async function ensureWritable(logPath: string): Promise<void> {
  try {
    const handle = await open(logPath, 'a', 0o664);
    await handle.close();
  } catch (err) {
    throw new ConfigError(`unable to write in log path: ${errorMessage(err)}`, { cause: err });
  }
}

export function standaloneArgs(config: StandaloneDriverConfig, port: number): string[] {
  const args = [
    `-port=${String(port)}`,
    `-log-path=${config.logPath}`,
    `-http-threads=${String(config.threads)}`,
  ];
  if (config.urlBase !== '') {
    args.push(`-url-base=${config.urlBase}`);
  }
  return args;
}

async function planStandalone(
  config: StandaloneDriverConfig,
  port: number,
): Promise<LaunchPlan> {
  await ensureWritable(config.logPath);
  return {
    args: standaloneArgs(config, port),
    baseUrl: `http://${LOOPBACK_HOST}:${String(port)}${config.urlBase}`,
  };
}

/** Defaults, then log-dir prefs, then the caller's prefs; the port always wins. */
export async function resolveExtensionPrefs(
  config: ExtensionDriverConfig,
  port: number,
): Promise<Prefs> {
  return {
    ...(config.useDefaultPrefs ? await loadDefaultPrefs() : {}),
    ...(config.logDir !== undefined ? logDirPrefs(config.logDir) : {}),
    ...config.prefs,
    [PORT_PREF]: port,
  };
}

async function planExtension(
  config: ExtensionDriverConfig,
  port: number,
  logger: Logger,
): Promise<LaunchPlan> {
  const prefs = await resolveExtensionPrefs(config, port);
  const profileDir = await createTempProfile(config.extensionPath, prefs, logger);
  return {
    args: ['-no-remote', '-profile', profileDir],
    baseUrl: `http://${LOOPBACK_HOST}:${String(port)}/hub`,
    profileDir,
  };
}

function planLaunch(config: DriverConfig, port: number, logger: Logger): Promise<LaunchPlan> {
  switch (config.kind) {
    case 'standalone':
      return planStandalone(config, port);
    case 'extension':
      return planExtension(config, port, logger);
  }
}

// ── Supervisor ───────────────────────────────────────────────

/**
 * Owns one driver process: port, optional profile, child, log file.
 * `start` and `stop` are validated against the current state; neither
 * is reentrant.
 */
export class DriverSupervisor {
  readonly config: DriverConfig;
  readonly transport: Transport;
  readonly client: WireClient;
  private readonly logger: Logger;
  private currentState: DriverState = 'idle';
  private active: ActiveDriver | undefined;

  constructor(config: DriverConfig, options: DriverOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? silentLogger).child(config.kind);
    this.transport = new Transport({ logger: this.logger.child('http') });
    this.client = new WireClient(this.transport);
  }

  get kind(): DriverKind {
    return this.config.kind;
  }

  get state(): DriverState {
    return this.currentState;
  }

  get port(): number | undefined {
    return this.active?.port;
  }

  get url(): string {
    return this.transport.url;
  }

  get profileDir(): string | undefined {
    return this.active?.profileDir;
  }

  async start(): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new StateError(`${this.kind} driver already running`);
    }
    this.currentState = 'starting';

    let lease: PortLease | undefined;
    let plan: LaunchPlan | undefined;
    let launched: LaunchedProcess | undefined;
    try {
      lease = await allocatePort({
        requested: this.config.port,
        base: basePortFor(this.kind),
        lockTimeout: this.config.lockTimeout,
        logger: this.logger,
      });
      try {
        plan = await planLaunch(this.config, lease.port, this.logger);
        launched = await launchProcess(
          {
            binaryPath: this.config.binaryPath,
            args: plan.args,
            env: this.config.env,
            logFile: this.config.logFile,
          },
          this.logger,
        );
      } catch (err) {
        throw withStage(START_STAGE, err, LaunchError);
      }

      await probePort(lease.port, {
        timeout: this.config.startTimeout,
        interval: this.config.probeInterval,
      });

      this.transport.url = plan.baseUrl;
      this.active = { process: launched, port: lease.port, profileDir: plan.profileDir };
      this.currentState = 'running';
      this.logger.info('driver ready', { url: plan.baseUrl, pid: launched.pid });
    } catch (err) {
      this.logger.error('driver start failed', { error: errorMessage(err) });
      await this.teardown(launched, plan?.profileDir);
      this.currentState = 'idle';
      throw err;
    } finally {
      await lease?.release();
    }
  }

  async stop(): Promise<void> {
    const active = this.active;
    if (this.currentState !== 'running' || active === undefined) {
      throw new StateError(`stop failed: ${this.kind} driver not running`);
    }
    this.currentState = 'stopping';

    try {
      await this.teardown(active.process, active.profileDir);
      this.logger.info('driver stopped', { port: active.port });
    } finally {
      this.active = undefined;
      this.transport.url = '';
      this.currentState = 'idle';
    }
  }

  /** Best-effort: every failure here is logged, none is thrown. */
  private async teardown(
    launched: LaunchedProcess | undefined,
    profileDir: string | undefined,
  ): Promise<void> {
    if (launched) {
      launched.interrupt();
      await launched.drain(this.config.stdioDrainTimeout);
    }
    if (profileDir !== undefined && this.shouldDeleteProfile()) {
      try {
        await rm(profileDir, { recursive: true, force: true });
      } catch (err) {
        this.logger.warn('could not delete profile', { profileDir, error: errorMessage(err) });
      }
    }
  }

  private shouldDeleteProfile(): boolean {
    return this.config.kind === 'extension' && this.config.deleteProfileOnStop;
  }
}

// ── Factory ──────────────────────────────────────────────────

/** Validate `config` (applying defaults) and build a supervisor for it. */
export function createDriver(
  config: DriverConfigInput,
  options: DriverOptions = {},
): DriverSupervisor {
  return new DriverSupervisor(driverConfigSchema.parse(config), options);
}
