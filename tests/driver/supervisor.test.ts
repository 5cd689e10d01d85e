import { access, chmod, mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { PORT_PREF } from '../../src/config/prefs.js';
import {
  DriverSupervisor,
  createDriver,
  resolveExtensionPrefs,
  standaloneArgs,
} from '../../src/driver/supervisor.js';
import type { DriverOptions } from '../../src/driver/supervisor.js';
import { ConfigError, LaunchError, StateError, TimeoutError } from '../../src/errors/index.js';
import { createLogger } from '../../src/utils/logger.js';
import { driverConfigSchema, extensionDriverConfigSchema, standaloneDriverConfigSchema } from '../../src/schema/config.js';
import { ephemeralPort } from '../helpers/ports.js';
import { TEST_EXTENSION_ID, extensionEntries, writeZip } from '../helpers/zip.js';

const FAKE_DRIVER = fileURLToPath(new URL('../fixtures/fake-driver.mjs', import.meta.url));

let workDir: string;
const running: DriverSupervisor[] = [];

function track(driver: DriverSupervisor): DriverSupervisor {
  running.push(driver);
  return driver;
}

beforeAll(async () => {
  await chmod(FAKE_DRIVER, 0o755);
});

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), 'supervisor-test-'));
});

afterEach(async () => {
  for (const driver of running.splice(0)) {
    if (driver.state === 'running') await driver.stop();
  }
  await rm(workDir, { recursive: true, force: true });
});

describe('launch arguments', () => {
  it('passes port, log path and thread count to a standalone driver', () => {
    const config = standaloneDriverConfigSchema.parse({
      kind: 'standalone',
      binaryPath: '/opt/driver',
      logPath: '/tmp/d.log',
    });

    expect(standaloneArgs(config, 9515)).toEqual(['-port=9515', '-log-path=/tmp/d.log', '-http-threads=4']);
    expect(standaloneArgs({ ...config, urlBase: '/wd/hub' }, 9515)).toContain('-url-base=/wd/hub');
  });

  it('layers preferences with the port on top', async () => {
    const config = extensionDriverConfigSchema.parse({
      kind: 'extension',
      binaryPath: '/opt/browser',
      extensionPath: '/opt/driver.xpi',
      prefs: { [PORT_PREF]: 1, 'browser.startup.homepage': 'http://example.test/' },
      logDir: '/var/log/wd',
    });

    const prefs = await resolveExtensionPrefs(config, 7056);

    expect(prefs[PORT_PREF]).toBe(7056);
    expect(prefs['browser.startup.homepage']).toBe('http://example.test/');
    expect(prefs['webdriver.log.driver.file']).toBe(path.join('/var/log/wd', 'driver.log'));
    expect(prefs['app.update.enabled']).toBe(false);
  });

  it('leaves the defaults out when asked to', async () => {
    const config = extensionDriverConfigSchema.parse({
      kind: 'extension',
      binaryPath: '/opt/browser',
      extensionPath: '/opt/driver.xpi',
      useDefaultPrefs: false,
    });

    expect(await resolveExtensionPrefs(config, 7055)).toEqual({ [PORT_PREF]: 7055 });
  });
});

describe('standalone driver', () => {
  async function standalone(
    overrides: Record<string, unknown> = {},
    options: DriverOptions = {},
  ): Promise<DriverSupervisor> {
    return track(
      new DriverSupervisor(
        driverConfigSchema.parse({
          kind: 'standalone',
          binaryPath: FAKE_DRIVER,
          port: await ephemeralPort(),
          logPath: path.join(workDir, 'driver.log'),
          logFile: path.join(workDir, 'stdio.log'),
          probeInterval: 50,
          startTimeout: 5_000,
          ...overrides,
        }),
        options,
      ),
    );
  }

  it('refuses to stop before it was started', async () => {
    const driver = await standalone();

    await expect(driver.stop()).rejects.toThrow(
      new StateError('stop failed: standalone driver not running'),
    );
    expect(driver.state).toBe('idle');
  });

  it('starts, answers commands, and stops', async () => {
    const driver = await standalone();

    await driver.start();

    expect(driver.state).toBe('running');
    expect(driver.url).toBe(`http://127.0.0.1:${String(driver.port)}`);
    const status = await driver.client.status();
    expect(status.build?.version).toBe('fake-1.0');

    await driver.stop();

    expect(driver.state).toBe('idle');
    expect(driver.url).toBe('');
    expect(driver.port).toBeUndefined();
    const log = await readFile(path.join(workDir, 'stdio.log'), 'utf-8');
    expect(log).toContain('fake driver stderr line\n');
    expect(log).toContain('fake driver stopping\n');
  });

  it('logs an undrained child at warn and still stops', async () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'warn',
      write: (line) => {
        lines.push(line);
      },
    });
    const driver = await standalone(
      { stdioDrainTimeout: 50, env: { FAKE_DRIVER_LINGER_MS: '1000' } },
      { logger },
    );
    await driver.start();

    await driver.stop();

    expect(driver.state).toBe('idle');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[standalone] driver output not fully drained timeoutMs=50');
  });

  it('rejects a second start while running', async () => {
    const driver = await standalone();
    await driver.start();

    await expect(driver.start()).rejects.toThrow(new StateError('standalone driver already running'));
    expect(driver.state).toBe('running');
  });

  it('can be started again after a stop', async () => {
    const driver = await standalone();
    await driver.start();
    await driver.stop();

    await driver.start();

    expect(driver.state).toBe('running');
  });

  it('serves commands under the url base', async () => {
    const driver = await standalone({ urlBase: '/wd/hub' });
    await driver.start();

    expect(driver.url.endsWith('/wd/hub')).toBe(true);
    expect((await driver.client.status()).os?.name).toBe('test');
  });

  it('times out when the driver never listens', async () => {
    const driver = await standalone({ startTimeout: 300, env: { FAKE_DRIVER_NO_LISTEN: '1' } });

    await expect(driver.start()).rejects.toThrow(TimeoutError);
    expect(driver.state).toBe('idle');
    expect(driver.url).toBe('');
  });

  it('reports a binary that cannot be spawned', async () => {
    const driver = await standalone({ binaryPath: path.join(workDir, 'no-such-driver') });

    const err: unknown = await driver.start().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LaunchError);
    expect(err).toHaveProperty('message', expect.stringMatching(/^driver start failed: unable to start /));
    expect(driver.state).toBe('idle');
  });

  it('reports an unwritable log path as a config error', async () => {
    const driver = await standalone({ logPath: path.join(workDir, 'missing', 'driver.log') });

    const err: unknown = await driver.start().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty(
      'message',
      expect.stringMatching(/^driver start failed: unable to write in log path: /),
    );
  });
});

describe('extension driver', () => {
  it('builds a profile, serves under /hub, and removes the profile on stop', async () => {
    const archive = path.join(workDir, 'driver.xpi');
    await writeZip(archive, extensionEntries());
    const driver = track(
      createDriver({
        kind: 'extension',
        binaryPath: FAKE_DRIVER,
        extensionPath: archive,
        prefs: { 'custom.flag': true },
        logFile: path.join(workDir, 'browser.log'),
        probeInterval: 50,
        startTimeout: 5_000,
      }),
    );

    await driver.start();

    const port = driver.port ?? 0;
    const profileDir = driver.profileDir ?? '';
    expect(port).toBeGreaterThanOrEqual(7055);
    expect(driver.url).toBe(`http://127.0.0.1:${String(port)}/hub`);
    const userJs = await readFile(path.join(profileDir, 'user.js'), 'utf-8');
    expect(userJs).toContain(`user_pref("${PORT_PREF}", ${String(port)});\n`);
    expect(userJs).toContain('user_pref("custom.flag", true);\n');
    await expect(
      access(path.join(profileDir, 'extensions', TEST_EXTENSION_ID, 'install.rdf')),
    ).resolves.toBeUndefined();
    expect((await driver.client.status()).build?.version).toBe('fake-1.0');

    await driver.stop();

    await expect(access(profileDir)).rejects.toThrow();
    expect(driver.profileDir).toBeUndefined();
  });

  it('keeps the profile when configured to', async () => {
    const archive = path.join(workDir, 'driver.xpi');
    await writeZip(archive, extensionEntries());
    const driver = track(
      createDriver({
        kind: 'extension',
        binaryPath: FAKE_DRIVER,
        extensionPath: archive,
        port: await ephemeralPort(),
        deleteProfileOnStop: false,
        useDefaultPrefs: false,
        logFile: path.join(workDir, 'browser.log'),
        probeInterval: 50,
      }),
    );
    await driver.start();
    const profileDir = driver.profileDir ?? '';

    await driver.stop();

    await expect(access(path.join(profileDir, 'user.js'))).resolves.toBeUndefined();
    await rm(profileDir, { recursive: true, force: true });
  });

  it('fails before launching when the extension has no id', async () => {
    const archive = path.join(workDir, 'anonymous.xpi');
    await writeZip(archive, [{ name: 'readme.txt', content: 'hello' }]);
    const driver = track(
      createDriver({
        kind: 'extension',
        binaryPath: FAKE_DRIVER,
        extensionPath: archive,
        port: await ephemeralPort(),
      }),
    );

    await expect(driver.start()).rejects.toThrow(ConfigError);
    expect(driver.state).toBe('idle');
  });
});
