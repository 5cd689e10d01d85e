import type { Server } from 'node:net';

import { afterEach, describe, expect, it } from 'vitest';

import { closeServer, tryListen } from '../../src/driver/ports.js';
import { canConnect, probePort } from '../../src/driver/probe.js';
import { TimeoutError } from '../../src/errors/index.js';
import { ephemeralPort } from '../helpers/ports.js';

let listener: Server | null = null;

const INTERVAL = 50;
// Scheduling jitter allowed on top of one poll interval.
const SLACK = 250;

afterEach(async () => {
  if (listener) await closeServer(listener);
  listener = null;
});

describe('canConnect', () => {
  it('is true for a listening port and false otherwise', async () => {
    const port = await ephemeralPort();
    expect(await canConnect(port, '127.0.0.1', 500)).toBe(false);

    listener = await tryListen(port);
    expect(await canConnect(port, '127.0.0.1', 500)).toBe(true);
  });
});

describe('probePort', () => {
  it('times out when nothing ever listens', async () => {
    const port = await ephemeralPort();
    const startedAt = Date.now();

    const err: unknown = await probePort(port, { timeout: 300, interval: INTERVAL }).catch(
      (e: unknown) => e,
    );
    const elapsed = Date.now() - startedAt;

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toHaveProperty('message', 'start failed: timeout expired');
    expect(elapsed).toBeGreaterThanOrEqual(300);
    expect(elapsed).toBeLessThan(300 + INTERVAL + SLACK);
  });

  it('resolves within one interval of a listener appearing', async () => {
    const port = await ephemeralPort();
    let appearedAt = Number.POSITIVE_INFINITY;
    setTimeout(() => {
      void tryListen(port).then((server) => {
        appearedAt = Date.now();
        listener = server;
      });
    }, 150);

    await probePort(port, { timeout: 5_000, interval: INTERVAL });
    const resolvedAt = Date.now();

    expect(listener).not.toBeNull();
    expect(resolvedAt - appearedAt).toBeLessThan(INTERVAL + SLACK);
  });
});
