import { createConnection } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';

import { LOOPBACK_HOST, TIMEOUTS } from '../config/defaults.js';
import { TimeoutError } from '../errors/index.js';

export interface ProbeOptions {
  timeout: number;
  interval?: number | undefined;
  host?: string | undefined;
}

/** One bare TCP connect; true when something accepted it. */
export function canConnect(
  port: number,
  host: string,
  attemptTimeout: number,
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ port, host });
    socket.setTimeout(attemptTimeout);
    socket.once('connect', () => {
      socket.end();
      resolve(true);
    });
    socket.once('timeout', () => {
      socket.destroy();
      resolve(false);
    });
    socket.once('error', () => {
      socket.destroy();
      resolve(false);
    });
  });
}

/**
 * Wait until something listens on host:port.
 * Checks reachability only, not that the listener speaks the protocol.
 */
export async function probePort(port: number, options: ProbeOptions): Promise<void> {
  const host = options.host ?? LOOPBACK_HOST;
  const interval = options.interval ?? TIMEOUTS.PROBE_INTERVAL;
  const startedAt = Date.now();

  for (;;) {
    if (await canConnect(port, host, interval)) return;

    const elapsed = Date.now() - startedAt;
    if (elapsed >= options.timeout) {
      throw new TimeoutError('start failed: timeout expired', options.timeout);
    }
    await sleep(Math.min(interval, options.timeout - elapsed));
  }
}
