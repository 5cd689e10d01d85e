import { createServer } from 'node:net';
import type { Server } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';

import { LOOPBACK_HOST, PORTS, TIMEOUTS } from '../config/defaults.js';
import { ConfigError, TimeoutError } from '../errors/index.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface PortLease {
  readonly port: number;
  /** Drops the advisory lock, if one was taken. Idempotent. */
  release(): Promise<void>;
}

export interface AllocateOptions {
  /** Fixed port, or 0 to pick one at or above `base`. */
  requested: number;
  base: number;
  lockTimeout?: number | undefined;
  retryInterval?: number | undefined;
  host?: string | undefined;
  logger?: Logger | undefined;
}

// ── Listener helpers ─────────────────────────────────────────

/** Listens on host:port, or resolves null when the port is taken. */
export function tryListen(port: number, host: string = LOOPBACK_HOST): Promise<Server | null> {
  return new Promise((resolve) => {
    const server = createServer();
    const onError = (): void => {
      server.close();
      resolve(null);
    };
    server.once('error', onError);
    server.listen({ port, host, exclusive: true }, () => {
      server.off('error', onError);
      resolve(server);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

// ── Advisory lock ────────────────────────────────────────────

/**
 * Holds a listener on `port` as a cross-process mutex. Retries every
 * `retryInterval` until acquired or `timeout` elapses.
 */
export async function acquirePortLock(
  port: number,
  options: {
    timeout: number;
    retryInterval?: number | undefined;
    host?: string | undefined;
  },
): Promise<Server> {
  const interval = options.retryInterval ?? TIMEOUTS.LOCK_RETRY_INTERVAL;
  const startedAt = Date.now();

  for (;;) {
    const server = await tryListen(port, options.host);
    if (server) return server;

    const elapsed = Date.now() - startedAt;
    if (elapsed >= options.timeout) {
      throw new TimeoutError(
        'timeout expired trying to lock mutex port',
        options.timeout,
      );
    }
    await sleep(Math.min(interval, options.timeout - elapsed));
  }
}

// ── Port scan ────────────────────────────────────────────────

/** First port at or above `base` that accepts a test listener. */
export async function findFreePort(
  base: number,
  host: string = LOOPBACK_HOST,
): Promise<number> {
  for (let port = base; port <= PORTS.MAX_PORT; port++) {
    const server = await tryListen(port, host);
    if (server) {
      await closeServer(server);
      return port;
    }
  }
  throw new ConfigError(`no free port at or above ${String(base)}`);
}

// ── Allocation ───────────────────────────────────────────────

/**
 * Resolve the port a driver will listen on.
 *
 * With `requested === 0` the lock on `base - 1` serializes concurrently
 * starting drivers: hold the lease until the child has bound its port.
 * The gap between the probe and the child's bind remains racy.
 */
export async function allocatePort(options: AllocateOptions): Promise<PortLease> {
  const logger = options.logger ?? silentLogger;

  if (options.requested !== 0) {
    return { port: options.requested, release: async () => {} };
  }

  const lockPort = options.base - 1;
  logger.debug('acquiring port lock', { lockPort });
  const lock = await acquirePortLock(lockPort, {
    timeout: options.lockTimeout ?? TIMEOUTS.LOCK_PORT_TIMEOUT,
    retryInterval: options.retryInterval,
    host: options.host,
  });

  let released = false;
  const release = async (): Promise<void> => {
    if (released) return;
    released = true;
    await closeServer(lock);
    logger.debug('port lock released', { lockPort });
  };

  try {
    const port = await findFreePort(options.base, options.host);
    logger.debug('port allocated', { port });
    return { port, release };
  } catch (err) {
    await release();
    throw err;
  }
}
