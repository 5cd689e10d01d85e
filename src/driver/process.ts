import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import type { WriteStream } from 'node:fs';
import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { setTimeout as sleep } from 'node:timers/promises';

import { LaunchError, errorMessage } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface LaunchSpec {
  binaryPath: string;
  args: readonly string[];
  env: Readonly<Record<string, string>>;
  /** Truncated and receives both stdio streams; omitted → parent streams. */
  logFile?: string | undefined;
}

export interface LaunchedProcess {
  readonly child: ChildProcess;
  readonly pid: number | undefined;
  /** Sends SIGINT. Failure is logged, not thrown. */
  interrupt(): void;
  /**
   * Waits for both stdio copies to finish (bounded by `timeoutMs`), then
   * closes the log file. Returns false when the copies did not finish.
   */
  drain(timeoutMs: number): Promise<boolean>;
}

// ── Log sink ─────────────────────────────────────────────────

async function openLogFile(logFile: string): Promise<WriteStream> {
  const stream = createWriteStream(logFile, { flags: 'w', mode: 0o640 });
  await once(stream, 'open');
  return stream;
}

function closeLogFile(stream: WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.once('error', reject);
    stream.end(() => resolve());
  });
}

// ── Stdio pumps ──────────────────────────────────────────────

/** Copies `source` into `sink` without ending the sink; settles when the source ends. */
function pump(source: Readable, sink: Writable, name: string, logger: Logger): Promise<void> {
  source.pipe(sink, { end: false });
  return finished(source).catch((err: unknown) => {
    logger.debug('stdio copy ended with error', { stream: name, error: errorMessage(err) });
  });
}

// ── Launch ───────────────────────────────────────────────────

/**
 * Spawn the driver binary with stdout/stderr piped either into a log file
 * or to the parent's own streams. Resolves once the OS reports the spawn.
 */
export async function launchProcess(spec: LaunchSpec, logger: Logger): Promise<LaunchedProcess> {
  const logStream = spec.logFile !== undefined ? await openLogFile(spec.logFile) : undefined;

  const child = spawn(spec.binaryPath, [...spec.args], {
    env: { ...process.env, ...spec.env },
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  try {
    await once(child, 'spawn');
  } catch (err) {
    if (logStream) await closeLogFile(logStream);
    throw new LaunchError(`unable to start ${spec.binaryPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  // Late errors (e.g. a failed kill) must not crash the parent.
  child.on('error', (err) => {
    logger.warn('driver process error', { error: err.message });
  });

  const pumps: Promise<void>[] = [];
  if (child.stdout) {
    pumps.push(pump(child.stdout, logStream ?? process.stdout, 'stdout', logger));
  }
  if (child.stderr) {
    pumps.push(pump(child.stderr, logStream ?? process.stderr, 'stderr', logger));
  }

  logger.debug('driver process spawned', { pid: child.pid, args: spec.args.join(' ') });

  return {
    child,
    pid: child.pid,

    interrupt(): void {
      try {
        if (!child.kill('SIGINT')) {
          logger.warn('could not signal driver process', { pid: child.pid });
        }
      } catch (err) {
        logger.warn('could not signal driver process', { pid: child.pid, error: errorMessage(err) });
      }
    },

    async drain(timeoutMs: number): Promise<boolean> {
      const copies = Promise.all(pumps).then(() => true);
      const deadline = sleep(timeoutMs, false, { ref: false });
      const drained = await Promise.race([copies, deadline]);
      if (!drained) {
        logger.warn('driver output not fully drained', { timeoutMs });
        if (logStream) {
          child.stdout?.unpipe(logStream);
          child.stderr?.unpipe(logStream);
        }
      }

      if (logStream) {
        try {
          await closeLogFile(logStream);
        } catch (err) {
          logger.warn('could not close driver log file', { error: errorMessage(err) });
        }
      }
      return drained;
    },
  };
}
