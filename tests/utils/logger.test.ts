import { describe, expect, it } from 'vitest';

import { createLogger, formatFields, parseLogLevel } from '../../src/utils/logger.js';
import type { LoggerOptions } from '../../src/utils/logger.js';

function capture(base: LoggerOptions): { lines: string[]; options: LoggerOptions } {
  const lines: string[] = [];
  return {
    lines,
    options: {
      ...base,
      write: (line) => {
        lines.push(line);
      },
    },
  };
}

describe('formatFields', () => {
  it('renders key=value pairs in order, quoting where needed', () => {
    expect(formatFields({ port: 9515, path: '/tmp/a b', url: 'http://127.0.0.1:9515/hub' })).toBe(
      ' port=9515 path="/tmp/a b" url=http://127.0.0.1:9515/hub',
    );
  });

  it('skips undefined values and renders errors by message', () => {
    expect(formatFields({ pid: undefined, error: new Error('boom') })).toBe(' error="boom"');
    expect(formatFields(undefined)).toBe('');
  });
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const { lines, options } = capture({ level: 'warn' });
    const logger = createLogger(options);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines).toHaveLength(2);
    expect(lines[0]?.endsWith('shown')).toBe(true);
  });

  it('nests child scopes', () => {
    const { lines, options } = capture({ level: 'debug', scope: 'wiredriver' });
    const logger = createLogger(options).child('standalone').child('http');

    logger.debug('>> GET /status', { attempt: 1 });

    expect(lines[0]).toContain('[wiredriver:standalone:http] >> GET /status attempt=1');
  });

  it('writes nothing when silent', () => {
    const { lines, options } = capture({ level: 'silent' });

    createLogger(options).error('never');

    expect(lines).toEqual([]);
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively and falls back to info', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
