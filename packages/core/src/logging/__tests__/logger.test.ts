/**
 * Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { Logger, parseLogLevel } from '../logger.js';

function capture(level?: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR') {
  const lines: string[] = [];
  const log = new Logger({ level, sink: (line) => lines.push(line) });
  return { log, lines, entries: () => lines.map((l) => JSON.parse(l) as Record<string, unknown>) };
}

describe('parseLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel('ERROR')).toBe('ERROR');
    expect(parseLogLevel('warning')).toBe('WARN');
  });

  it('should fall back to INFO', () => {
    expect(parseLogLevel(undefined)).toBe('INFO');
    expect(parseLogLevel('verbose')).toBe('INFO');
  });
});

describe('Logger', () => {
  it('should write one JSON line per entry', () => {
    const { log, entries } = capture('INFO');

    log.info('Build started', { sources: 2 });

    const [entry] = entries();
    expect(entry?.level).toBe('INFO');
    expect(entry?.message).toBe('Build started');
    expect(entry?.sources).toBe(2);
    expect(typeof entry?.timestamp).toBe('string');
  });

  it('should drop entries below the threshold', () => {
    const { log, lines } = capture('WARN');

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(lines).toHaveLength(1);
  });

  it('should include error message and bound context', () => {
    const { log, entries } = capture('DEBUG');

    log.child({ buildId: 'b-1' }).error('Sync failed', new Error('clone refused'), {
      location: '/tmp/repo',
    });

    const [entry] = entries();
    expect(entry?.buildId).toBe('b-1');
    expect(entry?.error).toBe('clone refused');
    expect(entry?.location).toBe('/tmp/repo');
  });
});
