import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLevelFilter, JsonLineLogger, noopLogger } from './structured-logger.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('JsonLineLogger', () => {
  it('serialises log entries as newline-delimited JSON', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    const write = vi.fn();
    const logger = new JsonLineLogger({ write });

    const entry = {
      level: 'warn',
      name: 'widefmt',
      event: 'format.diagnostics',
      data: { codes: ['EXTRA'] },
    } as const;

    logger.log(entry);

    expect(write).toHaveBeenCalledWith(
      `${JSON.stringify({
        ...entry,
        timestamp: '2024-01-01T00:00:00.000Z',
      })}\n`,
    );
  });
});

describe('noopLogger', () => {
  it('ignores log entries', () => {
    const logger = noopLogger;
    expect(() => logger.log({ level: 'debug', name: 'noop', event: 'ignored' })).not.toThrow();
  });
});

describe('createLevelFilter', () => {
  it('passes entries at or above the minimum level', () => {
    const log = vi.fn();
    const logger = createLevelFilter({ log }, 'warn');

    logger.log({ level: 'info', name: 'widefmt', event: 'dropped' });
    logger.log({ level: 'warn', name: 'widefmt', event: 'kept' });
    logger.log({ level: 'error', name: 'widefmt', event: 'also-kept' });

    expect(log.mock.calls.map(([entry]) => entry.event)).toEqual(['kept', 'also-kept']);
  });
});
