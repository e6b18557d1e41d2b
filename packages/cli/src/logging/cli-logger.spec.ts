import { describe, expect, it, vi } from 'vitest';

import { createMemoryCliIo } from '../testing/memory-cli-io.js';
import { createCliLogger, PrettyLineLogger } from './cli-logger.js';

const diagnosticsEntry = {
  level: 'warn',
  name: 'widefmt',
  event: 'format.diagnostics',
  data: { template: '%d', codes: ['EXTRA'] },
} as const;

describe('PrettyLineLogger', () => {
  it('writes the entry as one line of key=value fields', () => {
    const write = vi.fn();

    new PrettyLineLogger(write).log({ ...diagnosticsEntry, elapsedMs: 3 });

    expect(write).toHaveBeenCalledWith(
      'warn widefmt format.diagnostics template="%d" codes=["EXTRA"] elapsedMs=3\n',
    );
  });

  it('omits the field list when there is no data', () => {
    const write = vi.fn();

    new PrettyLineLogger(write).log({ level: 'info', name: 'widefmt', event: 'started' });

    expect(write).toHaveBeenCalledWith('info widefmt started\n');
  });
});

describe('createCliLogger', () => {
  it('writes JSON lines to stderr in json mode', () => {
    const io = createMemoryCliIo();

    createCliLogger(io, 'json').log(diagnosticsEntry);

    const [line] = io.stderrBuffer.split('\n');
    expect(JSON.parse(line ?? '')).toMatchObject(diagnosticsEntry);
  });

  it('stays silent in pretty mode when stderr is not a terminal', () => {
    const io = createMemoryCliIo();

    createCliLogger(io, 'pretty').log(diagnosticsEntry);

    expect(io.stderrBuffer).toBe('');
  });

  it('writes warnings to a terminal in pretty mode', () => {
    const io = createMemoryCliIo({ stderrIsTerminal: true });
    const logger = createCliLogger(io, 'pretty');

    logger.log({ level: 'info', name: 'widefmt', event: 'dropped' });
    logger.log(diagnosticsEntry);

    expect(io.stderrBuffer).toBe('warn widefmt format.diagnostics template="%d" codes=["EXTRA"]\n');
  });
});
