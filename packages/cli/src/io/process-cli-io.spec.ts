import { PassThrough } from 'node:stream';

import { describe, expect, it, vi } from 'vitest';

import { createProcessCliIo } from './process-cli-io.js';

const createStubProcess = (options: { exitCode?: number; terminal?: boolean } = {}) => {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  if (options.terminal === true) {
    Object.assign(stderr, { isTTY: true });
  }

  return {
    stdout,
    stderr,
    exitCode: options.exitCode,
    exit: vi.fn<(code?: number) => never>(),
    writeOut: vi.spyOn(stdout, 'write'),
    writeErr: vi.spyOn(stderr, 'write'),
  };
};

describe('createProcessCliIo', () => {
  it('writes to the process streams and exits through the process', () => {
    const stubProcess = createStubProcess();
    const io = createProcessCliIo({ process: stubProcess });

    io.writeOut('名前 |');
    io.writeErr('widefmt: failed');
    io.exit(5);

    expect(stubProcess.writeOut).toHaveBeenCalledWith('名前 |');
    expect(stubProcess.writeErr).toHaveBeenCalledWith('widefmt: failed');
    expect(stubProcess.exit).toHaveBeenCalledWith(5);
  });

  it('detects a terminal on stderr', () => {
    expect(createProcessCliIo({ process: createStubProcess() }).stderrIsTerminal).toBe(false);
    expect(
      createProcessCliIo({ process: createStubProcess({ terminal: true }) }).stderrIsTerminal,
    ).toBe(true);
  });

  it('reuses a non-zero exitCode when exiting with zero', () => {
    const stubProcess = createStubProcess({ exitCode: 3 });
    const io = createProcessCliIo({ process: stubProcess });

    io.exit(0);

    expect(stubProcess.exit).toHaveBeenCalledWith(3);
  });

  it('prefers the explicit exit code when process exitCode is zero', () => {
    const stubProcess = createStubProcess({ exitCode: 0 });
    const io = createProcessCliIo({ process: stubProcess });

    io.exit(0);

    expect(stubProcess.exit).toHaveBeenCalledWith(0);
  });
});
