import type { CliIo } from '../io/cli-io.js';

export interface MemoryCliIoOptions {
  /** Pretend stderr is a terminal so the pretty logger writes. */
  readonly stderrIsTerminal?: boolean;
}

/** A {@link CliIo} that keeps everything written to it. */
export interface MemoryCliIo extends CliIo {
  readonly stdoutBuffer: string;
  readonly stderrBuffer: string;
}

export const createMemoryCliIo = (options: MemoryCliIoOptions = {}): MemoryCliIo => {
  let stdout = '';
  let stderr = '';

  return {
    writeOut: (chunk) => {
      stdout += chunk;
    },
    writeErr: (chunk) => {
      stderr += chunk;
    },
    stderrIsTerminal: options.stderrIsTerminal ?? false,
    exit: (code): never => {
      throw new Error(`exit(${code}) is not available on in-memory CLI IO`);
    },
    get stdoutBuffer(): string {
      return stdout;
    },
    get stderrBuffer(): string {
      return stderr;
    },
  };
};
