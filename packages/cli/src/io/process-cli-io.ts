import process from 'node:process';

import type { CliIo } from './cli-io.js';

/** The parts of a Node.js process the CLI writes to. */
export interface CliProcess {
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  readonly exitCode?: number | string | undefined;
  exit(code?: number): never;
}

const isTerminal = (stream: NodeJS.WritableStream): boolean =>
  'isTTY' in stream && stream.isTTY === true;

export interface ProcessCliIoOptions {
  readonly process?: CliProcess;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target: CliProcess = options.process ?? process;

  return {
    writeOut: (chunk) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk) => {
      target.stderr.write(chunk);
    },
    stderrIsTerminal: isTerminal(target.stderr),
    exit: (code) => {
      const pending = target.exitCode;
      const resolvedCode = code === 0 && typeof pending === 'number' && pending !== 0 ? pending : code;
      return target.exit(resolvedCode);
    },
  };
};
