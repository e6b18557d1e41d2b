import type { Command } from 'commander';

import type { StructuredLogger } from '@widefmt/core';

import type { CliIo } from '../io/cli-io.js';

export type CliLogFormat = 'pretty' | 'json';

/** Options given before the command name, shared by every command. */
export interface CliGlobalOptions {
  readonly logFormat: CliLogFormat;
  readonly stackTraces: boolean;
}

export interface CliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

/** What a command sees of the kernel while it registers and runs. */
export interface CliKernelContext {
  readonly io: CliIo;
  readonly getGlobalOptions: () => CliGlobalOptions;
  /** Logger matching the global log options of the current invocation. */
  readonly getLogger: () => StructuredLogger;
}

/** A command the kernel mounts on its commander program. */
export interface CliCommandModule {
  readonly id: string;
  register(program: Command, context: CliKernelContext): void;
}

export interface CliKernel {
  register(module: CliCommandModule): CliKernel;
  /** Parses `argv` and resolves to the exit code; never rejects. */
  run(argv?: readonly string[]): Promise<number>;
}
