import process from 'node:process';

import { CommanderError } from 'commander';

import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createCommanderProgram } from '../framework/commander/program.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { createCliLogger } from '../logging/cli-logger.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
} from './types.js';

/**
 * Creates the commander-backed kernel that command modules register with.
 * Commander errors keep their exit code (their message is already written);
 * anything else thrown is reported on stderr with exit code 1.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });

  let globalOptions: CliGlobalOptions = createDefaultGlobalOptions();

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => globalOptions,
    getLogger: () => createCliLogger(io, globalOptions.logFormat),
  };

  program.hook('preAction', () => {
    globalOptions = readGlobalOptions(program);
  });

  const exitCodeFor = (error: unknown): number => {
    if (error instanceof CommanderError) {
      return Number.isInteger(error.exitCode) ? error.exitCode : 1;
    }
    const message = formatCliError(error, {
      programName: options.programName,
      stackTraces: globalOptions.stackTraces,
    });
    io.writeErr(message.endsWith('\n') ? message : `${message}\n`);
    return 1;
  };

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      if (argv.length === 0) {
        return exitCodeFor(new Error('Argument vector must include at least the node executable.'));
      }
      try {
        await program.parseAsync([...argv], { from: 'node' });
        return 0;
      } catch (error) {
        return exitCodeFor(error);
      }
    },
  };
};
