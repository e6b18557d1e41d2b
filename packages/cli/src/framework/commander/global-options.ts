import type { Command } from 'commander';

import type { CliGlobalOptions } from '../../kernel/types.js';

interface CommanderGlobalOptions {
  readonly jsonLogs?: boolean;
  readonly stackTraces?: boolean;
}

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: 'pretty',
  stackTraces: false,
});

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', 'Emit machine-readable JSON logs on stderr.', false)
    .option('--stack-traces', 'Print stack traces for unexpected errors.', false);
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.optsWithGlobals<CommanderGlobalOptions>();

  return {
    logFormat: options.jsonLogs === true ? 'json' : 'pretty',
    stackTraces: options.stackTraces === true,
  };
};
