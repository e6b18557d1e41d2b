import { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import { registerGlobalOptions } from './global-options.js';

export interface CommanderProgramOptions {
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io: CliIo;
}

const examples = (name: string): string =>
  [
    '',
    'Examples:',
    `  $ ${name} printf '%-6s|%5.2f' 名前 3.14159`,
    `  $ ${name} printf --strict '%[2]d %[1]d' 1 2`,
    `  $ ${name} columns 日本語 abc`,
  ].join('\n');

/**
 * The root commander program. It writes through `io`, throws instead of
 * exiting, and leaves options after a command name to that command.
 */
export const createCommanderProgram = (options: CommanderProgramOptions): Command => {
  const { io } = options;
  const program = new Command(options.name);

  program
    .description(options.description ?? '')
    .version(options.version)
    .usage('[global options] <command> [arguments...]')
    .configureHelp({ sortSubcommands: true, sortOptions: true })
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    })
    .enablePositionalOptions()
    .showHelpAfterError(`(run "${options.name} <command> --help" for usage)`)
    .addHelpText('after', examples(options.name))
    .exitOverride();

  registerGlobalOptions(program);
  return program;
};
