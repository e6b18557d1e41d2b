import { InvalidArgumentError, type Command } from 'commander';

import {
  createCollectingDiagnosticsPort,
  createFormatter,
  type FormatArgument,
} from '@widefmt/core';

import type { CliCommandModule } from '../../kernel/types.js';
import {
  createSettingsLoader,
  isConfigurationError,
  type CommandSettingsDependencies,
} from '../settings/command-settings.js';
import { parseValueLiteral, ValueLiteralError } from './value-literals.js';

/** Exit code for `--strict` runs whose output contains diagnostics. */
export const STRICT_FAILURE_EXIT_CODE = 2;

interface PrintfCommandOptions {
  readonly config?: string;
  readonly strict?: boolean;
  readonly newline?: boolean;
  readonly ambiguousWide?: boolean;
  readonly maxDepth?: number;
  readonly strings?: boolean;
}

export type PrintfCommandDependencies = CommandSettingsDependencies;

export const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const parseArguments = (values: readonly string[], asStrings: boolean): FormatArgument[] =>
  asStrings ? [...values] : values.map((value) => parseValueLiteral(value));

const isUsageError = (error: unknown): error is Error =>
  error instanceof ValueLiteralError || isConfigurationError(error);

/**
 * Builds the `printf` command. Configuration loading is injectable so tests
 * can run without touching the file system.
 */
export const createPrintfCommandModule = (
  dependencies: PrintfCommandDependencies = {},
): CliCommandModule => {
  const loadSettings = createSettingsLoader(dependencies);

  return {
    id: 'printf',
    register(program, context) {
      program
        .command('printf')
        .summary('Format values with a printf template.')
        .description(
          'Format values with a printf template, padding by display columns. ' +
            'Values are parsed as literals (nil, true, 42, 0x2a, 1.5, NaN, \'c\', type:literal); ' +
            'put "--" before values that start with "-".',
        )
        .argument('<template>', 'Format template.')
        .argument('[values...]', 'Values consumed by the template.')
        .option('-c, --config <path>', 'Read formatter settings from this file.')
        .option('--strict', 'Exit with code 2 when the output contains diagnostics.', false)
        .option('-n, --no-newline', 'Do not print a trailing newline.')
        .option('--ambiguous-wide', 'Count East Asian ambiguous characters as two columns.')
        .option('--max-depth <n>', 'Deepest list nesting to render.', parsePositiveInteger)
        .option('--strings', 'Treat every value as a string.', false)
        .action(
          async (
            template: string,
            values: string[],
            options: PrintfCommandOptions,
            command: Command,
          ) => {
            try {
              const settings = await loadSettings(options);
              const args = parseArguments(values, options.strings === true);
              const diagnostics = createCollectingDiagnosticsPort();
              const formatter = createFormatter({
                ...settings,
                logger: context.getLogger(),
                diagnostics,
              });

              const output = formatter.format(template, args);
              context.io.writeOut(options.newline === false ? output : `${output}\n`);

              if (options.strict === true && diagnostics.events.length > 0) {
                const codes = [...new Set(diagnostics.events.map((event) => event.code))];
                command.error(`Formatting produced diagnostics: ${codes.join(', ')}`, {
                  exitCode: STRICT_FAILURE_EXIT_CODE,
                  code: 'widefmt.strict',
                });
              }
            } catch (error) {
              if (isUsageError(error)) {
                command.error(error.message);
              }
              throw error;
            }
          },
        );
    },
  };
};

export const printfCommandModule = createPrintfCommandModule();
