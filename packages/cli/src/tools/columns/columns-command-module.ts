import type { Command } from 'commander';

import { stringColumns } from '@widefmt/core';

import type { CliCommandModule } from '../../kernel/types.js';
import {
  createSettingsLoader,
  isConfigurationError,
  type CommandSettingsDependencies,
} from '../settings/command-settings.js';

interface ColumnsCommandOptions {
  readonly config?: string;
  readonly ambiguousWide?: boolean;
}

/**
 * Builds the `columns` command, which prints `<columns>\t<text>` per
 * argument using the same settings as `printf`.
 */
export const createColumnsCommandModule = (
  dependencies: CommandSettingsDependencies = {},
): CliCommandModule => {
  const loadSettings = createSettingsLoader(dependencies);

  return {
    id: 'columns',
    register(program, context) {
      program
        .command('columns')
        .summary('Print the display width of text.')
        .argument('<text...>', 'Text to measure.')
        .option('-c, --config <path>', 'Read formatter settings from this file.')
        .option('--ambiguous-wide', 'Count East Asian ambiguous characters as two columns.')
        .action(async (texts: string[], options: ColumnsCommandOptions, command: Command) => {
          try {
            const { ambiguousWidth } = await loadSettings(options);
            for (const text of texts) {
              context.io.writeOut(`${stringColumns(text, { ambiguousWidth })}\t${text}\n`);
            }
          } catch (error) {
            if (isConfigurationError(error)) {
              command.error(error.message);
            }
            throw error;
          }
        });
    },
  };
};

export const columnsCommandModule = createColumnsCommandModule();
