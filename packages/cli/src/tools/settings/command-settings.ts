import process from 'node:process';

import {
  ConfigNotFoundError,
  FormatterConfigError,
  loadFormatterConfig,
  type FormatterSettings,
  type LoadedFormatterConfig,
} from '@widefmt/core';

export interface LoadConfigRequest {
  readonly cwd: string;
  readonly configPath?: string;
}

/**
 * How commands find formatter settings. Both members are injectable so
 * tests can run without touching the file system.
 */
export interface CommandSettingsDependencies {
  readonly loadConfig?: (request: LoadConfigRequest) => Promise<LoadedFormatterConfig>;
  readonly cwd?: () => string;
}

export interface SettingsOverrides {
  readonly config?: string;
  readonly ambiguousWide?: boolean;
  readonly maxDepth?: number;
}

export type SettingsLoader = (overrides: SettingsOverrides) => Promise<FormatterSettings>;

/**
 * Loads `widefmt.config.*` (or the `--config` file) and applies the
 * command line overrides on top of it.
 */
export const createSettingsLoader = (
  dependencies: CommandSettingsDependencies = {},
): SettingsLoader => {
  const loadConfig =
    dependencies.loadConfig ?? ((request: LoadConfigRequest) => loadFormatterConfig(request));
  const cwd = dependencies.cwd ?? (() => process.cwd());

  return async (overrides) => {
    const { settings } = await loadConfig({
      cwd: cwd(),
      ...(overrides.config === undefined ? {} : { configPath: overrides.config }),
    });
    return {
      ambiguousWidth: overrides.ambiguousWide === true ? 2 : settings.ambiguousWidth,
      maxDepth: overrides.maxDepth ?? settings.maxDepth,
    };
  };
};

/** Configuration problems the user can fix; reported as usage errors. */
export const isConfigurationError = (
  error: unknown,
): error is ConfigNotFoundError | FormatterConfigError =>
  error instanceof ConfigNotFoundError || error instanceof FormatterConfigError;
