import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

import {
  DEFAULT_FORMATTER_SETTINGS,
  describeSettingsIssues,
  formatterSettingsSchema,
  type FormatterSettings,
} from './formatter-settings.js';

export {
  DEFAULT_FORMATTER_SETTINGS,
  describeSettingsIssues,
  formatterSettingsSchema,
  type FormatterSettings,
  type FormatterSettingsInput,
} from './formatter-settings.js';

export const DEFAULT_WIDEFMT_CONFIG_FILES = Object.freeze([
  'widefmt.config.mjs',
  'widefmt.config.js',
  'widefmt.config.cjs',
  'widefmt.config.json',
] as const);

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule {
  readonly path: string;
  readonly directory: string;
  readonly config: unknown;
}

export interface LoadedFormatterConfig {
  /** Configuration file the settings came from; `undefined` when defaults were used. */
  readonly path: string | undefined;
  readonly settings: FormatterSettings;
}

/** A configuration file exists but its contents are not valid formatter settings. */
export class FormatterConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid widefmt configuration in ${configPath}: ${issues.join('; ')}`);
    this.name = 'FormatterConfigError';
  }
}

/** An explicitly named configuration file does not exist. */
export class ConfigNotFoundError extends Error {
  constructor(
    readonly configPath: string,
    message = `Configuration file not found: ${configPath}`,
  ) {
    super(message);
    this.name = 'ConfigNotFoundError';
  }
}

const MODULE_NAME = 'widefmt';

const moduleLoader: Loader = async (filepath: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!importedModule || typeof importedModule !== 'object') {
    return importedModule;
  }
  if ('default' in importedModule) {
    return importedModule.default;
  }
  if ('config' in importedModule) {
    return importedModule.config;
  }
  return importedModule;
};

function createExplorer(searchPlaces: readonly string[]) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    searchStrategy: 'none',
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) => (result ? transformResult(result) : result),
  });
}

/**
 * Looks for a configuration file without failing when there is none.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The configuration path, or `undefined` when the working directory has none.
 * @throws {ConfigNotFoundError} When an explicit `configPath` does not exist.
 */
export async function findConfigPath(
  options: ResolveConfigPathOptions = {},
): Promise<string | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const explorer = createExplorer(options.candidates ?? DEFAULT_WIDEFMT_CONFIG_FILES);

  if (options.configPath) {
    const resolvedPath = path.resolve(cwd, options.configPath);
    try {
      const loaded = await explorer.load(resolvedPath);
      if (!loaded || loaded.isEmpty) {
        throw new ConfigNotFoundError(options.configPath);
      }
      return loaded.filepath;
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ConfigNotFoundError(options.configPath);
      }
      throw error;
    }
  }

  const result = await explorer.search(cwd);
  return result && !result.isEmpty ? result.filepath : undefined;
}

/**
 * Determines the absolute path to a widefmt configuration file.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The resolved configuration path.
 * @throws {Error} When the configuration cannot be found in the provided locations.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const found = await findConfigPath(options);
  if (found === undefined) {
    throw new Error('Unable to locate widefmt configuration file in the current directory.');
  }
  return found;
}

/**
 * Loads a configuration module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded configuration metadata and the resolved configuration value.
 */
export async function loadConfigModule(options: LoadConfigModuleOptions): Promise<LoadedConfigModule> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_WIDEFMT_CONFIG_FILES);

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new ConfigNotFoundError(
        resolvedPath,
        `Configuration file not found at ${resolvedPath}`,
      );
    }
    const config: unknown = result.config;
    return {
      path: result.filepath,
      directory: path.dirname(result.filepath),
      config,
    } satisfies LoadedConfigModule;
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigNotFoundError(
        resolvedPath,
        `Configuration file not found at ${resolvedPath}`,
      );
    }
    throw error;
  }
}

/**
 * Resolves formatter settings from the working directory's configuration
 * file, or from an explicit path. A missing file in the working directory
 * yields the defaults; a missing explicit file is an error.
 *
 * @param options - Working directory and optional explicit path.
 * @returns The settings and the file they came from.
 * @throws {FormatterConfigError} When the file's contents fail validation.
 */
export async function loadFormatterConfig(
  options: Omit<ResolveConfigPathOptions, 'candidates'> = {},
): Promise<LoadedFormatterConfig> {
  const configPath = await findConfigPath(options);
  if (configPath === undefined) {
    return { path: undefined, settings: DEFAULT_FORMATTER_SETTINGS };
  }
  const loaded = await loadConfigModule({ path: configPath });
  const parsed = formatterSettingsSchema.safeParse(loaded.config);
  if (!parsed.success) {
    throw new FormatterConfigError(loaded.path, describeSettingsIssues(parsed.error));
  }
  return { path: loaded.path, settings: parsed.data };
}

async function transformResult(
  result: Exclude<CosmiconfigResult, null>,
): Promise<Exclude<CosmiconfigResult, null>> {
  const resolvedConfig = await resolveExportedValue(result.config);
  return { ...result, config: resolvedConfig };
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value = candidate;

  for (;;) {
    if (typeof value === 'function') {
      value = value();
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
