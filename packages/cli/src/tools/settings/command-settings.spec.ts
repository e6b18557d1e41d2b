import {
  ConfigNotFoundError,
  DEFAULT_FORMATTER_SETTINGS,
  FormatterConfigError,
  type LoadedFormatterConfig,
} from '@widefmt/core';
import { describe, expect, it, vi } from 'vitest';

import { createSettingsLoader, isConfigurationError } from './command-settings.js';

const configured: LoadedFormatterConfig = {
  path: '/work/widefmt.config.json',
  settings: { ambiguousWidth: 2, maxDepth: 4 },
};

describe('createSettingsLoader', () => {
  it('returns the configured settings when nothing is overridden', async () => {
    const loadConfig = vi.fn(async () => configured);
    const loadSettings = createSettingsLoader({ loadConfig, cwd: () => '/work' });

    await expect(loadSettings({})).resolves.toEqual({ ambiguousWidth: 2, maxDepth: 4 });
    expect(loadConfig).toHaveBeenCalledWith({ cwd: '/work' });
  });

  it('lets command line options override the file', async () => {
    const loadConfig = vi.fn(async () => ({ path: undefined, settings: DEFAULT_FORMATTER_SETTINGS }));
    const loadSettings = createSettingsLoader({ loadConfig, cwd: () => '/work' });

    await expect(
      loadSettings({ config: 'alt.json', ambiguousWide: true, maxDepth: 7 }),
    ).resolves.toEqual({ ambiguousWidth: 2, maxDepth: 7 });
    expect(loadConfig).toHaveBeenCalledWith({ cwd: '/work', configPath: 'alt.json' });
  });
});

describe('isConfigurationError', () => {
  it('accepts missing and invalid configuration files only', () => {
    expect(isConfigurationError(new ConfigNotFoundError('a.json'))).toBe(true);
    expect(isConfigurationError(new FormatterConfigError('a.json', ['maxDepth: Required']))).toBe(true);
    expect(isConfigurationError(new Error('Configuration file not found: a.json'))).toBe(false);
  });
});
