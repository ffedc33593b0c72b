import Conf from 'conf';
import { ConfigurationError } from '@restidy/core';

/**
 * Persisted CLI settings. Command flags take precedence.
 */
export interface CliSettings {
  maxRounds: number;
  indentWidth: number;
}

export type SettingKey = keyof CliSettings;

export const SETTING_KEYS: readonly SettingKey[] = ['maxRounds', 'indentWidth'];

export const DEFAULT_SETTINGS: CliSettings = {
  maxRounds: 10,
  indentWidth: 4,
};

/**
 * Settings store options
 */
export interface SettingsStoreOptions {
  /** Directory holding the settings file. Defaults to RESTIDY_CONFIG_DIR, then the user config directory. */
  cwd?: string;
}

export function createSettingsStore(options: SettingsStoreOptions = {}): Conf<CliSettings> {
  const cwd = options.cwd ?? process.env.RESTIDY_CONFIG_DIR;
  return new Conf<CliSettings>({
    projectName: 'restidy',
    defaults: DEFAULT_SETTINGS,
    schema: {
      maxRounds: { type: 'integer', minimum: 1 },
      indentWidth: { type: 'integer', minimum: 0, maximum: 16 },
    },
    ...(cwd !== undefined && cwd.trim().length > 0 ? { cwd } : {}),
  });
}

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((settingKey) => settingKey === key);
}

/**
 * Parse a value typed on the command line for a setting
 */
export function parseSettingValue(key: SettingKey, raw: string): number {
  const value = Number(raw);
  if (raw.trim().length === 0 || !Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

export function readSettings(store: Conf<CliSettings> = createSettingsStore()): CliSettings {
  return {
    maxRounds: store.get('maxRounds'),
    indentWidth: store.get('indentWidth'),
  };
}
