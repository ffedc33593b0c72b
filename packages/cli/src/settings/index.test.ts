import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@restidy/core';
import { createSettingsStore, isSettingKey, parseSettingValue, readSettings } from './index.js';

describe('settings store', () => {
  it('starts from defaults and persists changes', () => {
    const cwd = mkdtempSync(join(tmpdir(), 'restidy-settings-'));

    expect(readSettings(createSettingsStore({ cwd }))).toEqual({ maxRounds: 10, indentWidth: 4 });

    createSettingsStore({ cwd }).set('maxRounds', 25);
    expect(readSettings(createSettingsStore({ cwd }))).toEqual({ maxRounds: 25, indentWidth: 4 });
  });

  it('rejects values outside the schema', () => {
    const store = createSettingsStore({ cwd: mkdtempSync(join(tmpdir(), 'restidy-settings-')) });
    expect(() => store.set('maxRounds', 0)).toThrow();
  });
});

describe('setting parsing', () => {
  it('recognizes setting keys', () => {
    expect(isSettingKey('indentWidth')).toBe(true);
    expect(isSettingKey('theme')).toBe(false);
  });

  it('parses integers only', () => {
    expect(parseSettingValue('maxRounds', '12')).toBe(12);
    expect(() => parseSettingValue('maxRounds', 'many')).toThrow(ConfigurationError);
    expect(() => parseSettingValue('maxRounds', '')).toThrow(ConfigurationError);
  });
});
