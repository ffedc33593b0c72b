import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@restidy/core';
import { createProgram } from '../program.js';
import { DEFAULT_SETTINGS } from '../settings/index.js';
import { buildMoveOptions, buildRemoveOptions } from './index.js';

const ORIGINAL_CONFIG_DIR = process.env.RESTIDY_CONFIG_DIR;

afterEach(() => {
  if (ORIGINAL_CONFIG_DIR === undefined) {
    delete process.env.RESTIDY_CONFIG_DIR;
  } else {
    process.env.RESTIDY_CONFIG_DIR = ORIGINAL_CONFIG_DIR;
  }
  vi.restoreAllMocks();
});

describe('buildMoveOptions', () => {
  it('derives the type filter from the include list', () => {
    const options = buildMoveOptions(
      { source: 'lib', output: ['app'], dependency: ['feature'], include: ['drawable', 'string'], exclude: [] },
      DEFAULT_SETTINGS
    );

    expect(options.destinations).toEqual(['app']);
    expect(options.protectedModules).toEqual(['feature']);
    expect([...options.typeFilter]).toEqual(['Drawable', 'String']);
    expect(options.maxRounds).toBe(10);
    expect(options.editor).toEqual({ indentation: '    ' });
  });

  it('requires at least one output', () => {
    expect(() =>
      buildMoveOptions({ source: 'lib', output: [], dependency: [], include: [], exclude: [] }, DEFAULT_SETTINGS)
    ).toThrow('You must specify at least one output directory');
  });

  it('rejects include and exclude together', () => {
    expect(() =>
      buildMoveOptions(
        { source: 'lib', output: ['app'], dependency: [], include: ['string'], exclude: ['id'] },
        DEFAULT_SETTINGS
      )
    ).toThrow(ConfigurationError);
  });

  it('lets the flag override the stored round limit', () => {
    const options = buildMoveOptions(
      { source: 'lib', output: ['app'], dependency: [], include: [], exclude: ['id'], maxRounds: '3' },
      { maxRounds: 7, indentWidth: 2 }
    );

    expect(options.maxRounds).toBe(3);
    expect(options.typeFilter.has('Id')).toBe(false);
    expect(options.editor).toEqual({ indentation: '  ' });
  });
});

describe('buildRemoveOptions', () => {
  it('compiles the skip pattern', () => {
    const options = buildRemoveOptions(
      { source: 'lib', dependency: [], include: ['string'], exclude: [], skip: '^keep_' },
      DEFAULT_SETTINGS
    );

    expect(options.ignorePattern?.test('keep_title')).toBe(true);
    expect(options.ignorePattern?.test('title')).toBe(false);
  });

  it('rejects invalid patterns, types and round limits', () => {
    const base = { source: 'lib', dependency: [], include: [], exclude: [] };
    expect(() => buildRemoveOptions({ ...base, skip: '(' }, DEFAULT_SETTINGS)).toThrow(ConfigurationError);
    expect(() => buildRemoveOptions({ ...base, include: ['values'] }, DEFAULT_SETTINGS)).toThrow(ConfigurationError);
    expect(() => buildRemoveOptions({ ...base, maxRounds: '0' }, DEFAULT_SETTINGS)).toThrow(ConfigurationError);
  });
});

describe('restidy remove', () => {
  it('removes unused strings from a module', async () => {
    const root = mkdtempSync(join(tmpdir(), 'restidy-cli-'));
    process.env.RESTIDY_CONFIG_DIR = join(root, 'config');
    const stringsPath = join(root, 'lib/src/main/res/values/strings.xml');
    mkdirSync(dirname(stringsPath), { recursive: true });
    writeFileSync(
      stringsPath,
      '<resources>\n    <string name="used">Used</string>\n    <string name="stale">Stale</string>\n</resources>\n'
    );
    const codePath = join(root, 'lib/src/main/java/Main.kt');
    mkdirSync(dirname(codePath), { recursive: true });
    writeFileSync(codePath, 'getString(R.string.used)\n');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createProgram().parseAsync(['node', 'restidy', 'remove', '-s', join(root, 'lib'), '-i', 'string']);

    expect(readFileSync(stringsPath, 'utf-8')).toBe('<resources>\n    <string name="used">Used</string>\n</resources>\n');
  });
});
