import { Command } from 'commander';
import chalk from 'chalk';
import {
  ConfigurationError,
  createResourceMover,
  createResourceRemover,
  listResourceTypes,
  parseResourceTypes,
  resolveResourceTypeFilter,
  typeToRawName,
  type MoveResourcesOptions,
  type RemoveResourcesOptions,
  type ResourceType,
  type RunSummary,
} from '@restidy/core';
import { createConsoleLogger } from '../console-logger.js';
import {
  SETTING_KEYS,
  createSettingsStore,
  isSettingKey,
  parseSettingValue,
  readSettings,
  type CliSettings,
} from '../settings/index.js';

/**
 * Options shared by move and remove
 */
interface TypeFilterFlags {
  include: string[];
  exclude: string[];
  maxRounds?: string;
}

export interface MoveCommandInput extends TypeFilterFlags {
  source: string;
  output: string[];
  dependency: string[];
}

export interface RemoveCommandInput extends TypeFilterFlags {
  source: string;
  dependency: string[];
  skip?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseMaxRounds(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`--max-rounds must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseSkipPattern(raw: string | undefined): RegExp | undefined {
  if (raw === undefined) {
    return undefined;
  }
  try {
    return new RegExp(raw);
  } catch (error) {
    throw new ConfigurationError(`--skip is not a valid regular expression: ${error instanceof Error ? error.message : raw}`);
  }
}

function typeFilterOf(flags: TypeFilterFlags): Set<ResourceType> {
  return resolveResourceTypeFilter({
    include: parseResourceTypes(flags.include),
    exclude: parseResourceTypes(flags.exclude),
  });
}

/**
 * Validate move flags and turn them into run options
 */
export function buildMoveOptions(input: MoveCommandInput, settings: CliSettings): MoveResourcesOptions {
  if (input.output.length === 0) {
    throw new ConfigurationError('You must specify at least one output directory');
  }

  return {
    source: input.source,
    destinations: input.output,
    protectedModules: input.dependency,
    typeFilter: typeFilterOf(input),
    maxRounds: parseMaxRounds(input.maxRounds, settings.maxRounds),
    editor: { indentation: ' '.repeat(settings.indentWidth) },
  };
}

/**
 * Validate remove flags and turn them into run options
 */
export function buildRemoveOptions(input: RemoveCommandInput, settings: CliSettings): RemoveResourcesOptions {
  const ignorePattern = parseSkipPattern(input.skip);

  return {
    target: input.source,
    protectedModules: input.dependency,
    typeFilter: typeFilterOf(input),
    maxRounds: parseMaxRounds(input.maxRounds, settings.maxRounds),
    editor: { indentation: ' '.repeat(settings.indentWidth) },
    ...(ignorePattern !== undefined ? { ignorePattern } : {}),
  };
}

function reportSummary(summary: RunSummary, pastTense: string): void {
  if (summary.limitReached) {
    console.log(
      chalk.yellow(`Round limit reached after ${summary.rounds.length} round(s); ${summary.total} resource(s) ${pastTense} so far.`)
    );
  }
}

/**
 * Move command
 */
export function moveCommand(program: Command): void {
  program
    .command('move')
    .description('Moves resources from one module to many destination modules')
    .requiredOption('-s, --source <path>', 'Source directory')
    .option('-o, --output <path>', 'path to output module to move to', collect, [])
    .option('-d, --dependency <path>', 'path to module the source module depends on', collect, [])
    .option('-i, --include <type>', 'resource types to move', collect, [])
    .option('-e, --exclude <type>', 'resource types to keep', collect, [])
    .option('--max-rounds <n>', 'maximum number of rounds')
    .action((input: MoveCommandInput) => {
      const options = buildMoveOptions(input, readSettings());
      const summary = createResourceMover({ logger: createConsoleLogger() }).moveResources(options);
      reportSummary(summary, 'moved');
    });
}

/**
 * Remove command
 */
export function removeCommand(program: Command): void {
  program
    .command('remove')
    .description('Removes unused resources from specified module')
    .requiredOption('-s, --source <path>', 'Source directory')
    .option('-d, --dependency <path>', 'path to module the source module depends on', collect, [])
    .option('-i, --include <type>', 'resource types to delete', collect, [])
    .option('-e, --exclude <type>', 'resource types to keep', collect, [])
    .option('--skip <pattern>', 'Regular expression pattern for resource names to skip deleting')
    .option('--max-rounds <n>', 'maximum number of rounds')
    .action((input: RemoveCommandInput) => {
      const options = buildRemoveOptions(input, readSettings());
      const summary = createResourceRemover({ logger: createConsoleLogger() }).removeResources(options);
      reportSummary(summary, 'removed');
    });
}

/**
 * Types command
 */
export function typesCommand(program: Command): void {
  program
    .command('types')
    .description('Lists the resource types that can be moved or removed')
    .action(() => {
      for (const type of listResourceTypes()) {
        console.log(typeToRawName(type));
      }
    });
}

/**
 * Config commands
 */
export function configCommand(program: Command): void {
  const config = program.command('config').description('Manage stored defaults');

  config
    .command('list')
    .description('Show every setting')
    .action(() => {
      const settings = readSettings();
      for (const key of SETTING_KEYS) {
        console.log(`${chalk.bold(key)} = ${settings[key]}`);
      }
    });

  config
    .command('get <key>')
    .description('Show one setting')
    .action((key: string) => {
      if (!isSettingKey(key)) {
        throw new ConfigurationError(`Unknown setting "${key}", pick from [${SETTING_KEYS.join(', ')}]`);
      }
      console.log(readSettings()[key]);
    });

  config
    .command('set <key> <value>')
    .description('Change one setting')
    .action((key: string, value: string) => {
      if (!isSettingKey(key)) {
        throw new ConfigurationError(`Unknown setting "${key}", pick from [${SETTING_KEYS.join(', ')}]`);
      }
      createSettingsStore().set(key, parseSettingValue(key, value));
      console.log(chalk.green(`${key} set to ${value}`));
    });
}
