import { DocumentEditor, type DocumentEditorOptions } from '../document/editor.js';
import { silentLogger, type Logger, type ScopedLogger } from '../logger.js';
import { resolveModule } from '../module-resolver.js';
import type { ExtractionRule } from '../scanner/rules.js';
import type { ResourceType, RoundReport, RunSummary } from '../types.js';
import { DEFAULT_MAX_ROUNDS, assertValidMaxRounds, runRounds } from './rounds.js';

/**
 * Remove run options
 */
export interface RemoveResourcesOptions {
  /** Module to delete unused resources from */
  target: string;
  /** Modules that depend on the target. Resources they reference are kept. */
  protectedModules?: readonly string[];
  typeFilter: ReadonlySet<ResourceType>;
  maxRounds?: number;
  /** Resources whose name matches are kept even when unused */
  ignorePattern?: RegExp;
  editor?: DocumentEditorOptions;
  rules?: readonly ExtractionRule[];
}

/**
 * Runner configuration
 */
export interface ResourceRemoverConfig {
  logger?: Logger;
}

/**
 * `test` on a global or sticky pattern remembers where it stopped
 */
function statelessPattern(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Deletes resources a module defines but neither it nor its dependents reference.
 *
 * Deleting a resource can leave the resources it referenced unused, so runs
 * repeat in rounds until a round deletes nothing.
 */
export class ResourceRemover {
  private readonly logger: Logger;

  constructor(config: ResourceRemoverConfig = {}) {
    this.logger = config.logger ?? silentLogger;
  }

  removeResources(options: RemoveResourcesOptions): RunSummary {
    const { maxRounds = DEFAULT_MAX_ROUNDS } = options;
    assertValidMaxRounds(maxRounds);

    const editor = new DocumentEditor(options.editor);
    const ignorePattern = options.ignorePattern !== undefined ? statelessPattern(options.ignorePattern) : undefined;

    return runRounds(this.logger, maxRounds, { past: 'Removed', gerund: 'removal', noun: 'removal' }, (frame) =>
      this.runRound(options, editor, ignorePattern, frame)
    );
  }

  private runRound(
    options: RemoveResourcesOptions,
    editor: DocumentEditor,
    ignorePattern: RegExp | undefined,
    frame: ScopedLogger
  ): Omit<RoundReport, 'round'> {
    const { target, protectedModules = [], typeFilter, rules } = options;
    const scanOptions = rules !== undefined ? { rules } : {};

    const keep = resolveModule(target, typeFilter, scanOptions).resourceDependencies.union(
      ...protectedModules.map((directory) => resolveModule(directory, typeFilter, scanOptions).resourceDependencies)
    );

    const affected = editor.removeResources(target, {
      typesToRemove: typeFilter,
      keep,
      ...(ignorePattern !== undefined ? { ignorePattern } : {}),
    });

    if (affected > 0) {
      frame.success(`Removed ${affected} matching resource(s).`);
    } else {
      frame.warn('No resources were removed');
    }

    return { affected };
  }
}

export function createResourceRemover(config?: ResourceRemoverConfig): ResourceRemover {
  return new ResourceRemover(config);
}
