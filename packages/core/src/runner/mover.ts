import { relative } from 'path';
import { DocumentEditor, type DocumentEditorOptions } from '../document/editor.js';
import { ResourceDependencySet } from '../dependency.js';
import { ConfigurationError } from '../errors.js';
import { silentLogger, type Logger, type ScopedLogger } from '../logger.js';
import { resolveModule } from '../module-resolver.js';
import type { ExtractionRule } from '../scanner/rules.js';
import type { ModuleInfo, ResourceType, RoundReport, RunSummary } from '../types.js';
import { DEFAULT_MAX_ROUNDS, assertValidMaxRounds, runRounds } from './rounds.js';

/**
 * Move run options
 */
export interface MoveResourcesOptions {
  /** Module to move resources out of */
  source: string;
  /** Modules to move resources into */
  destinations: readonly string[];
  /** Modules that depend on the source. Resources they reference stay put. */
  protectedModules?: readonly string[];
  typeFilter: ReadonlySet<ResourceType>;
  maxRounds?: number;
  editor?: DocumentEditorOptions;
  rules?: readonly ExtractionRule[];
}

/**
 * Runner configuration
 */
export interface ResourceMoverConfig {
  logger?: Logger;
  /** Base directory for module paths in progress messages */
  displayRoot?: string;
}

/**
 * Moves resources out of a module into the modules that use them.
 *
 * A resource moves from the source into a destination only when:
 *   - it IS referenced by that destination
 *   - its type is in the type filter
 *   - it IS NOT referenced by the source itself
 *   - it IS NOT referenced by any other destination
 *   - it IS NOT referenced by any protected module
 *
 * Moving a unit such as a layout can make the destination reference resources
 * the layout names (a drawable, a string) that it did not reference before, so
 * runs repeat in rounds until a round moves nothing.
 */
export class ResourceMover {
  private readonly logger: Logger;
  private readonly displayRoot: string;

  constructor(config: ResourceMoverConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.displayRoot = config.displayRoot ?? process.cwd();
  }

  moveResources(options: MoveResourcesOptions): RunSummary {
    const { destinations, maxRounds = DEFAULT_MAX_ROUNDS } = options;

    if (destinations.length === 0) {
      throw new ConfigurationError('You must specify at least one output directory');
    }
    assertValidMaxRounds(maxRounds);

    const editor = new DocumentEditor(options.editor);

    return runRounds(this.logger, maxRounds, { past: 'Moved', gerund: 'moving', noun: 'extraction' }, (frame) =>
      this.runRound(options, editor, frame)
    );
  }

  private runRound(
    options: MoveResourcesOptions,
    editor: DocumentEditor,
    frame: ScopedLogger
  ): Omit<RoundReport, 'round'> {
    const { source, destinations, protectedModules = [], typeFilter, rules } = options;
    const scanOptions = rules !== undefined ? { rules } : {};

    const blocked = resolveModule(source, typeFilter, scanOptions).resourceDependencies.union(
      ...protectedModules.map((directory) => resolveModule(directory, typeFilter, scanOptions).resourceDependencies)
    );
    const destinationModules: ModuleInfo[] = destinations.map((directory) =>
      resolveModule(directory, typeFilter, scanOptions)
    );

    const perModule: Record<string, number> = {};
    let affected = 0;

    destinationModules.forEach((moduleInfo, moduleIndex) => {
      const label = this.label(moduleInfo.moduleRoot);
      const wanted = moduleInfo.resourceDependencies;
      const wantedElsewhere = destinationModules
        .filter((_, otherIndex) => otherIndex !== moduleIndex)
        .map((other) => other.resourceDependencies);
      const candidates: ResourceDependencySet = wanted.difference(blocked, ...wantedElsewhere);

      if (candidates.size === 0) {
        frame.warn(`${label}: No resources can be moved.`);
        perModule[label] = 0;
        return;
      }

      frame.info(
        `${label}: Only ${candidates.size}/${wanted.size} resource(s) referenced can be extracted due to other modules referencing them.`
      );

      const moved = editor.moveResources(source, moduleInfo.moduleRoot, candidates);
      if (moved > 0) {
        frame.success(`${label}: Moved ${moved} matching resource(s).`);
      } else {
        frame.warn(`${label}: No resources were moved.`);
      }

      perModule[label] = moved;
      affected += moved;
    });

    return { affected, perModule };
  }

  private label(moduleRoot: string): string {
    return relative(this.displayRoot, moduleRoot) || '.';
  }
}

export function createResourceMover(config?: ResourceMoverConfig): ResourceMover {
  return new ResourceMover(config);
}
