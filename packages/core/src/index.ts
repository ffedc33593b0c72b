// Types
export * from './types.js';

// Classification
export {
  classify,
  classifyDirectory,
  classifyElement,
  listResourceTypes,
  normalizeResourceName,
  resourceNameOfElement,
  resourceNameOfFile,
  resourceTypeOfFile,
  typeToRawName,
} from './classifier.js';
export { ResourceDependencySet, createDependency } from './dependency.js';
export { resolveResourceTypeFilter, parseResourceTypes, type TypeFilterInput } from './type-filter.js';

// Errors
export * from './errors.js';

// Logging
export * from './logger.js';

// Scanning
export * from './scanner/index.js';
export { resolveModule } from './module-resolver.js';

// Document editing
export * from './document/index.js';

// Runners
export { ResourceMover, createResourceMover, type MoveResourcesOptions, type ResourceMoverConfig } from './runner/mover.js';
export {
  ResourceRemover,
  createResourceRemover,
  type RemoveResourcesOptions,
  type ResourceRemoverConfig,
} from './runner/remover.js';
export { DEFAULT_MAX_ROUNDS } from './runner/rounds.js';
