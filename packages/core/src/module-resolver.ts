import { resolve } from 'path';
import { scanModule, type ScanOptions } from './scanner/index.js';
import type { ModuleInfo, ResourceType } from './types.js';

/**
 * Scan a module and keep only the references of the requested types.
 * Always reads from disk: a ModuleInfo is only valid for the round it was built in.
 */
export function resolveModule(
  moduleRoot: string,
  typeFilter: ReadonlySet<ResourceType>,
  options: ScanOptions = {}
): ModuleInfo {
  return {
    moduleRoot: resolve(moduleRoot),
    resourceDependencies: scanModule(moduleRoot, options).filterTypes(typeFilter),
  };
}
