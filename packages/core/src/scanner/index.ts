import fg from 'fast-glob';
import { existsSync } from 'fs';
import { join } from 'path';
import { ResourceDependencySet } from '../dependency.js';
import { readTextFile } from '../fs.js';
import type { ResourceDependency } from '../types.js';
import { EXTRACTION_RULES, extractDependencies, type ExtractionRule } from './rules.js';

/**
 * File extensions that may reference resources
 */
export const SCANNED_EXTENSIONS = ['java', 'kt', 'xml'] as const;

/**
 * Scanner options
 */
export interface ScanOptions {
  rules?: readonly ExtractionRule[];
}

/**
 * List every source and markup file beneath a module's `src` directory
 */
export function listScannedFiles(moduleRoot: string): string[] {
  const sourceRoot = join(moduleRoot, 'src');
  if (!existsSync(sourceRoot)) {
    return [];
  }

  return fg
    .sync(`**/*.{${SCANNED_EXTENSIONS.join(',')}}`, {
      cwd: sourceRoot,
      absolute: true,
      dot: true,
      onlyFiles: true,
    })
    .sort();
}

/**
 * Collect every resource referenced anywhere in a module's sources
 */
export function scanModule(moduleRoot: string, options: ScanOptions = {}): ResourceDependencySet {
  const { rules = EXTRACTION_RULES } = options;
  const found: ResourceDependency[] = [];

  for (const filePath of listScannedFiles(moduleRoot)) {
    for (const line of readTextFile(filePath).split('\n')) {
      found.push(...extractDependencies(line, rules));
    }
  }

  return new ResourceDependencySet(found);
}

export { EXTRACTION_RULES, extractDependencies, bindingClassToLayoutName, type ExtractionRule } from './rules.js';
