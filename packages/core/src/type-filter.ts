import { classify, listResourceTypes, typeToRawName } from './classifier.js';
import { ConfigurationError } from './errors.js';
import type { ResourceType } from './types.js';

/**
 * Type filter input. At most one of the two lists may be non-empty.
 */
export interface TypeFilterInput {
  include?: readonly ResourceType[];
  exclude?: readonly ResourceType[];
}

/**
 * Derive the set of resource types a run works on
 */
export function resolveResourceTypeFilter(input: TypeFilterInput = {}): Set<ResourceType> {
  const { include = [], exclude = [] } = input;

  if (include.length > 0 && exclude.length > 0) {
    throw new ConfigurationError('Cannot specify both resources to include and resources to exclude');
  }

  if (include.length > 0) {
    return new Set(include);
  }

  const excluded = new Set(exclude);
  return new Set(listResourceTypes().filter((type) => !excluded.has(type)));
}

/**
 * Parse raw type names given by a user (`drawable`, `string`, ...)
 */
export function parseResourceTypes(rawNames: readonly string[]): ResourceType[] {
  return rawNames.map((rawName) => {
    const type = classify(rawName);
    if (type === null) {
      const valid = listResourceTypes().map(typeToRawName).join(', ');
      throw new ConfigurationError(`${rawName} is not a valid resource type, pick from [${valid}]`);
    }
    return type;
  });
}
