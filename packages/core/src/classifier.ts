import { basename, dirname } from 'path';
import { RESOURCE_TYPES, type ResourceRawName, type ResourceType } from './types.js';

function isResourceType(key: string): key is ResourceType {
  return Object.hasOwn(RESOURCE_TYPES, key);
}

const TYPES_IN_ORDER: readonly ResourceType[] = Object.keys(RESOURCE_TYPES).filter(isResourceType);

const RAW_NAME_TO_TYPE = new Map<string, ResourceType>(TYPES_IN_ORDER.map((type) => [RESOURCE_TYPES[type], type]));

/**
 * Element tags in container documents that define a resource under another type's name
 */
const ELEMENT_TAG_ALIASES: Record<string, ResourceType> = {
  'string-array': 'Array',
  'integer-array': 'Array',
  'declare-styleable': 'Styleable',
};

/**
 * Map a raw name (`drawable`, `string`, ...) to its resource type.
 * Returns null for anything outside the known set.
 */
export function classify(token: string): ResourceType | null {
  return RAW_NAME_TO_TYPE.get(token) ?? null;
}

export function typeToRawName(type: ResourceType): ResourceRawName {
  return RESOURCE_TYPES[type];
}

/**
 * All resource types, in declaration order
 */
export function listResourceTypes(): ResourceType[] {
  return [...TYPES_IN_ORDER];
}

/**
 * Classify a resource directory name, ignoring its qualifier suffix.
 * Example: `drawable-hdpi` -> Drawable, `values-night` -> null
 */
export function classifyDirectory(directoryName: string): ResourceType | null {
  const [prefix = ''] = directoryName.split('-');
  return classify(prefix);
}

/**
 * Resource type of a standalone resource file, derived from its parent directory.
 * Example: src/main/res/anim/slide_in_from_top.xml -> Animation
 */
export function resourceTypeOfFile(filePath: string): ResourceType | null {
  return classifyDirectory(basename(dirname(filePath)));
}

/**
 * Resource name of a standalone resource file: its base name up to the first dot
 */
export function resourceNameOfFile(filePath: string): string {
  const name = basename(filePath);
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

/**
 * Resource type of a unit inside a container document
 */
export function classifyElement(tag: string, attributes: Readonly<Record<string, string>>): ResourceType | null {
  if (tag === 'item') {
    const declaredType = attributes.type;
    return declaredType !== undefined ? classify(declaredType) : null;
  }
  return ELEMENT_TAG_ALIASES[tag] ?? classify(tag);
}

/**
 * Normalized resource name of a unit inside a container document
 */
export function resourceNameOfElement(attributes: Readonly<Record<string, string>>): string | null {
  const name = attributes.name;
  return name !== undefined ? normalizeResourceName(name) : null;
}

/**
 * Markup spells nested names with dots (`Widget.Button`); code sees underscores.
 */
export function normalizeResourceName(name: string): string {
  return name.replace(/\./g, '_');
}
