import type { ResourceDependencySet } from './dependency.js';

/**
 * Canonical raw name of every resource type. The raw name doubles as the
 * container directory name under `src/main/res/` and as the element tag or
 * reference token used in markup and code.
 */
export const RESOURCE_TYPES = {
  Animation: 'anim',
  Animator: 'animator',
  Array: 'array',
  Attribute: 'attr',
  Bool: 'bool',
  Color: 'color',
  Dimension: 'dimen',
  Drawable: 'drawable',
  Font: 'font',
  Fraction: 'fraction',
  Id: 'id',
  Integer: 'integer',
  Interpolator: 'interpolator',
  Layout: 'layout',
  Menu: 'menu',
  Mipmap: 'mipmap',
  Navigation: 'navigation',
  Plurals: 'plurals',
  Raw: 'raw',
  String: 'string',
  Style: 'style',
  Styleable: 'styleable',
  Transition: 'transition',
  Xml: 'xml',
} as const;

/**
 * Resource type
 */
export type ResourceType = keyof typeof RESOURCE_TYPES;

/**
 * Raw name of a resource type
 */
export type ResourceRawName = (typeof RESOURCE_TYPES)[ResourceType];

/**
 * A reference to a resource found while scanning a module.
 * Names are normalized: dots are replaced with underscores.
 */
export interface ResourceDependency {
  readonly type: ResourceType;
  readonly name: string;
}

/**
 * A module directory together with the resources it references this round
 */
export interface ModuleInfo {
  moduleRoot: string;
  resourceDependencies: ResourceDependencySet;
}

/**
 * Value-keyed set of resource dependencies
 */
export interface DependencySet extends Iterable<ResourceDependency> {
  readonly size: number;
  has(dependency: ResourceDependency): boolean;
  hasName(name: string): boolean;
  values(): ResourceDependency[];
}

/**
 * Per-round result of a move or remove run
 */
export interface RoundReport {
  round: number;
  affected: number;
  perModule?: Record<string, number>;
}

/**
 * Result of a full move or remove run
 */
export interface RunSummary {
  total: number;
  rounds: RoundReport[];
  limitReached: boolean;
}
