import type { DependencySet, ResourceDependency, ResourceType } from './types.js';

function keyOf(dependency: ResourceDependency): string {
  return `${dependency.type}/${dependency.name}`;
}

export function createDependency(type: ResourceType, name: string): ResourceDependency {
  return Object.freeze({ type, name });
}

/**
 * Immutable set of dependencies compared by (type, name)
 */
export class ResourceDependencySet implements DependencySet {
  private readonly entries: Map<string, ResourceDependency>;
  private readonly names: Set<string>;

  constructor(dependencies: Iterable<ResourceDependency> = []) {
    this.entries = new Map();
    for (const dependency of dependencies) {
      this.entries.set(keyOf(dependency), dependency);
    }
    this.names = new Set([...this.entries.values()].map((dependency) => dependency.name));
  }

  get size(): number {
    return this.entries.size;
  }

  has(dependency: ResourceDependency): boolean {
    return this.entries.has(keyOf(dependency));
  }

  hasName(name: string): boolean {
    return this.names.has(name);
  }

  values(): ResourceDependency[] {
    return [...this.entries.values()];
  }

  [Symbol.iterator](): Iterator<ResourceDependency> {
    return this.entries.values();
  }

  union(...others: DependencySet[]): ResourceDependencySet {
    return new ResourceDependencySet([this, ...others].flatMap((set) => set.values()));
  }

  difference(...others: DependencySet[]): ResourceDependencySet {
    return new ResourceDependencySet(this.values().filter((dependency) => !others.some((other) => other.has(dependency))));
  }

  filterTypes(types: ReadonlySet<ResourceType>): ResourceDependencySet {
    return new ResourceDependencySet(this.values().filter((dependency) => types.has(dependency.type)));
  }

  static empty(): ResourceDependencySet {
    return new ResourceDependencySet();
  }
}
