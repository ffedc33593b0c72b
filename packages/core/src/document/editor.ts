import fg from 'fast-glob';
import { existsSync } from 'fs';
import { extname, join, relative } from 'path';
import {
  classifyElement,
  resourceNameOfElement,
  resourceNameOfFile,
  resourceTypeOfFile,
} from '../classifier.js';
import { ResourceDependencySet, createDependency } from '../dependency.js';
import { deleteFile, readTextFile, relocateFile, writeFileAtomically } from '../fs.js';
import type { DependencySet, ResourceDependency, ResourceType } from '../types.js';
import { protectEscapeSequences, restoreEscapeSequences } from './escape.js';
import {
  EMPTY_RESOURCES_DOCUMENT,
  elementsOf,
  isContainerDocument,
  parseResourceDocument,
  serializeResourceDocument,
  type DocumentNode,
  type ElementNode,
  type ResourceDocument,
} from './model.js';
import { detachUnits, trimStart } from './surgery.js';

/**
 * Extensions of files that define resources
 */
export const RESOURCE_FILE_EXTENSIONS = ['xml', 'png', 'webp', 'jpg', 'jpeg', 'gif', 'ttf', 'otf'] as const;

export const RESOURCES_DIRECTORY = join('src', 'main', 'res');

/**
 * Document editor options
 */
export interface DocumentEditorOptions {
  /** Indentation of the first unit in a rewritten destination document. Defaults to four spaces. */
  indentation?: string;
}

/**
 * Rules for removing unused resources from one file
 */
export interface RemovalCriteria {
  typesToRemove: ReadonlySet<ResourceType>;
  keep: DependencySet;
  ignorePattern?: RegExp;
}

/**
 * List every resource file in a module, in a stable order
 */
export function listResourceFiles(moduleRoot: string): string[] {
  const resourcesRoot = join(moduleRoot, RESOURCES_DIRECTORY);
  if (!existsSync(resourcesRoot)) {
    return [];
  }

  return fg
    .sync(`**/*.{${RESOURCE_FILE_EXTENSIONS.join(',')}}`, {
      cwd: resourcesRoot,
      absolute: true,
      dot: true,
      onlyFiles: true,
    })
    .sort();
}

function dependencyOfElement(element: ElementNode): ResourceDependency | null {
  const type = classifyElement(element.tag, element.attributes);
  const name = resourceNameOfElement(element.attributes);
  return type !== null && name !== null ? createDependency(type, name) : null;
}

/**
 * Container documents live in untyped directories (`values`, `values-night`, ...).
 * Files under a typed directory are standalone resources and are never parsed.
 */
function mayHoldContainer(filePath: string): boolean {
  return extname(filePath) === '.xml' && resourceTypeOfFile(filePath) === null;
}

function loadDocument(filePath: string): ResourceDocument {
  return parseResourceDocument(protectEscapeSequences(readTextFile(filePath)), filePath);
}

function saveDocument(filePath: string, document: ResourceDocument): void {
  writeFileAtomically(filePath, restoreEscapeSequences(serializeResourceDocument(document)));
}

/**
 * Save a container, or delete it once no units are left
 */
function saveOrDeleteContainer(filePath: string, document: ResourceDocument): void {
  if (elementsOf(document.nodes).length === 0) {
    deleteFile(filePath);
  } else {
    saveDocument(filePath, document);
  }
}

/**
 * Moves and deletes resource definitions while leaving every untouched byte as it was
 */
export class DocumentEditor {
  private readonly indentation: string;

  constructor(options: DocumentEditorOptions = {}) {
    this.indentation = options.indentation ?? ' '.repeat(4);
  }

  /**
   * Move the definitions of `dependencies` from one module into another.
   * Files keep their path relative to the module root.
   *
   * @returns the number of resources moved
   */
  moveResources(fromModule: string, toModule: string, dependencies: DependencySet): number {
    let moved = 0;
    for (const fromFile of listResourceFiles(fromModule)) {
      const toFile = join(toModule, relative(fromModule, fromFile));
      moved += this.applyMove(fromFile, toFile, dependencies);
    }
    return moved;
  }

  /**
   * Delete every definition in a module that the criteria mark as unused
   *
   * @returns the number of resources deleted
   */
  removeResources(moduleRoot: string, criteria: RemovalCriteria): number {
    let removed = 0;
    for (const file of listResourceFiles(moduleRoot)) {
      removed += this.applyRemove(file, criteria);
    }
    return removed;
  }

  applyMove(fromFile: string, toFile: string, dependencies: DependencySet): number {
    const moveWholeFile = (): number => {
      const type = resourceTypeOfFile(fromFile);
      if (type === null || !dependencies.has(createDependency(type, resourceNameOfFile(fromFile)))) {
        return 0;
      }
      // never overwrite a definition the destination already has
      if (existsSync(toFile)) {
        return 0;
      }
      relocateFile(fromFile, toFile);
      return 1;
    };

    if (!mayHoldContainer(fromFile)) {
      return moveWholeFile();
    }

    const source = loadDocument(fromFile);
    if (!isContainerDocument(source)) {
      return 0;
    }

    const requested = elementsOf(source.nodes).filter((element) => {
      const dependency = dependencyOfElement(element);
      return dependency !== null && dependencies.has(dependency);
    });

    if (requested.length === 0) {
      return 0;
    }

    const destination = existsSync(toFile)
      ? loadDocument(toFile)
      : parseResourceDocument(EMPTY_RESOURCES_DOCUMENT, toFile);

    if (!isContainerDocument(destination)) {
      return 0;
    }

    // units the destination already defines stay at the source
    const defined = new ResourceDependencySet(
      elementsOf(destination.nodes).flatMap((element) => dependencyOfElement(element) ?? [])
    );
    const unitsToMove = requested.filter((element) => {
      const dependency = dependencyOfElement(element);
      return dependency !== null && !defined.has(dependency);
    });

    if (unitsToMove.length === 0) {
      return 0;
    }

    const { nodes: remaining, detached } = detachUnits(source.nodes, unitsToMove);
    const destinationNodes: DocumentNode[] = [
      ...trimStart([...destination.nodes, ...detached], this.indentation),
      { kind: 'text', raw: '\n' },
    ];

    // destination first: a failure in between leaves a duplicate, never a loss
    saveDocument(toFile, { ...destination, nodes: destinationNodes });
    saveOrDeleteContainer(fromFile, { ...source, nodes: remaining });

    return unitsToMove.length;
  }

  applyRemove(file: string, criteria: RemovalCriteria): number {
    const { typesToRemove, keep, ignorePattern } = criteria;

    const isUnused = (type: ResourceType | null, name: string, rawName: string): boolean =>
      type !== null && typesToRemove.has(type) && !keep.hasName(name) && !(ignorePattern?.test(rawName) ?? false);

    const deleteWholeFile = (): number => {
      const name = resourceNameOfFile(file);
      if (!isUnused(resourceTypeOfFile(file), name, name)) {
        return 0;
      }
      deleteFile(file);
      return 1;
    };

    if (!mayHoldContainer(file)) {
      return deleteWholeFile();
    }

    const document = loadDocument(file);
    if (!isContainerDocument(document)) {
      return 0;
    }

    const unitsToDelete = elementsOf(document.nodes).filter((element: ElementNode) => {
      const rawName = element.attributes.name;
      const name = resourceNameOfElement(element.attributes);
      return (
        rawName !== undefined &&
        name !== null &&
        isUnused(classifyElement(element.tag, element.attributes), name, rawName)
      );
    });

    if (unitsToDelete.length === 0) {
      return 0;
    }

    const { nodes: remaining } = detachUnits(document.nodes, unitsToDelete);
    saveOrDeleteContainer(file, { ...document, nodes: remaining });

    return unitsToDelete.length;
  }
}
