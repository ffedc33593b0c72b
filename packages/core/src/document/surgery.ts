import { isComment, isWhitespace, type DocumentNode } from './model.js';

/**
 * Result of detaching a unit from a node list
 */
export interface Detachment {
  nodes: DocumentNode[];
  detached: DocumentNode[];
}

/**
 * Detach the unit at `index` together with the indentation before it. When that
 * indentation follows a comment, the comment (and the indentation before the
 * comment) is taken along as the unit's annotation:
 *
 *   "\n    "                         <- taken with the comment
 *   <!-- Shown on the empty state -->
 *   "\n    "                         <- indentation of the unit
 *   <string name="empty">Nothing</string>
 *
 * `detached` keeps document order.
 */
export function detachUnit(nodes: readonly DocumentNode[], index: number): Detachment {
  let start = index;

  if (isWhitespace(nodes[index - 1])) {
    start = index - 1;
    if (isComment(nodes[index - 2])) {
      start = isWhitespace(nodes[index - 3]) ? index - 3 : index - 2;
    }
  }

  return {
    nodes: [...nodes.slice(0, start), ...nodes.slice(index + 1)],
    detached: nodes.slice(start, index + 1),
  };
}

/**
 * Detach several units, each with its annotation. `targets` must be members of `nodes`.
 */
export function detachUnits(nodes: readonly DocumentNode[], targets: readonly DocumentNode[]): Detachment {
  let remaining: DocumentNode[] = [...nodes];
  const detached: DocumentNode[] = [];

  for (const target of targets) {
    const index = remaining.indexOf(target);
    if (index === -1) continue;
    const result = detachUnit(remaining, index);
    remaining = result.nodes;
    detached.push(...result.detached);
  }

  return { nodes: remaining, detached };
}

/**
 * Collapse the leading whitespace run into a single indentation node
 */
export function trimStart(nodes: readonly DocumentNode[], indentation: string): DocumentNode[] {
  const firstContent = nodes.findIndex((node) => !isWhitespace(node));
  const rest = firstContent === -1 ? [] : nodes.slice(firstContent);
  return [{ kind: 'text', raw: `\n${indentation}` }, ...rest];
}
