import { SaxesParser } from 'saxes';
import { DocumentParseError } from '../errors.js';

/**
 * A top-level node of a resource document. `raw` is the exact source text,
 * so untouched nodes serialize back byte for byte.
 */
export type DocumentNode =
  | { kind: 'element'; tag: string; attributes: Record<string, string>; raw: string }
  | { kind: 'comment'; raw: string }
  | { kind: 'text'; raw: string }
  | { kind: 'cdata'; raw: string }
  | { kind: 'instruction'; raw: string };

export type ElementNode = Extract<DocumentNode, { kind: 'element' }>;

/**
 * A parsed resource document: the root element's children between the
 * text leading up to the root start tag (`head`) and the text from the
 * root end tag onwards (`tail`).
 */
export interface ResourceDocument {
  head: string;
  rootTag: string;
  rootSelfClosing: boolean;
  nodes: DocumentNode[];
  tail: string;
}

export const CONTAINER_ROOT_TAG = 'resources';

export const EMPTY_RESOURCES_DOCUMENT = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<resources xmlns:tools="http://schemas.android.com/tools">',
  '</resources>',
  '',
].join('\n');

type MarkupKind = 'comment' | 'cdata' | 'instruction' | 'declaration' | 'open' | 'close' | 'selfclose';

interface MarkupToken {
  kind: MarkupKind;
  end: number;
}

const TAG_NAME_PATTERN = /^<\/?([^\s/>]+)/;
const ATTRIBUTE_PATTERN = /([^\s=/<>"']+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

class StructureError extends Error {}

function endAfter(text: string, from: number, terminator: string): number {
  const index = text.indexOf(terminator, from);
  if (index === -1) {
    throw new StructureError(`unterminated markup, expected "${terminator}"`);
  }
  return index + terminator.length;
}

function tagEnd(text: string, from: number): number {
  let quote: string | null = null;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '>') {
      return i + 1;
    }
  }
  throw new StructureError('unterminated tag');
}

function declarationEnd(text: string, from: number): number {
  let depth = 0;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === '[') depth++;
    else if (ch === ']') depth--;
    else if (ch === '>' && depth === 0) return i + 1;
  }
  throw new StructureError('unterminated declaration');
}

function readMarkup(text: string, at: number): MarkupToken {
  if (text.startsWith('<!--', at)) return { kind: 'comment', end: endAfter(text, at + 4, '-->') };
  if (text.startsWith('<![CDATA[', at)) return { kind: 'cdata', end: endAfter(text, at + 9, ']]>') };
  if (text.startsWith('<?', at)) return { kind: 'instruction', end: endAfter(text, at + 2, '?>') };
  if (text.startsWith('<!', at)) return { kind: 'declaration', end: declarationEnd(text, at + 2) };
  if (text.startsWith('</', at)) return { kind: 'close', end: tagEnd(text, at + 2) };

  const end = tagEnd(text, at + 1);
  return { kind: text[end - 2] === '/' ? 'selfclose' : 'open', end };
}

function tagName(startTag: string): string {
  const match = TAG_NAME_PATTERN.exec(startTag);
  if (match?.[1] === undefined) {
    throw new StructureError(`malformed tag ${startTag}`);
  }
  return match[1];
}

function parseAttributes(startTag: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const afterName = startTag.replace(TAG_NAME_PATTERN, '');
  for (const match of afterName.matchAll(ATTRIBUTE_PATTERN)) {
    const [, name, doubleQuoted, singleQuoted] = match;
    if (name !== undefined) {
      attributes[name] = doubleQuoted ?? singleQuoted ?? '';
    }
  }
  return attributes;
}

/**
 * Index just past the end tag closing an element whose start tag ends at `from`
 */
function elementEnd(text: string, from: number): number {
  let depth = 1;
  let at = from;
  while (depth > 0) {
    const next = text.indexOf('<', at);
    if (next === -1) {
      throw new StructureError('unterminated element');
    }
    const token = readMarkup(text, next);
    if (token.kind === 'open') depth++;
    else if (token.kind === 'close') depth--;
    at = token.end;
  }
  return at;
}

function assertWellFormed(text: string, filePath: string): void {
  const parser = new SaxesParser();
  const errors: Error[] = [];
  parser.on('error', (error) => {
    errors.push(error);
  });
  parser.write(text).close();

  const [firstError] = errors;
  if (firstError !== undefined) {
    throw new DocumentParseError(filePath, firstError.message);
  }
}

function splitDocument(text: string): ResourceDocument {
  let at = 0;
  for (;;) {
    const next = text.indexOf('<', at);
    if (next === -1) {
      throw new StructureError('document has no root element');
    }
    const token = readMarkup(text, next);
    if (token.kind === 'open' || token.kind === 'selfclose') {
      const startTag = text.slice(next, token.end);
      const head = text.slice(0, token.end);
      const rootTag = tagName(startTag);
      if (token.kind === 'selfclose') {
        return { head, rootTag, rootSelfClosing: true, nodes: [], tail: text.slice(token.end) };
      }
      return { head, rootTag, rootSelfClosing: false, ...splitChildren(text, token.end) };
    }
    at = token.end;
  }
}

function splitChildren(text: string, from: number): { nodes: DocumentNode[]; tail: string } {
  const nodes: DocumentNode[] = [];
  let at = from;

  while (at < text.length) {
    if (text[at] !== '<') {
      const next = text.indexOf('<', at);
      const end = next === -1 ? text.length : next;
      nodes.push({ kind: 'text', raw: text.slice(at, end) });
      at = end;
      continue;
    }

    const token = readMarkup(text, at);
    const raw = text.slice(at, token.end);
    switch (token.kind) {
      case 'close':
        return { nodes, tail: text.slice(at) };
      case 'comment':
        nodes.push({ kind: 'comment', raw });
        at = token.end;
        break;
      case 'cdata':
        nodes.push({ kind: 'cdata', raw });
        at = token.end;
        break;
      case 'instruction':
        nodes.push({ kind: 'instruction', raw });
        at = token.end;
        break;
      case 'declaration':
        throw new StructureError('unexpected declaration inside the root element');
      case 'selfclose':
        nodes.push({ kind: 'element', tag: tagName(raw), attributes: parseAttributes(raw), raw });
        at = token.end;
        break;
      case 'open': {
        const end = elementEnd(text, token.end);
        nodes.push({ kind: 'element', tag: tagName(raw), attributes: parseAttributes(raw), raw: text.slice(at, end) });
        at = end;
        break;
      }
    }
  }

  throw new StructureError('root element is never closed');
}

/**
 * Parse markup into a resource document. Malformed markup is fatal.
 */
export function parseResourceDocument(text: string, filePath: string): ResourceDocument {
  assertWellFormed(text, filePath);
  try {
    return splitDocument(text);
  } catch (error) {
    if (error instanceof StructureError) {
      throw new DocumentParseError(filePath, error.message);
    }
    throw error;
  }
}

export function serializeResourceDocument(document: ResourceDocument): string {
  const content = document.nodes.map((node) => node.raw).join('');
  if (!document.rootSelfClosing) {
    return document.head + content + document.tail;
  }
  if (document.nodes.length === 0) {
    return document.head + document.tail;
  }
  return `${document.head.replace(/\s*\/>$/, '>')}${content}</${document.rootTag}>${document.tail}`;
}

/**
 * A container document holds named resource units; anything else is a standalone resource
 */
export function isContainerDocument(document: ResourceDocument): boolean {
  return document.rootTag === CONTAINER_ROOT_TAG;
}

export function isElement(node: DocumentNode | undefined): node is ElementNode {
  return node?.kind === 'element';
}

export function isComment(node: DocumentNode | undefined): boolean {
  return node?.kind === 'comment';
}

export function isWhitespace(node: DocumentNode | undefined): boolean {
  return node?.kind === 'text' && node.raw.trim() === '';
}

export function elementsOf(nodes: readonly DocumentNode[]): ElementNode[] {
  return nodes.filter(isElement);
}
