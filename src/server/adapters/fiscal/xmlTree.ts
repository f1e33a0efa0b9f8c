/**
 * Namespace-aware, read-only XML tree for fiscal documents
 *
 * xml2js is run with `xmlns` and `preserveChildrenOrder` so every element keeps its
 * namespace URI, local name and ordered children. With `async: false` the parser
 * reports through its callback before `parseString` returns.
 *
 * xml2js stops listening once the root element closes, so the text is first run through a
 * strict sax pass that sees the whole input.
 */

import sax from 'sax';
import { Parser } from 'xml2js';
import type { ParserOptions } from 'xml2js';
import { MalformedInputError } from '../../types/errors.js';

export interface XmlNode {
  readonly namespace: string;
  readonly localName: string;
  /** Attribute values keyed by local name; namespace declarations are not included */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
  readonly text: string | null;
}

const PARSER_OPTIONS: ParserOptions = {
  async: false,
  strict: true,
  xmlns: true,
  explicitRoot: true,
  explicitChildren: true,
  preserveChildrenOrder: true,
  charsAsChildren: false,
  trim: true,
};

// Keys xml2js uses with the options above
const ATTRIBUTES_KEY = '$';
const TEXT_KEY = '_';
const CHILDREN_KEY = '$$';
const NAMESPACE_KEY = '$ns';
const NAME_KEY = '#name';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function localPart(qualifiedName: string): string {
  const separator = qualifiedName.indexOf(':');
  return separator === -1 ? qualifiedName : qualifiedName.slice(separator + 1);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }

  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      if (name !== 'xmlns' && !name.startsWith('xmlns:')) {
        attributes[localPart(name)] = value;
      }
      continue;
    }
    if (!isRecord(value) || typeof value.value !== 'string') {
      continue;
    }
    if (value.prefix === 'xmlns' || name === 'xmlns') {
      continue;
    }
    const local = typeof value.local === 'string' && value.local !== '' ? value.local : localPart(name);
    attributes[local] = value.value;
  }

  return attributes;
}

function childName(raw: unknown): string {
  const name = isRecord(raw) ? raw[NAME_KEY] : undefined;
  return typeof name === 'string' ? name : '';
}

function toXmlNode(raw: unknown, fallbackName: string): XmlNode {
  if (typeof raw === 'string') {
    return Object.freeze({
      namespace: '',
      localName: localPart(fallbackName),
      attributes: Object.freeze({}),
      children: Object.freeze([]),
      text: raw === '' ? null : raw,
    });
  }

  if (!isRecord(raw)) {
    throw new MalformedInputError(`unexpected element structure for <${fallbackName}>`);
  }

  const name = raw[NAME_KEY];
  const qualifiedName = typeof name === 'string' ? name : fallbackName;
  const ns = raw[NAMESPACE_KEY];
  const namespace = isRecord(ns) && typeof ns.uri === 'string' ? ns.uri : '';
  const localName = isRecord(ns) && typeof ns.local === 'string' && ns.local !== '' ? ns.local : localPart(qualifiedName);

  const rawChildren = raw[CHILDREN_KEY];
  const children = Array.isArray(rawChildren) ? rawChildren.map((child: unknown) => toXmlNode(child, childName(child))) : [];

  const text = raw[TEXT_KEY];

  return Object.freeze({
    namespace,
    localName,
    attributes: Object.freeze(readAttributes(raw[ATTRIBUTES_KEY])),
    children: Object.freeze(children),
    text: typeof text === 'string' && text !== '' ? text : null,
  });
}

/**
 * Reject anything but exactly one well-formed root element
 */
function assertWellFormed(xml: string): void {
  const parser = sax.parser(true, { xmlns: true });
  const state: { error: string | null; depth: number; rootClosed: boolean } = {
    error: null,
    depth: 0,
    rootClosed: false,
  };

  parser.onerror = error => {
    state.error = state.error ?? error.message.split('\n')[0];
    parser.resume();
  };
  parser.onopentag = () => {
    if (state.rootClosed && state.depth === 0) {
      state.error = state.error ?? 'more than one root element';
    }
    state.depth += 1;
  };
  parser.onclosetag = () => {
    state.depth -= 1;
    if (state.depth === 0) {
      state.rootClosed = true;
    }
  };

  parser.write(xml).close();

  if (state.error !== null) {
    throw new MalformedInputError(state.error);
  }
}

/**
 * Parse XML text into an immutable tree
 *
 * @throws {MalformedInputError} When the text is empty or not well-formed markup
 */
export function parseXmlDocument(xml: string): XmlNode {
  if (xml.trim() === '') {
    throw new MalformedInputError('document is empty');
  }
  assertWellFormed(xml);

  const outcome: { error: Error | null; result: unknown } = { error: null, result: undefined };
  const parser = new Parser(PARSER_OPTIONS);

  try {
    parser.parseString(xml, (error: Error | null, result: unknown) => {
      if (error) {
        outcome.error = outcome.error ?? error;
        return;
      }
      outcome.result = result;
    });
  } catch (error) {
    outcome.error = outcome.error ?? (error instanceof Error ? error : new Error(String(error)));
  }

  if (outcome.error) {
    throw new MalformedInputError(outcome.error.message.split('\n')[0]);
  }

  if (!isRecord(outcome.result)) {
    throw new MalformedInputError('no root element found');
  }

  const entries = Object.entries(outcome.result);
  if (entries.length !== 1) {
    throw new MalformedInputError('expected exactly one root element');
  }

  const [rootName, rootValue] = entries[0];
  return toXmlNode(rootValue, rootName);
}

function matches(node: XmlNode, namespace: string, localName: string): boolean {
  return node.localName === localName && node.namespace === namespace;
}

function* descendants(node: XmlNode): Generator<XmlNode> {
  for (const child of node.children) {
    yield child;
    yield* descendants(child);
  }
}

function resolveChildPath(node: XmlNode, namespace: string, path: readonly string[], index: number): XmlNode | null {
  if (index === path.length) {
    return node;
  }
  for (const child of node.children) {
    if (matches(child, namespace, path[index])) {
      const found = resolveChildPath(child, namespace, path, index + 1);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

/**
 * First node matching `.//path[0]/path[1]/...` below `scope`, in document order.
 * The first step matches at any depth; the remaining steps are direct children.
 */
export function findFirst(scope: XmlNode, namespace: string, path: readonly string[]): XmlNode | null {
  if (path.length === 0) {
    return null;
  }
  for (const candidate of descendants(scope)) {
    if (matches(candidate, namespace, path[0])) {
      const found = resolveChildPath(candidate, namespace, path, 1);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

/**
 * Direct child by name
 */
export function findChild(scope: XmlNode, namespace: string, localName: string): XmlNode | null {
  return scope.children.find(child => matches(child, namespace, localName)) ?? null;
}

/**
 * Trimmed text content, null when the node is missing or blank
 */
export function textOf(node: XmlNode | null): string | null {
  const text = node?.text?.trim();
  return text ? text : null;
}
