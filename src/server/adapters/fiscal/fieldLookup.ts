/**
 * Field lookup combinators
 *
 * Extractors describe each field as either optional (absent → null) or required
 * (absent → MissingFieldError), so they read as field tables instead of nested checks.
 */

import { MissingFieldError } from '../../types/errors.js';
import { findFirst, textOf } from './xmlTree.js';
import type { XmlNode } from './xmlTree.js';

export type FieldPath = readonly string[];

export function optionalText(scope: XmlNode, namespace: string, path: FieldPath): string | null {
  return textOf(findFirst(scope, namespace, path));
}

/**
 * Text of the first path that has any, in preference order
 */
export function firstText(scope: XmlNode, namespace: string, paths: readonly FieldPath[]): string | null {
  for (const path of paths) {
    const value = optionalText(scope, namespace, path);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

export function requiredText(
  scope: XmlNode,
  namespace: string,
  path: FieldPath,
  kind: string,
  fieldName: string
): string {
  return requireValue(optionalText(scope, namespace, path), kind, fieldName);
}

export function requiredFirstText(
  scope: XmlNode,
  namespace: string,
  paths: readonly FieldPath[],
  kind: string,
  fieldName: string
): string {
  return requireValue(firstText(scope, namespace, paths), kind, fieldName);
}

export function requireNode(
  scope: XmlNode,
  namespace: string,
  path: FieldPath,
  kind: string,
  fieldName: string
): XmlNode {
  const node = findFirst(scope, namespace, path);
  if (!node) {
    throw new MissingFieldError(kind, fieldName);
  }
  return node;
}

export function optionalAttribute(node: XmlNode, name: string): string | null {
  const value = node.attributes[name]?.trim();
  return value ? value : null;
}

export function requiredAttribute(node: XmlNode, name: string, kind: string, fieldName: string): string {
  return requireValue(optionalAttribute(node, name), kind, fieldName);
}

export function requireValue<T>(value: T | null, kind: string, fieldName: string): T {
  if (value === null) {
    throw new MissingFieldError(kind, fieldName);
  }
  return value;
}
