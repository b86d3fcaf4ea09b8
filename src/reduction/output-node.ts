/**
 * Output node helpers
 *
 * @module reduction/output-node
 */

import type { OutputElement, OutputNode, OutputText, SourceElement } from './reduction.types.js';
import {
  ALLOWED_ATTRIBUTES,
  ALLOWED_ATTRIBUTE_PREFIXES,
  PRESERVE_EMPTY_TAGS,
  TRAVERSAL_STAMPS,
} from './constants.js';

export function createOutputElement(tag: string): OutputElement {
  return { kind: 'element', tag, attributes: new Map(), children: [] };
}

export function createOutputText(text: string): OutputText {
  return { kind: 'text', text };
}

export function getAttr(node: OutputElement, name: string): string | undefined {
  return node.attributes.get(name);
}

export function setAttr(node: OutputElement, name: string, value: string): void {
  node.attributes.set(name, value);
}

/**
 * Whether an attribute of the live page is carried into the observation.
 */
export function isProjectedAttribute(name: string): boolean {
  if (TRAVERSAL_STAMPS.includes(name)) return false;
  if (ALLOWED_ATTRIBUTES.has(name)) return true;
  return ALLOWED_ATTRIBUTE_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Copy the allow-listed attributes of a source element onto an output node.
 */
export function projectSourceAttributes(source: SourceElement, target: OutputElement): void {
  for (const { name, value } of source.attributes) {
    if (isProjectedAttribute(name)) {
      target.attributes.set(name, value);
    }
  }
}

/**
 * Copy every attribute of `from` onto `to`, overwriting on conflict.
 *
 * Output nodes only ever hold projected attributes and stamps, so no further
 * filtering applies here.
 */
export function mergeAttributes(from: OutputElement, to: OutputElement): void {
  for (const [name, value] of from.attributes) {
    to.attributes.set(name, value);
  }
}

/**
 * A node is empty when it holds no non-whitespace text at any depth.
 * Preserved tags are never empty.
 */
export function isEmptyOutput(node: OutputElement): boolean {
  if (PRESERVE_EMPTY_TAGS.has(node.tag)) return false;
  for (const child of node.children) {
    if (child.kind === 'text') {
      if (child.text.trim()) return false;
    } else if (!isEmptyOutput(child)) {
      return false;
    }
  }
  return true;
}

/**
 * Pre-order walk over the element nodes of an output tree.
 */
export function* walkOutput(node: OutputElement): Generator<OutputElement> {
  yield node;
  for (const child of node.children) {
    if (child.kind === 'element') {
      yield* walkOutput(child);
    }
  }
}

/**
 * Concatenated text of a subtree, in document order.
 */
export function textContentOf(node: OutputNode): string {
  if (node.kind === 'text') return node.text;
  return node.children.map(textContentOf).join('');
}
