/**
 * Structural canonicalization
 *
 * Collapses chains of single-child generic wrappers and prunes empty
 * children.
 *
 * @module reduction/flatten
 */

import type { OutputElement } from './reduction.types.js';
import { GENERIC_CONTAINER_TAGS, PRESERVE_EMPTY_TAGS } from './constants.js';
import { createOutputElement, isEmptyOutput, mergeAttributes } from './output-node.js';

/**
 * The node's only child, when that child is an element.
 *
 * A wrapper that also carries its own text is not a pure wrapper, so it is
 * left alone.
 */
function soleElementChild(node: OutputElement): OutputElement | null {
  if (node.children.length !== 1) return null;
  const [child] = node.children;
  return child.kind === 'element' ? child : null;
}

/**
 * Collapse single-child wrapper chains until no generic wrapper remains at
 * the top of the node.
 *
 * - generic parent, specific child: the result takes the child's tag, the
 *   parent's attributes, then the child's attributes and the child's content.
 * - otherwise: the child's attributes and content are pulled into the parent.
 */
export function flattenWrappers(node: OutputElement): OutputElement {
  let current = node;

  for (;;) {
    const child = soleElementChild(current);
    if (!child) break;

    const parentGeneric = GENERIC_CONTAINER_TAGS.has(current.tag);
    const childGeneric = GENERIC_CONTAINER_TAGS.has(child.tag);
    if (!parentGeneric && !childGeneric) break;

    if (parentGeneric && !childGeneric) {
      const replacement = createOutputElement(child.tag);
      mergeAttributes(current, replacement);
      mergeAttributes(child, replacement);
      replacement.children = child.children;
      current = replacement;
    } else {
      mergeAttributes(child, current);
      current.children = child.children;
    }
  }

  return current;
}

/**
 * Remove direct children that are empty and not preserved.
 */
export function pruneEmptyChildren(node: OutputElement): void {
  node.children = node.children.filter(
    (child) => child.kind === 'text' || PRESERVE_EMPTY_TAGS.has(child.tag) || !isEmptyOutput(child)
  );
}
