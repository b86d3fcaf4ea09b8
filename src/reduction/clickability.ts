/**
 * Clickability and editability classification
 *
 * @module reduction/clickability
 */

import type { SourceElement } from './reduction.types.js';
import { CLICKABLE_ROLES, EDITABLE_TAGS, INTRINSICALLY_CLICKABLE_TAGS } from './constants.js';

/**
 * Disabled property or attribute, or pointer-events turned off.
 */
export function isDisabledForInteraction(el: SourceElement): boolean {
  return el.disabled || el.hasAttribute('disabled') || el.style.pointerEvents === 'none';
}

/**
 * Heuristic click affordance, without regard to ancestors or disabled state.
 */
export function isProbablyClickable(el: SourceElement): boolean {
  if (INTRINSICALLY_CLICKABLE_TAGS.has(el.tagName)) return true;
  if (el.tagName === 'a' && el.hasAttribute('href')) return true;
  if (el.hasAttribute('onclick')) return true;

  const role = el.getAttribute('role');
  if (role !== null && CLICKABLE_ROLES.has(role)) return true;

  return el.style.cursor === 'pointer';
}

/**
 * Clickability does not nest: an element under a clickable ancestor is never
 * clickable itself.
 */
export function classifyClickable(el: SourceElement, parentIsClickable: boolean): boolean {
  return !parentIsClickable && isProbablyClickable(el) && !isDisabledForInteraction(el);
}

/**
 * input, textarea or anything carrying `contenteditable`.
 */
export function isEditable(el: SourceElement): boolean {
  return EDITABLE_TAGS.has(el.tagName) || el.hasAttribute('contenteditable');
}

export function isEditBlocked(el: SourceElement): boolean {
  return el.disabled || el.readOnly;
}

export function isSelectDisabled(el: SourceElement): boolean {
  return el.disabled || el.hasAttribute('disabled');
}
