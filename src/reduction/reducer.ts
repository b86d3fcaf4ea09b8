/**
 * DOM Reducer
 *
 * One recursive traversal that filters the live DOM, projects attributes,
 * assigns semantic identifiers and canonicalizes structure. Identifiers and
 * a few derived flags are stamped back onto the source elements so that
 * actions can locate them later.
 *
 * @module reduction/reducer
 */

import type { OutputElement, SourceElement, SourceNode } from './reduction.types.js';
import { BLACKLISTED_TAGS, OPTION_CONTAINER_TAGS, PRESERVE_EMPTY_TAGS, STAMP } from './constants.js';
import { IdentifierRegistry, firstSlug, scopedName } from './identifier-registry.js';
import {
  createOutputElement,
  createOutputText,
  isEmptyOutput,
  projectSourceAttributes,
  setAttr,
} from './output-node.js';
import {
  classifyClickable,
  isEditBlocked,
  isEditable,
  isSelectDisabled,
} from './clickability.js';
import { flattenWrappers, pruneEmptyChildren } from './flatten.js';
import { getLogger } from '../shared/services/logging.service.js';

export interface ReduceContext {
  registry: IdentifierRegistry;
  /** Identifier of the nearest identified ancestor, '' at the top */
  parentIdentifier: string;
  /** An ancestor was classified clickable */
  parentIsClickable: boolean;
}

/**
 * Visibility gate: display, visibility, opacity and geometry.
 */
export function isVisible(el: SourceElement): boolean {
  const { display, visibility, opacity } = el.style;
  if (display === 'none' || visibility === 'hidden') return false;
  if (parseFloat(opacity) === 0) return false;
  return !(el.offsetWidth === 0 && el.offsetHeight === 0);
}

/**
 * Write an attribute onto the output node and the live element alike.
 */
function stampBoth(clone: OutputElement, source: SourceElement, name: string, value: string): void {
  setAttr(clone, name, value);
  source.stamp(name, value);
}

function assignClickable(
  el: SourceElement,
  clone: OutputElement,
  ctx: ReduceContext
): string {
  const base = firstSlug(
    [el.innerText.trim(), el.getAttribute('title'), el.getAttribute('placeholder')],
    el.tagName
  );
  const identifier = ctx.registry.allocate(scopedName(ctx.parentIdentifier, base));
  stampBoth(clone, el, STAMP.semanticId, identifier);
  stampBoth(clone, el, STAMP.clickable, 'true');
  return identifier;
}

function annotateEditable(
  el: SourceElement,
  clone: OutputElement,
  identifier: string,
  ctx: ReduceContext
): string {
  if (isEditBlocked(el)) {
    // identified through the clickable path; report the value without edit stamps
    if (identifier) setAttr(clone, STAMP.value, el.value);
    return identifier;
  }

  let assigned = identifier;
  if (!assigned) {
    const base = firstSlug(
      [el.getAttribute('placeholder'), el.getAttribute('name'), el.value.trim()],
      el.tagName
    );
    assigned = ctx.registry.allocate(scopedName(ctx.parentIdentifier, base));
  }

  setAttr(clone, STAMP.semanticId, assigned);
  setAttr(clone, STAMP.value, el.value);
  setAttr(clone, STAMP.inputDisabled, 'false');
  setAttr(clone, STAMP.canEdit, String(!el.readOnly));
  el.stamp(STAMP.semanticId, assigned);

  if (el.getAttribute('type') === 'number' && el.valueAsNumber !== null && Number.isFinite(el.valueAsNumber)) {
    setAttr(clone, STAMP.numericValue, String(el.valueAsNumber));
  }
  if (el.selectionStart !== null && el.selectionEnd !== null) {
    setAttr(clone, STAMP.selectionStart, String(el.selectionStart));
    setAttr(clone, STAMP.selectionEnd, String(el.selectionEnd));
  }

  return assigned;
}

function annotateSelect(
  el: SourceElement,
  clone: OutputElement,
  identifier: string,
  ctx: ReduceContext
): string {
  const state = el.select;
  if (!state || isSelectDisabled(el)) return identifier;

  const assigned =
    identifier ||
    ctx.registry.allocate(scopedName(ctx.parentIdentifier, firstSlug([el.getAttribute('name')], el.tagName)));

  setAttr(clone, STAMP.semanticId, assigned);
  setAttr(clone, STAMP.value, el.value);
  setAttr(clone, STAMP.selectedIndex, String(state.selectedIndex));
  setAttr(clone, STAMP.hasMultiple, String(state.multiple));
  setAttr(clone, STAMP.selectedValues, state.selectedValues.join(','));
  el.stamp(STAMP.semanticId, assigned);

  for (const option of state.options) {
    const optionNode = createOutputElement('option');
    setAttr(optionNode, 'value', option.value);
    setAttr(optionNode, STAMP.selected, String(option.selected));

    const optionId = ctx.registry.allocate(`${assigned}.${firstSlug([option.text, option.value], 'option')}`);
    setAttr(optionNode, STAMP.semanticId, optionId);
    option.stamp(STAMP.semanticId, optionId);

    const text = option.text.trim();
    if (text) optionNode.children.push(createOutputText(text));
    clone.children.push(optionNode);
  }

  return assigned;
}

/**
 * Reduce one source node.
 *
 * @returns the output node, or null when the node and its subtree are
 *          excluded from the observation
 */
export function reduceNode(node: SourceNode, ctx: ReduceContext): OutputElement | null {
  if (node.kind !== 'element') return null;
  if (BLACKLISTED_TAGS.has(node.tagName)) return null;
  if (!isVisible(node)) return null;

  const el = node;
  const clone = createOutputElement(el.tagName);
  projectSourceAttributes(el, clone);

  if (el.style.pointerEvents !== 'auto') {
    setAttr(clone, STAMP.pointerEvents, el.style.pointerEvents);
  }
  if (el.isFocused) {
    setAttr(clone, STAMP.focused, 'true');
  }

  const isClickable = classifyClickable(el, ctx.parentIsClickable);
  let identifier = isClickable ? assignClickable(el, clone, ctx) : '';

  if (el.withinHoverable) {
    stampBoth(clone, el, STAMP.hoverable, 'true');
  }

  if (isEditable(el)) {
    identifier = annotateEditable(el, clone, identifier, ctx);
  }

  const materializedOptions = el.tagName === 'select' && el.select !== null && !isSelectDisabled(el);
  if (el.tagName === 'select') {
    identifier = annotateSelect(el, clone, identifier, ctx);
  }

  const childContext: ReduceContext = {
    registry: ctx.registry,
    parentIdentifier: identifier || ctx.parentIdentifier,
    parentIsClickable: ctx.parentIsClickable || isClickable,
  };

  for (const child of el.childNodes) {
    if (child.kind !== 'element') continue;
    if (materializedOptions && OPTION_CONTAINER_TAGS.has(child.tagName)) continue;

    let reduced: OutputElement | null;
    try {
      reduced = reduceNode(child, childContext);
    } catch (error) {
      getLogger().warning('Skipping subtree that failed to reduce', {
        tag: child.tagName,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    if (reduced && (!isEmptyOutput(reduced) || PRESERVE_EMPTY_TAGS.has(reduced.tag))) {
      clone.children.push(reduced);
    }
  }

  for (const child of el.childNodes) {
    if (child.kind !== 'text') continue;
    const text = child.text.trim();
    if (text) clone.children.push(createOutputText(text));
  }

  const flattened = flattenWrappers(clone);
  pruneEmptyChildren(flattened);
  return flattened;
}

/**
 * Reduce a whole document from its root element with a fresh registry.
 */
export function reduceDocument(
  root: SourceNode | null,
  registry: IdentifierRegistry = new IdentifierRegistry()
): OutputElement | null {
  if (!root) return null;
  return reduceNode(root, { registry, parentIdentifier: '', parentIsClickable: false });
}
