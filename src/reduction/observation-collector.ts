/**
 * Observation Collector
 *
 * Builds the observation payload from a reduced output tree.
 *
 * @module reduction/observation-collector
 */

import type {
  InputElementRecord,
  OutputElement,
  ReductionResult,
  SelectElementRecord,
} from './reduction.types.js';
import { STAMP } from './constants.js';
import { getAttr, textContentOf, walkOutput } from './output-node.js';
import { serializeHtml } from './serializer.js';

export function emptyReduction(html = ''): ReductionResult {
  return {
    html,
    clickable_elements: [],
    hoverable_elements: [],
    input_elements: [],
    select_elements: [],
  };
}

function isInputLike(node: OutputElement): boolean {
  return node.tag === 'input' || node.tag === 'textarea' || node.attributes.has('contenteditable');
}

function inputTypeOf(node: OutputElement): string {
  const type = getAttr(node, 'type');
  if (type) return type;
  if (node.tag === 'input') return 'text';
  if (node.tag === 'textarea') return 'textarea';
  return 'contenteditable';
}

function toInputRecord(node: OutputElement, id: string): InputElementRecord {
  return {
    id,
    disabled: getAttr(node, STAMP.inputDisabled) === 'true',
    type: inputTypeOf(node),
    value: getAttr(node, STAMP.value) || textContentOf(node),
    canEdit: getAttr(node, STAMP.canEdit) === 'true',
    isFocused: getAttr(node, STAMP.focused) === 'true',
  };
}

/**
 * Values of the selected option nodes emitted for a select.
 */
function selectedOptionValues(node: OutputElement): string[] {
  const values: string[] = [];
  for (const child of node.children) {
    if (child.kind === 'element' && child.tag === 'option' && getAttr(child, STAMP.selected) === 'true') {
      values.push(getAttr(child, 'value') ?? '');
    }
  }
  return values;
}

function toSelectRecord(node: OutputElement, id: string): SelectElementRecord {
  const selectedIndex = Number.parseInt(getAttr(node, STAMP.selectedIndex) ?? '', 10);
  return {
    id,
    value: getAttr(node, STAMP.value) ?? '',
    selectedIndex: Number.isNaN(selectedIndex) ? -1 : selectedIndex,
    multiple: getAttr(node, STAMP.hasMultiple) === 'true',
    selectedValues: selectedOptionValues(node),
  };
}

/**
 * Collect identifier lists and form records in document order.
 */
export function collectObservation(root: OutputElement | null): ReductionResult {
  if (!root) return emptyReduction();

  const result = emptyReduction(serializeHtml(root));

  for (const node of walkOutput(root)) {
    const id = getAttr(node, STAMP.semanticId);
    if (id === undefined) continue;

    if (getAttr(node, STAMP.clickable) === 'true') result.clickable_elements.push(id);
    if (getAttr(node, STAMP.hoverable) === 'true') result.hoverable_elements.push(id);
    if (isInputLike(node)) result.input_elements.push(toInputRecord(node, id));
    if (node.tag === 'select') result.select_elements.push(toSelectRecord(node, id));
  }

  return result;
}
