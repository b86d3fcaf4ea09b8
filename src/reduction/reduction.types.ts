/**
 * Reduction Types
 *
 * Shapes read by the reduction traversal (the live page, seen through
 * SourceNode) and shapes it produces (the detached OutputNode tree and the
 * observation payload).
 */

// ============================================================================
// Source side
// ============================================================================

/**
 * Computed style properties the traversal consults.
 */
export interface ComputedStyleFacts {
  display: string;
  visibility: string;
  opacity: string;
  cursor: string;
  pointerEvents: string;
}

export interface SourceAttribute {
  name: string;
  value: string;
}

/**
 * An `<option>` of a source select, addressable for stamping.
 */
export interface SourceOption {
  readonly text: string;
  readonly value: string;
  readonly selected: boolean;
  stamp(name: string, value: string): void;
}

/**
 * Selection state of a source `<select>`.
 */
export interface SourceSelectState {
  readonly selectedIndex: number;
  readonly multiple: boolean;
  readonly selectedValues: readonly string[];
  /** Every descendant option, in document order (optgroups included) */
  readonly options: readonly SourceOption[];
}

/**
 * Handle to one live element.
 *
 * Read-only except for `stamp`, which writes an attribute back onto the live
 * element so that a later action can locate it.
 */
export interface SourceElement {
  readonly kind: 'element';
  /** Lower-case tag name */
  readonly tagName: string;
  readonly attributes: readonly SourceAttribute[];
  getAttribute(name: string): string | null;
  hasAttribute(name: string): boolean;

  readonly style: ComputedStyleFacts;
  readonly offsetWidth: number;
  readonly offsetHeight: number;

  /** `disabled` DOM property */
  readonly disabled: boolean;
  /** `readOnly` DOM property */
  readonly readOnly: boolean;
  /** Current `value` DOM property ('' where the element has none) */
  readonly value: string;
  /** `valueAsNumber` of inputs, null when not a finite number */
  readonly valueAsNumber: number | null;
  readonly selectionStart: number | null;
  readonly selectionEnd: number | null;
  readonly isFocused: boolean;
  /** Rendered text of the subtree */
  readonly innerText: string;
  /** The element or one of its ancestors carries the hover marker */
  readonly withinHoverable: boolean;
  /** Present for `<select>` elements only */
  readonly select: SourceSelectState | null;

  readonly childNodes: readonly SourceNode[];

  stamp(name: string, value: string): void;
}

export interface SourceText {
  readonly kind: 'text';
  readonly text: string;
}

/** Comments, processing instructions and anything else that is not element or text */
export interface SourceOther {
  readonly kind: 'other';
}

export type SourceNode = SourceElement | SourceText | SourceOther;

// ============================================================================
// Output side
// ============================================================================

export interface OutputElement {
  kind: 'element';
  tag: string;
  /** Insertion-ordered; serialization keeps this order */
  attributes: Map<string, string>;
  children: OutputNode[];
}

export interface OutputText {
  kind: 'text';
  text: string;
}

export type OutputNode = OutputElement | OutputText;

// ============================================================================
// Observation payload
// ============================================================================

export type InputElementRecord = {
  id: string;
  disabled: boolean;
  type: string;
  value: string;
  canEdit: boolean;
  isFocused: boolean;
};

export type SelectElementRecord = {
  id: string;
  value: string;
  selectedIndex: number;
  multiple: boolean;
  selectedValues: string[];
};

/**
 * JSON-serializable result of one traversal.
 */
export type ReductionResult = {
  html: string;
  clickable_elements: string[];
  hoverable_elements: string[];
  input_elements: InputElementRecord[];
  select_elements: SelectElementRecord[];
};
