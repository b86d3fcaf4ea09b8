/**
 * Snapshot Types
 *
 * JSON shapes exchanged with the page: the DOM snapshot the capture script
 * returns, and the attribute stamps written back after reduction.
 */

import type { ComputedStyleFacts } from '../reduction/reduction.types.js';

export type RawOptionSnapshot = {
  /** Position in the page-side element registry */
  index: number;
  text: string;
  value: string;
  selected: boolean;
};

export type RawSelectSnapshot = {
  selectedIndex: number;
  multiple: boolean;
  selectedValues: string[];
  options: RawOptionSnapshot[];
};

export type RawElementSnapshot = {
  kind: 'element';
  /** Position in the page-side element registry */
  index: number;
  /** Lower-case tag name */
  tag: string;
  attributes: [string, string][];
  style: ComputedStyleFacts;
  width: number;
  height: number;
  disabled: boolean;
  readOnly: boolean;
  value: string;
  valueAsNumber: number | null;
  selectionStart: number | null;
  selectionEnd: number | null;
  focused: boolean;
  withinHoverable: boolean;
  select: RawSelectSnapshot | null;
  children: RawNodeSnapshot[];
};

export type RawTextSnapshot = {
  kind: 'text';
  text: string;
};

export type RawOtherSnapshot = {
  kind: 'other';
};

export type RawNodeSnapshot = RawElementSnapshot | RawTextSnapshot | RawOtherSnapshot;

export type RawDomSnapshot = {
  root: RawElementSnapshot | null;
  elementCount: number;
  url: string;
};

/**
 * Attributes to write onto one captured element.
 */
export type DomStamp = {
  index: number;
  attributes: [string, string][];
};

export type ApplyStampsArgs = {
  stamps: DomStamp[];
  /** Attributes removed from every element before the stamps are written */
  clearAttributes: string[];
};
