/**
 * Source nodes over a captured DOM snapshot.
 *
 * Adapts the JSON snapshot to the reducer's SourceNode view. Stamps are not
 * written to the page directly; they are recorded in a {@link StampLedger}
 * and written back in one batch afterwards.
 *
 * @module snapshot/snapshot-source
 */

import type {
  ComputedStyleFacts,
  SourceAttribute,
  SourceElement,
  SourceNode,
  SourceOption,
  SourceSelectState,
} from '../reduction/reduction.types.js';
import type { DomStamp, RawElementSnapshot, RawNodeSnapshot, RawOptionSnapshot } from './snapshot.types.js';

/** Elements whose content never contributes to rendered text */
const NON_RENDERED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'head']);

/**
 * Attribute writes of one traversal, keyed by element index.
 */
export class StampLedger {
  private readonly entries = new Map<number, Map<string, string>>();

  record(index: number, name: string, value: string): void {
    let attrs = this.entries.get(index);
    if (!attrs) {
      attrs = new Map();
      this.entries.set(index, attrs);
    }
    attrs.set(name, value);
  }

  get(index: number, name: string): string | undefined {
    return this.entries.get(index)?.get(name);
  }

  toStamps(): DomStamp[] {
    return [...this.entries].map(([index, attrs]) => ({ index, attributes: [...attrs] }));
  }

  /** Number of elements with at least one stamp */
  get size(): number {
    return this.entries.size;
  }
}

function isRendered(raw: RawElementSnapshot): boolean {
  if (NON_RENDERED_TAGS.has(raw.tag)) return false;
  return raw.style.display !== 'none' && raw.style.visibility !== 'hidden';
}

/** Rendered on their own line regardless of their computed display */
const LINE_BREAK_TAGS = new Set(['br', 'option', 'optgroup']);

function isInlineLevel(raw: RawElementSnapshot): boolean {
  if (LINE_BREAK_TAGS.has(raw.tag)) return false;
  return raw.style.display.startsWith('inline') || raw.style.display === 'contents';
}

function collectRenderedText(raw: RawElementSnapshot, out: string[]): void {
  for (const child of raw.children) {
    if (child.kind === 'text') {
      out.push(child.text);
    } else if (child.kind === 'element' && isRendered(child)) {
      if (isInlineLevel(child)) {
        collectRenderedText(child, out);
      } else {
        out.push(' ');
        collectRenderedText(child, out);
        out.push(' ');
      }
    }
  }
}

/**
 * Approximation of `innerText`: inline-level descendants run together,
 * block-level ones are separated by a space, whitespace is collapsed.
 */
export function renderedTextOf(raw: RawElementSnapshot): string {
  const parts: string[] = [];
  collectRenderedText(raw, parts);
  return parts.join('').replace(/\s+/g, ' ').trim();
}

class SnapshotSourceOption implements SourceOption {
  constructor(
    private readonly raw: RawOptionSnapshot,
    private readonly ledger: StampLedger
  ) {}

  get text(): string {
    return this.raw.text;
  }

  get value(): string {
    return this.raw.value;
  }

  get selected(): boolean {
    return this.raw.selected;
  }

  stamp(name: string, value: string): void {
    this.ledger.record(this.raw.index, name, value);
  }
}

export class SnapshotSourceElement implements SourceElement {
  readonly kind = 'element' as const;
  readonly attributes: readonly SourceAttribute[];
  readonly select: SourceSelectState | null;
  private readonly attributeMap: Map<string, string>;
  private children: SourceNode[] | undefined;
  private text: string | undefined;

  constructor(
    private readonly raw: RawElementSnapshot,
    private readonly ledger: StampLedger
  ) {
    this.attributes = raw.attributes.map(([name, value]) => ({ name, value }));
    this.attributeMap = new Map(raw.attributes);
    this.select = raw.select
      ? {
          selectedIndex: raw.select.selectedIndex,
          multiple: raw.select.multiple,
          selectedValues: raw.select.selectedValues,
          options: raw.select.options.map((option) => new SnapshotSourceOption(option, ledger)),
        }
      : null;
  }

  get index(): number {
    return this.raw.index;
  }

  get tagName(): string {
    return this.raw.tag;
  }

  get style(): ComputedStyleFacts {
    return this.raw.style;
  }

  get offsetWidth(): number {
    return this.raw.width;
  }

  get offsetHeight(): number {
    return this.raw.height;
  }

  get disabled(): boolean {
    return this.raw.disabled;
  }

  get readOnly(): boolean {
    return this.raw.readOnly;
  }

  get value(): string {
    return this.raw.value;
  }

  get valueAsNumber(): number | null {
    return this.raw.valueAsNumber;
  }

  get selectionStart(): number | null {
    return this.raw.selectionStart;
  }

  get selectionEnd(): number | null {
    return this.raw.selectionEnd;
  }

  get isFocused(): boolean {
    return this.raw.focused;
  }

  get withinHoverable(): boolean {
    return this.raw.withinHoverable;
  }

  get innerText(): string {
    this.text ??= renderedTextOf(this.raw);
    return this.text;
  }

  get childNodes(): readonly SourceNode[] {
    this.children ??= this.raw.children.map((child) => toSourceNode(child, this.ledger));
    return this.children;
  }

  getAttribute(name: string): string | null {
    return this.attributeMap.get(name) ?? null;
  }

  hasAttribute(name: string): boolean {
    return this.attributeMap.has(name);
  }

  stamp(name: string, value: string): void {
    this.ledger.record(this.raw.index, name, value);
  }
}

export function toSourceNode(raw: RawNodeSnapshot, ledger: StampLedger): SourceNode {
  switch (raw.kind) {
    case 'element':
      return new SnapshotSourceElement(raw, ledger);
    case 'text':
      return { kind: 'text', text: raw.text };
    case 'other':
      return { kind: 'other' };
  }
}
