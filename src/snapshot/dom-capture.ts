/**
 * Page-side DOM capture and stamp write-back.
 *
 * Both functions run inside the page through `page.evaluate`, so they must
 * stay self-contained: no imports at run time, no module-level helpers.
 *
 * @module snapshot/dom-capture
 */

import type {
  ApplyStampsArgs,
  RawDomSnapshot,
  RawElementSnapshot,
  RawNodeSnapshot,
  RawOptionSnapshot,
} from './snapshot.types.js';

/**
 * Walk `document.documentElement` and describe every node.
 *
 * Elements are kept in `window.__semanticElementRegistry` so that
 * {@link applyDomStamps} can address them by index. No filtering happens
 * here; every decision is taken by the reducer.
 */
export function captureDomSnapshot(): RawDomSnapshot {
  const elements: Element[] = [];
  const indices = new Map<Element, number>();
  const active = document.activeElement;

  const register = (el: Element): number => {
    const known = indices.get(el);
    if (known !== undefined) return known;
    const index = elements.length;
    elements.push(el);
    indices.set(el, index);
    return index;
  };

  const describe = (el: Element): RawElementSnapshot => {
    const index = register(el);
    const style = window.getComputedStyle(el);
    let width = 0;
    let height = 0;
    if (el instanceof HTMLElement) {
      width = el.offsetWidth;
      height = el.offsetHeight;
    } else {
      const rect = el.getBoundingClientRect();
      width = rect.width;
      height = rect.height;
    }

    let value = '';
    let valueAsNumber: number | null = null;
    let selectionStart: number | null = null;
    let selectionEnd: number | null = null;
    let readOnly = false;
    if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
      value = el.value;
      readOnly = el.readOnly;
      if (el instanceof HTMLInputElement && Number.isFinite(el.valueAsNumber)) {
        valueAsNumber = el.valueAsNumber;
      }
      selectionStart = typeof el.selectionStart === 'number' ? el.selectionStart : null;
      selectionEnd = typeof el.selectionEnd === 'number' ? el.selectionEnd : null;
    } else if ('value' in el && typeof el.value === 'string') {
      value = el.value;
    }

    let select: RawElementSnapshot['select'] = null;
    if (el instanceof HTMLSelectElement) {
      const options: RawOptionSnapshot[] = Array.from(el.options).map((option) => ({
        index: register(option),
        text: option.text,
        value: option.value,
        selected: option.selected,
      }));
      select = {
        selectedIndex: el.selectedIndex,
        multiple: el.multiple,
        selectedValues: Array.from(el.selectedOptions).map((option) => option.value),
        options,
      };
    }

    const children: RawNodeSnapshot[] = [];
    for (const child of Array.from(el.childNodes)) {
      if (child instanceof Element) {
        children.push(describe(child));
      } else if (child.nodeType === Node.TEXT_NODE) {
        children.push({ kind: 'text', text: child.textContent ?? '' });
      } else {
        children.push({ kind: 'other' });
      }
    }

    return {
      kind: 'element',
      index,
      tag: el.tagName.toLowerCase(),
      attributes: Array.from(el.attributes).map((attr): [string, string] => [attr.name, attr.value]),
      style: {
        display: style.display,
        visibility: style.visibility,
        opacity: style.opacity,
        cursor: style.cursor,
        pointerEvents: style.pointerEvents || 'auto',
      },
      width,
      height,
      disabled: 'disabled' in el && el.disabled === true,
      readOnly,
      value,
      valueAsNumber,
      selectionStart,
      selectionEnd,
      focused: el === active,
      withinHoverable: el.closest('[data-maybe-hoverable="true"]') !== null,
      select,
      children,
    };
  };

  const documentElement = document.documentElement;
  const root = documentElement ? describe(documentElement) : null;
  window.__semanticElementRegistry = elements;

  return { root, elementCount: elements.length, url: document.URL };
}

/**
 * Clear identifier stamps left by the previous traversal, then write the
 * stamps of the current one onto the captured elements.
 *
 * @returns number of elements that received stamps
 */
export function applyDomStamps({ stamps, clearAttributes }: ApplyStampsArgs): number {
  if (clearAttributes.length > 0) {
    const selector = clearAttributes.map((name) => `[${name}]`).join(',');
    for (const el of Array.from(document.querySelectorAll(selector))) {
      for (const name of clearAttributes) el.removeAttribute(name);
    }
  }

  const elements = window.__semanticElementRegistry ?? [];
  let written = 0;
  for (const { index, attributes } of stamps) {
    const el = elements[index];
    if (!el || !el.isConnected) continue;
    for (const [name, value] of attributes) el.setAttribute(name, value);
    written++;
  }

  delete window.__semanticElementRegistry;
  return written;
}
