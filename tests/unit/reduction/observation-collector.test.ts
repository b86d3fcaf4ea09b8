import { describe, it, expect } from 'vitest';
import { collectObservation, emptyReduction } from '../../../src/reduction/observation-collector.js';
import { createOutputElement, createOutputText, setAttr } from '../../../src/reduction/output-node.js';
import type { OutputElement, OutputNode } from '../../../src/reduction/reduction.types.js';

function node(tag: string, attrs: Record<string, string> = {}, children: OutputNode[] = []): OutputElement {
  const element = createOutputElement(tag);
  for (const [name, value] of Object.entries(attrs)) setAttr(element, name, value);
  element.children = children;
  return element;
}

describe('collectObservation', () => {
  it('returns an empty payload without a root', () => {
    expect(collectObservation(null)).toEqual(emptyReduction());
  });

  it('lists identifiers in document order', () => {
    const root = node('body', {}, [
      node('a', { 'data-semantic-id': 'home', 'data-clickable': 'true' }, [createOutputText('Home')]),
      node('ul', {}, [
        node('li', { 'data-semantic-id': 'menu', 'data-clickable': 'true', 'data-maybe-hoverable': 'true' }),
        node('li', { 'data-maybe-hoverable': 'true' }),
      ]),
      node('button', { 'data-semantic-id': 'go', 'data-clickable': 'true' }),
    ]);

    const result = collectObservation(root);

    expect(result.clickable_elements).toEqual(['home', 'menu', 'go']);
    expect(result.hoverable_elements).toEqual(['menu']);
  });

  it('builds input records from stamps', () => {
    const root = node('form', {}, [
      node('input', {
        type: 'password',
        'data-semantic-id': 'password',
        'data-value': 'secret',
        'data-input-disabled': 'false',
        'data-can-edit': 'true',
        'data-is-focused': 'true',
      }),
      node('textarea', { 'data-semantic-id': 'bio' }, [createOutputText('About me')]),
      node('input', { name: 'unlabelled' }),
    ]);

    const result = collectObservation(root);

    expect(result.input_elements).toEqual([
      { id: 'password', disabled: false, type: 'password', value: 'secret', canEdit: true, isFocused: true },
      { id: 'bio', disabled: false, type: 'textarea', value: 'About me', canEdit: false, isFocused: false },
    ]);
  });

  it('reports an input as disabled only when the stamp says so', () => {
    const root = node('input', { 'data-semantic-id': 'q', 'data-input-disabled': 'true' });

    expect(collectObservation(root).input_elements[0].disabled).toBe(true);
  });

  it('builds select records from stamps', () => {
    const root = node('select', {
      'data-semantic-id': 'size',
      'data-value': 'm',
      'data-selected-index': '1',
      'data-has-multiple': 'false',
      'data-selected-values': 'm',
    });

    expect(collectObservation(root).select_elements).toEqual([
      { id: 'size', value: 'm', selectedIndex: 1, multiple: false, selectedValues: ['m'] },
    ]);
  });

  it('defaults missing select stamps', () => {
    const root = node('select', { 'data-semantic-id': 'empty' });

    expect(collectObservation(root).select_elements).toEqual([
      { id: 'empty', value: '', selectedIndex: -1, multiple: false, selectedValues: [] },
    ]);
  });

  it('serializes the tree into html', () => {
    const root = node('p', {}, [createOutputText('Hi')]);

    expect(collectObservation(root).html).toBe('<p>Hi</p>');
  });
});
