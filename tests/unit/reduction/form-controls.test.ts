/**
 * Form control reduction tests: inputs, textareas, contenteditable and
 * selects.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { reduceSnapshot } from '../../../src/snapshot/page-observer.js';
import { SnapshotBuilder } from '../../helpers/snapshot-builders.js';

describe('form controls', () => {
  let b: SnapshotBuilder;

  beforeEach(() => {
    b = new SnapshotBuilder();
  });

  describe('inputs', () => {
    it('identifies an input by placeholder and reports its state', () => {
      const snapshot = b.page([
        b.el('input', {
          attrs: { type: 'email', name: 'email', placeholder: 'Email address' },
          value: 'jane@shop.test',
          selectionStart: 3,
          selectionEnd: 5,
          focused: true,
        }),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.clickable_elements).toEqual(['email_address']);
      expect(result.input_elements).toEqual([
        {
          id: 'email_address',
          disabled: false,
          type: 'email',
          value: 'jane@shop.test',
          canEdit: true,
          isFocused: true,
        },
      ]);
      expect(result.html).toBe(
        '<html><body><input type="email" name="email" placeholder="Email address" ' +
          'data-is-focused="true" data-semantic-id="email_address" data-clickable="true" ' +
          'data-value="jane@shop.test" data-input-disabled="false" data-can-edit="true" ' +
          'data-selection-start="3" data-selection-end="5"></body></html>'
      );
    });

    it('excludes disabled inputs from the input list', () => {
      const snapshot = b.page([
        b.el('input', { attrs: { type: 'text', name: 'q', disabled: '' }, disabled: true }),
        b.el('p', {}, ['Search']),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.input_elements).toEqual([]);
      expect(result.clickable_elements).toEqual([]);
      expect(result.html).toBe('<html><body><input type="text" name="q" disabled=""><p>Search</p></body></html>');
    });

    it('keeps a read-only input clickable with its value but no edit stamps', () => {
      const snapshot = b.page([b.el('input', { attrs: { name: 'code', readonly: '' }, readOnly: true, value: 'X1' })]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.clickable_elements).toEqual(['input']);
      expect(result.input_elements).toEqual([
        { id: 'input', disabled: false, type: 'text', value: 'X1', canEdit: false, isFocused: false },
      ]);
      expect(result.html).toBe(
        '<html><body><input name="code" readonly="" data-semantic-id="input" data-clickable="true" data-value="X1">' +
          '</body></html>'
      );
    });

    it('reports the value a script set on a read-only date picker', () => {
      const snapshot = b.page([
        b.el('input', { attrs: { type: 'date', readonly: '' }, readOnly: true, value: '2026-10-19' }),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.input_elements).toEqual([
        { id: 'input', disabled: false, type: 'date', value: '2026-10-19', canEdit: false, isFocused: false },
      ]);
    });

    it('stamps the numeric value of number inputs', () => {
      const snapshot = b.page([
        b.el('input', { attrs: { type: 'number', name: 'qty', placeholder: 'Qty' }, value: '3', valueAsNumber: 3 }),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.html).toBe(
        '<html><body><input type="number" name="qty" placeholder="Qty" data-semantic-id="qty" data-clickable="true" ' +
          'data-value="3" data-input-disabled="false" data-can-edit="true" data-numeric-value="3"></body></html>'
      );
    });

    it('identifies a textarea by name and reports its type', () => {
      const snapshot = b.page([b.el('textarea', { attrs: { name: 'Comment' }, value: 'Great' })]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.clickable_elements).toEqual([]);
      expect(result.input_elements).toEqual([
        { id: 'comment', disabled: false, type: 'textarea', value: 'Great', canEdit: true, isFocused: false },
      ]);
    });

    it('falls back to the current value for the identifier', () => {
      const snapshot = b.page([b.el('textarea', { value: '  Draft notes ' })]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.input_elements.map((input) => input.id)).toEqual(['draft_notes']);
    });

    it('reads contenteditable text as the value', () => {
      const snapshot = b.page([
        b.el('div', { attrs: { contenteditable: 'true' } }, ['My notes']),
        b.el('p', {}, ['Footer']),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.input_elements).toEqual([
        { id: 'div', disabled: false, type: 'contenteditable', value: 'My notes', canEdit: true, isFocused: false },
      ]);
    });
  });

  describe('selects', () => {
    it('reports selection state and materializes the options', () => {
      const snapshot = b.page([
        b.select({ attrs: { name: 'size' } }, [{ text: 'A' }, { text: 'B', selected: true }]),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.select_elements).toEqual([
        { id: 'a_b', value: 'B', selectedIndex: 1, multiple: false, selectedValues: ['B'] },
      ]);
      expect(result.html).toBe(
        '<html><body><select name="size" data-semantic-id="a_b" data-clickable="true" data-value="B" ' +
          'data-selected-index="1" data-has-multiple="false" data-selected-values="B">' +
          '<option value="A" data-selected="false" data-semantic-id="a_b.a">A</option>' +
          '<option value="B" data-selected="true" data-semantic-id="a_b.b">B</option>' +
          '</select></body></html>'
      );
    });

    it('stamps the live options', () => {
      const select = b.select({ attrs: { name: 'size' } }, [{ text: 'Small', value: 's' }]);

      const { ledger } = reduceSnapshot(b.page([select]));

      const optionIndex = select.select?.options[0].index ?? -1;
      expect(ledger.get(select.index, 'data-semantic-id')).toBe('small');
      expect(ledger.get(optionIndex, 'data-semantic-id')).toBe('small.small');
    });

    it('uses the name for a select under a clickable ancestor', () => {
      const snapshot = b.page([
        b.el('button', {}, [
          'Pick',
          b.select({ attrs: { name: 'Color' } }, [
            { text: 'Red', value: 'r', selected: true },
            { text: 'Blue', value: 'b', selected: true },
          ]),
        ]),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.clickable_elements).toEqual(['pick_red_blue']);
      expect(result.select_elements).toEqual([
        {
          id: 'pick_red_blue.color',
          value: 'r',
          selectedIndex: 0,
          multiple: false,
          selectedValues: ['r', 'b'],
        },
      ]);
    });

    it('reports multiple selection', () => {
      const snapshot = b.page([
        b.select({ attrs: { name: 'tags', multiple: '' }, multiple: true }, [
          { text: 'News', selected: true },
          { text: 'Sport', selected: true },
          { text: 'Tech' },
        ]),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.select_elements).toEqual([
        {
          id: 'news_sport_tech',
          value: 'News',
          selectedIndex: 0,
          multiple: true,
          selectedValues: ['News', 'Sport'],
        },
      ]);
    });

    it('keeps option values that contain commas whole', () => {
      const snapshot = b.page([
        b.select({ attrs: { name: 'variant', multiple: '' }, multiple: true }, [
          { text: 'Small red', value: 's,red', selected: true },
          { text: 'Medium', value: 'm' },
          { text: 'Large', value: 'l', selected: true },
        ]),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.select_elements).toEqual([
        {
          id: 'small_red_medium_lar',
          value: 's,red',
          selectedIndex: 0,
          multiple: true,
          selectedValues: ['s,red', 'l'],
        },
      ]);
      expect(result.html).toContain('data-selected-values="s,red,l"');
    });

    it('lists a selected option that has no text', () => {
      const snapshot = b.page([
        b.select({ attrs: { name: 'size' } }, [
          { text: '', value: '', selected: true },
          { text: 'Small', value: 's' },
        ]),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.select_elements[0]?.selectedValues).toEqual(['']);
      expect(result.html).toContain('<option value="" data-selected="true" data-semantic-id="small.option"></option>');
    });

    it('falls back to the option value when the option text has no word characters', () => {
      const snapshot = b.page([b.select({ attrs: { name: 'pick' } }, [{ text: '---', value: 'none' }])]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.html).toContain('<option value="none" data-selected="false" data-semantic-id="select.none">---</option>');
    });

    it('suffixes options that share a label', () => {
      const snapshot = b.page([
        b.select({ attrs: { name: 'dup' } }, [
          { text: 'Same', value: '1' },
          { text: 'Same', value: '2' },
        ]),
      ]);

      const { ledger, result } = reduceSnapshot(snapshot);

      expect(result.html).toContain('data-semantic-id="same_same.same"');
      expect(result.html).toContain('data-semantic-id="same_same.same1"');
      expect(ledger.size).toBe(3);
    });

    it('leaves a disabled select unidentified and keeps its own options', () => {
      const snapshot = b.page([
        b.select({ attrs: { name: 'locked', disabled: '' }, disabled: true }, [{ text: 'Only', selected: true }]),
      ]);

      const { result } = reduceSnapshot(snapshot);

      expect(result.select_elements).toEqual([]);
      expect(result.clickable_elements).toEqual([]);
      expect(result.html).toBe(
        '<html><body><select name="locked" disabled=""><option value="Only">Only</option></select></body></html>'
      );
    });
  });
});
