/**
 * Reduction Constants
 */

/** Elements dropped with their whole subtree */
export const BLACKLISTED_TAGS: ReadonlySet<string> = new Set([
  'script',
  'style',
  'link',
  'meta',
  'noscript',
  'template',
  'iframe',
  'svg',
  'canvas',
  'picture',
  'video',
  'audio',
  'object',
  'embed',
]);

/** Source attributes copied onto output nodes */
export const ALLOWED_ATTRIBUTES: ReadonlySet<string> = new Set([
  'id',
  'href',
  'src',
  'type',
  'name',
  'value',
  'placeholder',
  'checked',
  'disabled',
  'readonly',
  'required',
  'maxlength',
  'min',
  'max',
  'step',
  'role',
  'tabindex',
  'alt',
  'title',
  'for',
  'action',
  'method',
  'contenteditable',
  'selected',
  'multiple',
  'autocomplete',
]);

/** Attribute namespaces copied wholesale */
export const ALLOWED_ATTRIBUTE_PREFIXES: readonly string[] = ['aria-', 'data-'];

/** Tags kept even when they have no content */
export const PRESERVE_EMPTY_TAGS: ReadonlySet<string> = new Set([
  'input',
  'select',
  'option',
  'textarea',
  'button',
  'img',
  'head',
  'title',
]);

/** Generic wrappers that flattening collapses */
export const GENERIC_CONTAINER_TAGS: ReadonlySet<string> = new Set(['div']);

export const INTRINSICALLY_CLICKABLE_TAGS: ReadonlySet<string> = new Set([
  'button',
  'select',
  'summary',
  'area',
  'input',
]);

export const CLICKABLE_ROLES: ReadonlySet<string> = new Set(['button', 'link']);

export const EDITABLE_TAGS: ReadonlySet<string> = new Set(['input', 'textarea']);

/** Children of a select that are already materialized as fresh option nodes */
export const OPTION_CONTAINER_TAGS: ReadonlySet<string> = new Set(['option', 'optgroup']);

export const MAX_SLUG_LENGTH = 20;

/** Identifier used when a base name slugs to nothing */
export const FALLBACK_IDENTIFIER = 'item';

/**
 * Attributes the traversal writes onto output nodes and, for some, back onto
 * the live page.
 */
export const STAMP = {
  semanticId: 'data-semantic-id',
  clickable: 'data-clickable',
  hoverable: 'data-maybe-hoverable',
  pointerEvents: 'data-pointer-events',
  focused: 'data-is-focused',
  value: 'data-value',
  inputDisabled: 'data-input-disabled',
  canEdit: 'data-can-edit',
  numericValue: 'data-numeric-value',
  selectionStart: 'data-selection-start',
  selectionEnd: 'data-selection-end',
  selectedIndex: 'data-selected-index',
  hasMultiple: 'data-has-multiple',
  selectedValues: 'data-selected-values',
  selected: 'data-selected',
} as const;

/**
 * Stamps that belong to a single traversal. They are never projected from the
 * source (a previous traversal left them there) and are cleared from the live
 * page before a new traversal's stamps are written.
 */
export const TRAVERSAL_STAMPS: readonly string[] = [STAMP.semanticId, STAMP.clickable];
