/**
 * HTML serialization of output trees
 *
 * @module reduction/serializer
 */

import type { OutputNode } from './reduction.types.js';

const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'source',
  'track',
  'wbr',
]);

export function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}

export function serializeHtml(node: OutputNode): string {
  if (node.kind === 'text') return escapeText(node.text);

  let attrs = '';
  for (const [name, value] of node.attributes) {
    attrs += ` ${name}="${escapeAttribute(value)}"`;
  }

  const open = `<${node.tag}${attrs}>`;
  if (VOID_ELEMENTS.has(node.tag)) return open;

  return `${open}${node.children.map(serializeHtml).join('')}</${node.tag}>`;
}
