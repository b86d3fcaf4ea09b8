/**
 * Identifier Registry
 *
 * Allocates semantic identifiers that are unique within one traversal.
 *
 * @module reduction/identifier-registry
 */

import { FALLBACK_IDENTIFIER, MAX_SLUG_LENGTH } from './constants.js';

/**
 * Normalize free text into an identifier base.
 *
 * Lower-cases, collapses whitespace, replaces every non-word run with `_`,
 * strips leading/trailing underscores and truncates.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[^\w]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_SLUG_LENGTH);
}

/**
 * Slug of the first candidate that produces a non-empty slug.
 */
export function firstSlug(candidates: readonly (string | null | undefined)[], fallback: string): string {
  for (const candidate of candidates) {
    if (!candidate) continue;
    const slug = slugify(candidate);
    if (slug) return slug;
  }
  return slugify(fallback) || FALLBACK_IDENTIFIER;
}

/**
 * Join a base onto an optional parent identifier.
 */
export function scopedName(parentIdentifier: string, base: string): string {
  return parentIdentifier ? `${parentIdentifier}.${base}` : base;
}

/**
 * Set of identifiers handed out during one traversal.
 *
 * Created empty per traversal and never shared, so concurrent traversals of
 * different pages cannot interfere.
 */
export class IdentifierRegistry {
  private readonly used = new Set<string>();

  /**
   * Reserve `base`, or `base` followed by the smallest positive integer that
   * is still free.
   */
  allocate(base: string): string {
    const name = base || FALLBACK_IDENTIFIER;
    if (!this.used.has(name)) {
      this.used.add(name);
      return name;
    }

    let suffix = 1;
    while (this.used.has(`${name}${suffix}`)) suffix++;

    const allocated = `${name}${suffix}`;
    this.used.add(allocated);
    return allocated;
  }

  has(identifier: string): boolean {
    return this.used.has(identifier);
  }

  get size(): number {
    return this.used.size;
  }
}
