/**
 * Element Resolver
 *
 * Locates the single live element carrying a semantic identifier stamped by
 * the latest observation.
 */

import type { Locator, Page } from 'playwright';
import { STAMP } from '../reduction/constants.js';
import { ElementError, ErrorCode } from '../shared/errors/index.js';

/**
 * CSS selector matching the stamped identifier exactly.
 */
export function semanticIdSelector(identifier: string): string {
  const escaped = identifier.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `[${STAMP.semanticId}="${escaped}"]`;
}

/**
 * Resolve an identifier to exactly one element.
 *
 * @throws ElementError ELEMENT_NOT_FOUND when nothing carries the identifier,
 *         AMBIGUOUS_TARGET when more than one element does
 */
export async function resolveTarget(page: Page, identifier: string): Promise<Locator> {
  const locator = page.locator(semanticIdSelector(identifier));
  const count = await locator.count();

  if (count === 0) {
    throw new ElementError(
      `No element found with semantic id "${identifier}". Use an id from the latest observation.`,
      ErrorCode.ELEMENT_NOT_FOUND,
      { target: identifier }
    );
  }
  if (count > 1) {
    throw new ElementError(
      `Semantic id "${identifier}" matches ${count} elements`,
      ErrorCode.AMBIGUOUS_TARGET,
      { target: identifier, count }
    );
  }
  return locator;
}
