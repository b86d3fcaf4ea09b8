import { describe, it, expect } from 'vitest';
import type { Page } from 'playwright';
import { resolveTarget, semanticIdSelector } from '../../../src/actions/element-resolver.js';
import { ElementError, ErrorCode } from '../../../src/shared/errors/index.js';
import { createMockLocator, createMockPage } from '../../mocks/playwright.mock.js';

describe('semanticIdSelector', () => {
  it('matches the stamped attribute', () => {
    expect(semanticIdSelector('find.q')).toBe('[data-semantic-id="find.q"]');
  });

  it('escapes quotes and backslashes', () => {
    expect(semanticIdSelector('a"b\\c')).toBe('[data-semantic-id="a\\"b\\\\c"]');
  });
});

describe('resolveTarget', () => {
  it('returns the locator when exactly one element matches', async () => {
    const page = createMockPage();

    const locator = await resolveTarget(page as unknown as Page, 'submit');

    expect(locator).toBe(page.target);
    expect(page.locator).toHaveBeenCalledWith('[data-semantic-id="submit"]');
  });

  it('raises ELEMENT_NOT_FOUND when nothing matches', async () => {
    const page = createMockPage();
    page.locator.mockReturnValue(createMockLocator(0));

    const result = resolveTarget(page as unknown as Page, 'gone');

    await expect(result).rejects.toBeInstanceOf(ElementError);
    await expect(result).rejects.toMatchObject({
      code: ErrorCode.ELEMENT_NOT_FOUND,
      message: 'No element found with semantic id "gone". Use an id from the latest observation.',
    });
  });

  it('raises AMBIGUOUS_TARGET when several elements match', async () => {
    const page = createMockPage();
    page.locator.mockReturnValue(createMockLocator(2));

    await expect(resolveTarget(page as unknown as Page, 'buy')).rejects.toMatchObject({
      code: ErrorCode.AMBIGUOUS_TARGET,
      message: 'Semantic id "buy" matches 2 elements',
      details: { target: 'buy', count: 2 },
    });
  });
});
