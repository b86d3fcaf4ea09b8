/**
 * Action Executor Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Page } from 'playwright';
import { executeAction, type ActionHost } from '../../../src/actions/action-executor.js';
import { parseActionRequest } from '../../../src/actions/action.schemas.js';
import { ErrorCode } from '../../../src/shared/errors/index.js';
import { createMockLocator, createMockPage, type MockPage } from '../../mocks/playwright.mock.js';

const options = { scrollTimeoutMs: 500 };

function createHost(page: MockPage) {
  return {
    page: page as unknown as Page,
    newTab: vi.fn().mockResolvedValue(1),
    switchTab: vi.fn().mockResolvedValue(undefined),
    closeTab: vi.fn().mockResolvedValue(undefined),
    terminate: vi.fn(),
  } satisfies ActionHost;
}

describe('executeAction', () => {
  let page: MockPage;
  let host: ReturnType<typeof createHost>;

  beforeEach(() => {
    page = createMockPage({ url: 'https://shop.test/' });
    host = createHost(page);
  });

  describe('element actions', () => {
    it('scrolls the target into view and clicks with force', async () => {
      const outcome = await executeAction(host, parseActionRequest({ action: 'click', target: 'submit' }), options);

      expect(outcome).toEqual({ action: 'click', target: 'submit' });
      expect(page.locator).toHaveBeenCalledWith('[data-semantic-id="submit"]');
      expect(page.target.scrollIntoViewIfNeeded).toHaveBeenCalledWith({ timeout: 500 });
      expect(page.target.click).toHaveBeenCalledWith({ force: true });
    });

    it('fills text without pressing Enter by default', async () => {
      await executeAction(host, parseActionRequest({ action: 'type', target: 'find.q', text: 'boots' }), options);

      expect(page.target.fill).toHaveBeenCalledWith('boots', { force: true });
      expect(page.target.press).not.toHaveBeenCalled();
    });

    it('presses Enter after filling when asked', async () => {
      await executeAction(
        host,
        parseActionRequest({ action: 'type', target: 'find.q', text: 'boots', enter: true }),
        options
      );

      expect(page.target.press).toHaveBeenCalledWith('Enter');
    });

    it('hovers, selects and clears', async () => {
      await executeAction(host, parseActionRequest({ action: 'hover', target: 'menu' }), options);
      await executeAction(host, parseActionRequest({ action: 'select', target: 'size', value: 'm' }), options);
      await executeAction(host, parseActionRequest({ action: 'clear', target: 'email' }), options);

      expect(page.target.hover).toHaveBeenCalledWith({ force: true });
      expect(page.target.selectOption).toHaveBeenCalledWith('m', { force: true });
      expect(page.target.clear).toHaveBeenCalledWith({ force: true });
      expect(page.target.scrollIntoViewIfNeeded).toHaveBeenCalledTimes(3);
    });

    it('does not act when the target is missing', async () => {
      const missing = createMockLocator(0);
      page.locator.mockReturnValue(missing);

      await expect(
        executeAction(host, parseActionRequest({ action: 'click', target: 'gone' }), options)
      ).rejects.toMatchObject({ code: ErrorCode.ELEMENT_NOT_FOUND });
      expect(missing.click).not.toHaveBeenCalled();
    });
  });

  describe('key_press', () => {
    it('uses the page keyboard without a target', async () => {
      const outcome = await executeAction(host, parseActionRequest({ action: 'key_press', key: 'Escape' }), options);

      expect(outcome).toEqual({ action: 'key_press' });
      expect(page.keyboard.press).toHaveBeenCalledWith('Escape');
      expect(page.locator).not.toHaveBeenCalled();
    });

    it('presses on the element when a target is given', async () => {
      await executeAction(host, parseActionRequest({ action: 'key_press', key: 'ArrowDown', target: 'menu' }), options);

      expect(page.target.press).toHaveBeenCalledWith('ArrowDown');
      expect(page.keyboard.press).not.toHaveBeenCalled();
    });
  });

  describe('navigation', () => {
    it('goes to a URL', async () => {
      const outcome = await executeAction(
        host,
        parseActionRequest({ action: 'goto_url', url: 'https://shop.test/cart' }),
        options
      );

      expect(outcome).toEqual({ action: 'goto_url' });
      expect(page.goto).toHaveBeenCalledWith('https://shop.test/cart', { waitUntil: 'domcontentloaded' });
    });

    it('moves through history and reloads', async () => {
      await executeAction(host, parseActionRequest({ action: 'back' }), options);
      await executeAction(host, parseActionRequest({ action: 'forward' }), options);
      await executeAction(host, parseActionRequest({ action: 'refresh' }), options);

      expect(page.goBack).toHaveBeenCalledWith({ waitUntil: 'domcontentloaded' });
      expect(page.goForward).toHaveBeenCalledWith({ waitUntil: 'domcontentloaded' });
      expect(page.reload).toHaveBeenCalledWith({ waitUntil: 'domcontentloaded' });
    });
  });

  describe('tabs and termination', () => {
    it('delegates tab management to the host', async () => {
      await executeAction(host, parseActionRequest({ action: 'new_tab', url: 'https://shop.test/help' }), options);
      await executeAction(host, parseActionRequest({ action: 'switch_tab', tab_id: 0 }), options);
      await executeAction(host, parseActionRequest({ action: 'close_tab', tab_id: 1 }), options);

      expect(host.newTab).toHaveBeenCalledWith('https://shop.test/help');
      expect(host.switchTab).toHaveBeenCalledWith(0);
      expect(host.closeTab).toHaveBeenCalledWith(1);
    });

    it('opens a blank tab without a URL', async () => {
      await executeAction(host, parseActionRequest({ action: 'new_tab' }), options);

      expect(host.newTab).toHaveBeenCalledWith(undefined);
    });

    it('records the answer on terminate', async () => {
      const outcome = await executeAction(
        host,
        parseActionRequest({ action: 'terminate', answer: '42 items' }),
        options
      );

      expect(outcome).toEqual({ action: 'terminate' });
      expect(host.terminate).toHaveBeenCalledWith('42 items');
    });
  });
});
