/**
 * Action Executor
 *
 * Dispatches validated actions against the active page of an ActionHost.
 * Every element action resolves its target first, scrolls it into view with
 * a short budget and then acts with `force: true`.
 */

import type { Locator, Page } from 'playwright';
import type { ActionName, ActionRequest } from './action.schemas.js';
import { resolveTarget } from './element-resolver.js';
import { getLogger } from '../shared/services/logging.service.js';

/**
 * What the executor needs from the environment.
 */
export interface ActionHost {
  /** Active tab */
  readonly page: Page;
  /** Open a tab, optionally at `url`, and make it active; returns its index */
  newTab(url?: string): Promise<number>;
  switchTab(tabId: number): Promise<void>;
  closeTab(tabId: number): Promise<void>;
  /** Record the final answer of the episode */
  terminate(answer: string): void;
}

export interface ExecuteActionOptions {
  /** Scroll-into-view budget for targeted actions (ms) */
  scrollTimeoutMs: number;
}

export interface ActionOutcome {
  action: ActionName;
  target?: string;
}

async function locateForAction(page: Page, target: string, options: ExecuteActionOptions): Promise<Locator> {
  const locator = await resolveTarget(page, target);
  await locator.scrollIntoViewIfNeeded({ timeout: options.scrollTimeoutMs });
  return locator;
}

/**
 * Execute one action. Failures propagate to the caller.
 */
export async function executeAction(
  host: ActionHost,
  action: ActionRequest,
  options: ExecuteActionOptions
): Promise<ActionOutcome> {
  const logger = getLogger();
  const page = host.page;

  switch (action.action) {
    case 'click': {
      const element = await locateForAction(page, action.target, options);
      await element.click({ force: true });
      logger.info('Clicked element', { target: action.target });
      return { action: action.action, target: action.target };
    }

    case 'type': {
      const element = await locateForAction(page, action.target, options);
      await element.fill(action.text, { force: true });
      if (action.enter) {
        await element.press('Enter');
      }
      logger.info('Typed into element', { target: action.target, length: action.text.length, enter: action.enter });
      return { action: action.action, target: action.target };
    }

    case 'hover': {
      const element = await locateForAction(page, action.target, options);
      await element.hover({ force: true });
      logger.info('Hovered element', { target: action.target });
      return { action: action.action, target: action.target };
    }

    case 'select': {
      const element = await locateForAction(page, action.target, options);
      await element.selectOption(action.value, { force: true });
      logger.info('Selected option', { target: action.target, value: action.value });
      return { action: action.action, target: action.target };
    }

    case 'clear': {
      const element = await locateForAction(page, action.target, options);
      await element.clear({ force: true });
      logger.info('Cleared element', { target: action.target });
      return { action: action.action, target: action.target };
    }

    case 'key_press': {
      if (action.target) {
        const element = await locateForAction(page, action.target, options);
        await element.press(action.key);
        logger.info('Pressed key on element', { key: action.key, target: action.target });
        return { action: action.action, target: action.target };
      }
      await page.keyboard.press(action.key);
      logger.info('Pressed key', { key: action.key });
      return { action: action.action };
    }

    case 'goto_url':
      await page.goto(action.url, { waitUntil: 'domcontentloaded' });
      logger.info('Navigated', { url: action.url });
      return { action: action.action };

    case 'back':
      await page.goBack({ waitUntil: 'domcontentloaded' });
      logger.info('Navigated back');
      return { action: action.action };

    case 'forward':
      await page.goForward({ waitUntil: 'domcontentloaded' });
      logger.info('Navigated forward');
      return { action: action.action };

    case 'refresh':
      await page.reload({ waitUntil: 'domcontentloaded' });
      logger.info('Page refreshed');
      return { action: action.action };

    case 'new_tab': {
      const tabId = await host.newTab(action.url);
      logger.info('Opened tab', { tabId, url: action.url });
      return { action: action.action };
    }

    case 'switch_tab':
      await host.switchTab(action.tab_id);
      logger.info('Switched tab', { tabId: action.tab_id });
      return { action: action.action };

    case 'close_tab':
      await host.closeTab(action.tab_id);
      logger.info('Closed tab', { tabId: action.tab_id });
      return { action: action.action };

    case 'terminate':
      host.terminate(action.answer);
      logger.info(action.answer ? 'Task terminated with answer' : 'Task terminated without answer', {
        answer: action.answer,
      });
      return { action: action.action };
  }
}
