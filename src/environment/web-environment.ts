/**
 * Web Environment
 *
 * Playwright-backed environment an agent drives through structured actions.
 * Each observation runs one reduction over the active tab; each step
 * dispatches one action and returns the next observation, with action
 * failures reported in `error` instead of thrown.
 *
 * observation(), step(), reset() and close() run one at a time through a
 * serial queue, so at most one traversal touches a page at any moment.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { BrowserContext, Page } from 'playwright';
import type { EnvironmentConfig } from '../config/environment-config.js';
import { launchBrowserContext, type LaunchedBrowser } from '../browser/browser-launcher.js';
import { waitForPageReady } from '../browser/page-stabilization.js';
import { getOrCreateTracker, removeTracker } from '../browser/page-network-tracker.js';
import { SerialTaskQueue } from '../browser/task-queue.js';
import { executeAction, type ActionHost } from '../actions/action-executor.js';
import { parseActionRequest } from '../actions/action.schemas.js';
import { observePage } from '../snapshot/page-observer.js';
import { emptyReduction } from '../reduction/observation-collector.js';
import type { ReductionResult } from '../reduction/reduction.types.js';
import type { Observation, TabInfo } from './environment.types.js';
import {
  ActionError,
  BrowserError,
  ErrorCode,
  extractErrorMessage,
} from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

export type BrowserLauncher = (config: EnvironmentConfig) => Promise<LaunchedBrowser>;

export interface WebEnvironmentOptions {
  /** Replaces the Playwright launcher */
  launcher?: BrowserLauncher;
}

const BLANK_PAGE = 'about:blank';

/**
 * Error text reported to the agent for a failed step.
 */
export function describeStepError(error: unknown): string {
  if (
    error instanceof ActionError &&
    (error.code === ErrorCode.INVALID_ACTION_JSON || error.code === ErrorCode.INVALID_ACTION)
  ) {
    return error.message;
  }
  return `Error executing action: ${extractErrorMessage(error)}`;
}

export class WebEnvironment implements ActionHost {
  private readonly logger = getLogger();
  private readonly queue = new SerialTaskQueue();
  private readonly launcher: BrowserLauncher;
  private launched: LaunchedBrowser | null = null;
  private activePage: Page | null = null;
  private modelAnswer: string | null = null;

  constructor(
    private readonly config: EnvironmentConfig,
    options: WebEnvironmentOptions = {}
  ) {
    this.launcher = options.launcher ?? launchBrowserContext;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get page(): Page {
    if (!this.activePage) {
      throw new BrowserError(
        'Environment is not set up. Call setup() first.',
        ErrorCode.ENVIRONMENT_NOT_READY
      );
    }
    return this.activePage;
  }

  get context(): BrowserContext {
    if (!this.launched) {
      throw new BrowserError(
        'Environment is not set up. Call setup() first.',
        ErrorCode.ENVIRONMENT_NOT_READY
      );
    }
    return this.launched.context;
  }

  isReady(): boolean {
    return this.launched !== null && this.activePage !== null;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Launch the browser, open the start page and return the first observation.
   * An environment that is already set up is closed first.
   */
  setup(startUrl?: string): Promise<Observation> {
    return this.queue.run(async () => {
      if (this.launched) {
        await this.shutdown();
      }

      this.launched = await this.launcher(this.config);
      const existing = this.launched.context.pages();
      const page = existing.length > 0 ? existing[0] : await this.launched.context.newPage();
      this.activate(page);
      this.modelAnswer = null;

      await this.openStartUrl(page, startUrl ?? this.config.startUrl);
      return this.observe();
    });
  }

  /**
   * Observe the active tab.
   */
  observation(): Promise<Observation> {
    return this.queue.run(() => this.observe());
  }

  /**
   * Execute one action and observe.
   *
   * @param action JSON string or object in the action format
   */
  step(action: unknown): Promise<Observation> {
    return this.queue.run(async () => {
      this.requireReady();

      let error: string | null = null;
      try {
        const request = parseActionRequest(action);
        const outcome = await executeAction(this, request, {
          scrollTimeoutMs: this.config.timeouts.actionScroll,
        });
        this.logger.debug('Action executed', { ...outcome });

        if (this.config.sleepAfterActionMs > 0) {
          await sleep(this.config.sleepAfterActionMs);
        }
      } catch (caught) {
        error = describeStepError(caught);
        this.logger.warning('Action failed', { action: summarizeAction(action), error });
      }

      const observation = await this.observe();
      return { ...observation, error };
    });
  }

  /**
   * Close every tab, open a fresh one at the start URL and clear the answer.
   */
  reset(): Promise<Observation> {
    return this.queue.run(async () => {
      const context = this.context;

      for (const page of context.pages()) {
        removeTracker(page);
        await page.close();
      }
      const page = await context.newPage();
      this.activate(page);
      this.modelAnswer = null;

      await this.openStartUrl(page, this.config.startUrl);
      return this.observe();
    });
  }

  close(): Promise<void> {
    return this.queue.run(() => this.shutdown());
  }

  // ==========================================================================
  // ActionHost
  // ==========================================================================

  async newTab(url?: string): Promise<number> {
    const context = this.context;
    const page = await context.newPage();
    if (url) {
      await page.goto(url, { waitUntil: 'domcontentloaded' });
    }
    this.activate(page);
    return context.pages().length - 1;
  }

  async switchTab(tabId: number): Promise<void> {
    const page = this.tabAt(tabId);
    this.activate(page);
    await page.bringToFront();
  }

  async closeTab(tabId: number): Promise<void> {
    const page = this.tabAt(tabId);
    const wasActive = page === this.activePage;

    removeTracker(page);
    await page.close();

    if (!wasActive) return;

    const remaining = this.context.pages();
    if (remaining.length === 0) {
      this.activate(await this.context.newPage());
      return;
    }

    const next = (await this.findFocusedPage(remaining)) ?? remaining[remaining.length - 1];
    this.activate(next);
    await next.bringToFront();
  }

  terminate(answer: string): void {
    this.modelAnswer = answer;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireReady(): void {
    if (!this.isReady()) {
      throw new BrowserError(
        'Environment is not set up. Call setup() first.',
        ErrorCode.ENVIRONMENT_NOT_READY
      );
    }
  }

  private activate(page: Page): void {
    this.activePage = page;
    getOrCreateTracker(page);
  }

  private tabAt(tabId: number): Page {
    const pages = this.context.pages();
    if (!Number.isInteger(tabId) || tabId < 0 || tabId >= pages.length) {
      throw new ActionError(`Invalid tab ID: ${tabId}`, ErrorCode.TAB_NOT_FOUND, {
        tabId,
        tabCount: pages.length,
      });
    }
    return pages[tabId];
  }

  private async findFocusedPage(pages: Page[]): Promise<Page | undefined> {
    for (const page of pages) {
      try {
        if (await page.evaluate(() => document.hasFocus())) {
          return page;
        }
      } catch (error) {
        this.logger.debug('Could not query tab focus', { url: page.url(), error: extractErrorMessage(error) });
      }
    }
    return undefined;
  }

  private async openStartUrl(page: Page, url: string): Promise<void> {
    if (!url || url === BLANK_PAGE) {
      this.logger.warning('No start URL configured; starting on a blank page');
      return;
    }
    await page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  private async observe(): Promise<Observation> {
    const page = this.page;
    const content = await this.reducePage(page);

    return {
      ...content,
      tabs: await this.tabsInfo(),
      model_answer: this.modelAnswer,
      terminated: this.modelAnswer !== null,
      error: null,
    };
  }

  private async reducePage(page: Page): Promise<ReductionResult> {
    try {
      await waitForPageReady(page, this.config.timeouts, getOrCreateTracker(page));
      return await observePage(page);
    } catch (error) {
      this.logger.error(
        'Page reduction failed; falling back to raw page content',
        error instanceof Error ? error : undefined,
        { url: page.url() }
      );
    }

    try {
      return emptyReduction(await page.content());
    } catch (error) {
      this.logger.warning('Could not read page content', { url: page.url(), error: extractErrorMessage(error) });
      return emptyReduction();
    }
  }

  private async tabsInfo(): Promise<TabInfo[]> {
    const pages = this.context.pages();
    const tabs: TabInfo[] = [];

    for (const [id, page] of pages.entries()) {
      let title = '';
      try {
        title = await page.title();
      } catch (error) {
        this.logger.debug('Could not read tab title', { id, error: extractErrorMessage(error) });
      }
      tabs.push({ id, title, url: page.url(), is_active: page === this.activePage });
    }
    return tabs;
  }

  private async shutdown(): Promise<void> {
    const launched = this.launched;
    this.launched = null;
    this.activePage = null;
    if (!launched) return;

    for (const page of launched.context.pages()) {
      removeTracker(page);
    }
    await launched.context.close();
    if (launched.browser) {
      await launched.browser.close();
    }
    this.logger.info('Browser closed');
  }
}

function summarizeAction(action: unknown): unknown {
  if (typeof action === 'string') {
    return action.length > 200 ? `${action.slice(0, 200)}...` : action;
  }
  return action;
}
