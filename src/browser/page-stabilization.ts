/**
 * Page Stabilization Utilities
 *
 * Waits run before every traversal: DOMContentLoaded, network quiet, a
 * mutation-free window and a `body` element. None of them fails the
 * observation on timeout; only errors that mean the page itself is gone are
 * rethrown.
 */

import type { Page } from 'playwright';
import type { EnvironmentTimeouts } from '../config/environment-config.js';
import { extractErrorMessage } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import type { PageNetworkTracker } from './page-network-tracker.js';

/** Error patterns that indicate the page is in a broken state */
const CRITICAL_ERROR_PATTERNS = [
  'Target closed',
  'Target page, context or browser has been closed',
  'Execution context was destroyed',
  'Page crashed',
  'Protocol error',
  'Session closed',
];

/**
 * Check if an error is a critical page error that should be rethrown.
 */
export function isCriticalError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return CRITICAL_ERROR_PATTERNS.some((pattern) => error.message.includes(pattern));
}

/**
 * Wait for a load state, tolerating timeouts.
 *
 * @returns whether the state was reached
 * @throws Rethrows critical errors (target closed, page crashed, etc.)
 */
export async function waitForLoadStateQuietly(
  page: Page,
  state: 'domcontentloaded' | 'networkidle',
  timeoutMs: number
): Promise<boolean> {
  try {
    await page.waitForLoadState(state, { timeout: timeoutMs });
    return true;
  } catch (error) {
    if (isCriticalError(error)) {
      throw error;
    }
    getLogger().debug('Load state not reached', { state, timeoutMs, error: extractErrorMessage(error) });
    return false;
  }
}

/**
 * Wait for network to become idle (no pending requests for 500ms).
 *
 * Pages with long-polling, websockets or analytics may never idle, so a
 * timeout only yields `false`.
 */
export async function waitForNetworkQuiet(page: Page, timeoutMs: number): Promise<boolean> {
  return waitForLoadStateQuietly(page, 'networkidle', timeoutMs);
}

export interface DomQuietResult {
  status: 'stable' | 'timeout' | 'error';
  waitTimeMs: number;
  mutationCount: number;
}

/**
 * Wait until no DOM mutation has been seen for `quietWindowMs`, giving up
 * after `maxWaitMs`.
 */
export async function waitForDomQuiet(
  page: Page,
  quietWindowMs: number,
  maxWaitMs: number
): Promise<DomQuietResult> {
  const startTime = Date.now();

  try {
    const outcome = await page.evaluate(
      ({ quietWindowMs, maxWaitMs }) =>
        new Promise<{ stable: boolean; mutationCount: number }>((resolve) => {
          const target = document.body ?? document.documentElement;
          if (!target) {
            resolve({ stable: false, mutationCount: 0 });
            return;
          }

          let mutationCount = 0;
          let quietTimer = 0;
          let hardTimer = 0;

          const finish = (stable: boolean): void => {
            window.clearTimeout(quietTimer);
            window.clearTimeout(hardTimer);
            observer.disconnect();
            resolve({ stable, mutationCount });
          };

          const observer = new MutationObserver((records) => {
            mutationCount += records.length;
            window.clearTimeout(quietTimer);
            quietTimer = window.setTimeout(() => finish(true), quietWindowMs);
          });

          observer.observe(target, { childList: true, subtree: true, attributes: true, characterData: true });
          quietTimer = window.setTimeout(() => finish(true), quietWindowMs);
          hardTimer = window.setTimeout(() => finish(false), maxWaitMs);
        }),
      { quietWindowMs, maxWaitMs }
    );

    return {
      status: outcome.stable ? 'stable' : 'timeout',
      waitTimeMs: Date.now() - startTime,
      mutationCount: outcome.mutationCount,
    };
  } catch (error) {
    if (isCriticalError(error)) {
      throw error;
    }
    // page.evaluate failed, most likely because a navigation started
    return { status: 'error', waitTimeMs: Date.now() - startTime, mutationCount: 0 };
  }
}

/**
 * Bring the page to a quiescent state before a traversal.
 *
 * With a tracker, in-flight XHR/fetch requests are waited out as well.
 */
export async function waitForPageReady(
  page: Page,
  timeouts: EnvironmentTimeouts,
  tracker?: PageNetworkTracker
): Promise<void> {
  const logger = getLogger();

  await waitForLoadStateQuietly(page, 'domcontentloaded', timeouts.pageLoadDomContent);
  let networkIdle = await waitForNetworkQuiet(page, timeouts.pageLoadNetworkIdle);
  if (tracker) {
    networkIdle = (await tracker.waitForQuiet(timeouts.pageLoadNetworkIdle, timeouts.networkQuietWindow)) && networkIdle;
  }
  const dom = await waitForDomQuiet(page, timeouts.domQuietWindow, timeouts.domMaxWait);

  try {
    await page.waitForSelector('body', { state: 'attached', timeout: timeouts.elementWait });
  } catch (error) {
    if (isCriticalError(error)) {
      throw error;
    }
    logger.warning('Page has no body element', { url: page.url(), error: extractErrorMessage(error) });
  }

  if (!networkIdle || dom.status !== 'stable') {
    logger.debug('Observing page before it fully settled', {
      url: page.url(),
      networkIdle,
      dom: dom.status,
      mutations: dom.mutationCount,
    });
  }
}
