/**
 * Page Network Tracker
 *
 * Counts in-flight requests of one page so that the environment can wait for
 * XHR/fetch traffic an action started, which the `networkidle` load state
 * does not cover once the page has loaded.
 *
 * A main-frame navigation starts a new generation: late events for requests
 * of the previous document are ignored.
 */

import type { Frame, Page, Request } from 'playwright';

/** Time with zero in-flight requests that counts as idle */
export const DEFAULT_NETWORK_QUIET_WINDOW_MS = 500;

interface QuietWaiter {
  resolve: (idle: boolean) => void;
  timeoutId: NodeJS.Timeout;
}

export class PageNetworkTracker {
  private page: Page | null = null;
  private readonly inflight = new Set<Request>();
  private generation = 0;
  private readonly generationOf = new WeakMap<Request, number>();

  private quietTimer: NodeJS.Timeout | null = null;
  private quietWindowMs = DEFAULT_NETWORK_QUIET_WINDOW_MS;
  private waiters: QuietWaiter[] = [];

  private readonly onRequest = (request: Request): void => {
    if (request.resourceType() === 'websocket') return;
    this.generationOf.set(request, this.generation);
    this.inflight.add(request);
    this.cancelQuietTimer();
  };

  private readonly onRequestDone = (request: Request): void => {
    if (this.generationOf.get(request) !== this.generation) return;
    if (!this.inflight.delete(request)) return;
    this.checkQuiet();
  };

  private readonly onFrameNavigated = (frame: Frame): void => {
    if (!this.page || frame !== this.page.mainFrame()) return;
    this.markNavigation();
  };

  /**
   * Start listening on `page`. Re-attaching detaches the previous page first.
   */
  attach(page: Page): void {
    if (this.page) this.detach();

    this.page = page;
    this.generation++;
    this.inflight.clear();

    page.on('request', this.onRequest);
    page.on('requestfinished', this.onRequestDone);
    page.on('requestfailed', this.onRequestDone);
    page.on('framenavigated', this.onFrameNavigated);
  }

  /**
   * Stop listening; pending waits resolve with `false`.
   */
  detach(): void {
    if (this.page) {
      this.page.off('request', this.onRequest);
      this.page.off('requestfinished', this.onRequestDone);
      this.page.off('requestfailed', this.onRequestDone);
      this.page.off('framenavigated', this.onFrameNavigated);
      this.page = null;
    }

    this.cancelQuietTimer();
    this.inflight.clear();
    this.settleWaiters(false);
  }

  /**
   * Forget requests of the previous document.
   */
  markNavigation(): void {
    this.generation++;
    this.inflight.clear();
    this.checkQuiet();
  }

  /**
   * Resolve `true` once no request has been in flight for `quietWindowMs`,
   * or `false` after `timeoutMs`. Never rejects.
   */
  waitForQuiet(timeoutMs: number, quietWindowMs = DEFAULT_NETWORK_QUIET_WINDOW_MS): Promise<boolean> {
    this.quietWindowMs = quietWindowMs;

    return new Promise<boolean>((resolve) => {
      const timeoutId = setTimeout(() => {
        this.waiters = this.waiters.filter((waiter) => waiter.timeoutId !== timeoutId);
        resolve(false);
      }, timeoutMs);

      this.waiters.push({ resolve, timeoutId });
      if (this.inflight.size === 0) this.startQuietTimer();
    });
  }

  getInflightCount(): number {
    return this.inflight.size;
  }

  isAttached(): boolean {
    return this.page !== null;
  }

  private checkQuiet(): void {
    if (this.inflight.size === 0 && this.waiters.length > 0) this.startQuietTimer();
  }

  private startQuietTimer(): void {
    this.cancelQuietTimer();
    this.quietTimer = setTimeout(() => {
      this.quietTimer = null;
      this.settleWaiters(true);
    }, this.quietWindowMs);
  }

  private cancelQuietTimer(): void {
    if (this.quietTimer) {
      clearTimeout(this.quietTimer);
      this.quietTimer = null;
    }
  }

  private settleWaiters(idle: boolean): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const { resolve, timeoutId } of waiters) {
      clearTimeout(timeoutId);
      resolve(idle);
    }
  }
}

// --- Page-scoped registry ---

const trackers = new WeakMap<Page, PageNetworkTracker>();

/**
 * Tracker for `page`, created and attached on first use.
 */
export function getOrCreateTracker(page: Page): PageNetworkTracker {
  let tracker = trackers.get(page);
  if (!tracker) {
    tracker = new PageNetworkTracker();
    tracker.attach(page);
    trackers.set(page, tracker);
  }
  return tracker;
}

export function removeTracker(page: Page): void {
  const tracker = trackers.get(page);
  if (tracker) {
    tracker.detach();
    trackers.delete(page);
  }
}

export function hasTracker(page: Page): boolean {
  return trackers.has(page);
}
