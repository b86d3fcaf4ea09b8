/**
 * Browser Launcher
 *
 * Starts Chromium through Playwright from an EnvironmentConfig and prepares
 * the context: default timeout and the hover tracking init script.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  chromium,
  type Browser,
  type BrowserContext,
  type BrowserContextOptions,
  type LaunchOptions,
} from 'playwright';
import type { EnvironmentConfig } from '../config/environment-config.js';
import { HOVER_TRACKER_SCRIPT } from '../observation/hover-tracker-script.js';
import { BrowserError, ErrorCode, extractErrorMessage } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

/**
 * A launched context. `browser` is null for persistent contexts, which own
 * their browser process.
 */
export interface LaunchedBrowser {
  browser: Browser | null;
  context: BrowserContext;
  persistent: boolean;
}

/**
 * Launch options shared by both launch modes.
 */
export function buildLaunchOptions(config: EnvironmentConfig): LaunchOptions {
  const args = [...config.launchArgs];
  if (config.cacheDir && !config.userDataDir) {
    args.push(`--disk-cache-dir=${path.resolve(config.cacheDir)}`);
  }

  const options: LaunchOptions = {
    headless: config.headless,
    args,
  };
  if (config.executablePath) {
    options.executablePath = config.executablePath;
  } else if (config.channel) {
    options.channel = config.channel;
  }
  if (config.proxy.enabled && config.proxy.server) {
    options.proxy = { server: config.proxy.server };
  }
  return options;
}

export function buildContextOptions(config: EnvironmentConfig): BrowserContextOptions {
  const options: BrowserContextOptions = {
    viewport: { width: config.viewport.width, height: config.viewport.height },
  };
  if (config.userAgent) options.userAgent = config.userAgent;
  if (config.extraHttpHeaders) options.extraHTTPHeaders = config.extraHttpHeaders;
  return options;
}

/**
 * Launch a browser and context from configuration.
 *
 * With `userDataDir` a persistent context is launched; otherwise a fresh
 * browser with one new context.
 *
 * @throws BrowserError when the browser cannot be started
 */
export async function launchBrowserContext(config: EnvironmentConfig): Promise<LaunchedBrowser> {
  const logger = getLogger();
  const launchOptions = buildLaunchOptions(config);
  const contextOptions = buildContextOptions(config);
  const persistent = Boolean(config.userDataDir);

  logger.info('Launching browser', {
    headless: config.headless,
    channel: config.channel,
    persistent,
    proxy: config.proxy.enabled,
  });

  let browser: Browser | null = null;
  let context: BrowserContext;
  try {
    if (config.userDataDir) {
      await fs.promises.mkdir(config.userDataDir, { recursive: true });
      context = await chromium.launchPersistentContext(config.userDataDir, {
        ...launchOptions,
        ...contextOptions,
      });
    } else {
      if (config.cacheDir) {
        await fs.promises.mkdir(config.cacheDir, { recursive: true });
      }
      browser = await chromium.launch(launchOptions);
      context = await browser.newContext(contextOptions);
    }

    context.setDefaultTimeout(config.timeouts.default);
    await context.addInitScript({ content: HOVER_TRACKER_SCRIPT });
  } catch (error) {
    if (browser) {
      await browser.close().catch((closeError: unknown) => {
        logger.debug('Browser close after failed launch also failed', {
          error: extractErrorMessage(closeError),
        });
      });
    }
    throw new BrowserError(
      `Failed to launch browser: ${extractErrorMessage(error)}`,
      ErrorCode.BROWSER_LAUNCH_FAILED,
      { persistent },
      error instanceof Error ? error : undefined
    );
  }

  logger.info('Browser launched successfully');
  return { browser, context, persistent };
}
