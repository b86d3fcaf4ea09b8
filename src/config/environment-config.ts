/**
 * Environment Configuration
 *
 * Zod schema for the browser environment, and loading from an optional JSON
 * file plus programmatic overrides.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, ErrorCode } from '../shared/errors/index.js';

// ============================================================================
// Schema
// ============================================================================

export const BrowserChannelSchema = z.enum([
  'chromium',
  'chrome',
  'chrome-beta',
  'chrome-dev',
  'chrome-canary',
  'msedge',
]);

export const ProxyConfigSchema = z.object({
  /** Route browser traffic through `server` */
  enabled: z.boolean().default(false),
  /** Proxy server, e.g. http://127.0.0.1:8080 */
  server: z.string().optional(),
});

export const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const TimeoutsSchema = z.object({
  /** Default timeout for page operations (ms) */
  default: z.number().int().nonnegative().default(30000),
  /** Wait for DOMContentLoaded before observing (ms) */
  pageLoadDomContent: z.number().int().nonnegative().default(10000),
  /** Wait for network idle before observing (ms); not an error on expiry */
  pageLoadNetworkIdle: z.number().int().nonnegative().default(5000),
  /** Time without in-flight XHR/fetch requests that counts as network quiet (ms) */
  networkQuietWindow: z.number().int().nonnegative().default(500),
  /** Mutation-free window that counts as a stable DOM (ms) */
  domQuietWindow: z.number().int().nonnegative().default(100),
  /** Upper bound on waiting for a stable DOM (ms) */
  domMaxWait: z.number().int().nonnegative().default(2000),
  /** Wait for `body` before observing (ms) */
  elementWait: z.number().int().nonnegative().default(5000),
  /** Scroll-into-view budget before a targeted action (ms) */
  actionScroll: z.number().int().nonnegative().default(500),
});

export const EnvironmentConfigSchema = z
  .object({
    headless: z.boolean().default(true),
    channel: BrowserChannelSchema.optional(),
    executablePath: z.string().optional(),
    /** Extra browser command-line arguments */
    launchArgs: z.array(z.string()).default([]),
    /** Persistent profile directory; enables a persistent context */
    userDataDir: z.string().optional(),
    /** Disk cache directory (non-persistent launches only) */
    cacheDir: z.string().optional(),
    proxy: ProxyConfigSchema.default({}),
    viewport: ViewportSchema.default({ width: 1920, height: 1080 }),
    userAgent: z.string().optional(),
    extraHttpHeaders: z.record(z.string()).optional(),
    /** Page opened by setup() and reset() */
    startUrl: z.string().default('about:blank'),
    /** Pause after every action, before observing (ms) */
    sleepAfterActionMs: z.number().int().nonnegative().default(0),
    timeouts: TimeoutsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.proxy.enabled && !config.proxy.server) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proxy', 'server'],
        message: 'proxy.server is required when proxy.enabled is true',
      });
    }
  });

export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;
export type EnvironmentConfigInput = z.input<typeof EnvironmentConfigSchema>;
export type EnvironmentTimeouts = z.infer<typeof TimeoutsSchema>;
export type BrowserChannel = z.infer<typeof BrowserChannelSchema>;

/** Environment variable naming a JSON config file */
export const CONFIG_PATH_ENV = 'WEB_ENV_CONFIG';

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  /** JSON file to read; falls back to $WEB_ENV_CONFIG */
  configPath?: string;
  /** Applied on top of the file, nested objects merged */
  overrides?: Record<string, unknown>;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge plain objects; arrays and scalars from `override` replace.
 */
export function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] =
      isPlainRecord(existing) && isPlainRecord(value) ? mergeConfig(existing, value) : value;
  }
  return merged;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const resolved = path.resolve(configPath);

  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Config file not found: ${resolved}`,
      ErrorCode.CONFIG_NOT_FOUND,
      { path: resolved },
      error instanceof Error ? error : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${resolved}`,
      ErrorCode.INVALID_CONFIG,
      { path: resolved },
      error instanceof Error ? error : undefined
    );
  }

  if (!isPlainRecord(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${resolved}`, ErrorCode.INVALID_CONFIG, {
      path: resolved,
    });
  }
  return parsed;
}

/**
 * Validate a raw config object.
 *
 * @throws ConfigError listing every invalid field
 */
export function parseEnvironmentConfig(raw: unknown): EnvironmentConfig {
  const result = EnvironmentConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid environment config: ${issues.join('; ')}`, ErrorCode.INVALID_CONFIG, {
      issues,
    });
  }
  return result.data;
}

/**
 * Load the environment configuration.
 */
export function loadEnvironmentConfig(options: LoadConfigOptions = {}): EnvironmentConfig {
  const configPath = options.configPath ?? process.env[CONFIG_PATH_ENV];
  const fromFile = configPath ? readConfigFile(configPath) : {};
  return parseEnvironmentConfig(mergeConfig(fromFile, options.overrides ?? {}));
}
