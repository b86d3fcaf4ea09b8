/**
 * Server Configuration
 *
 * Global server state: the environment configuration built from CLI args,
 * the config file and environment variables, and the lazily set-up
 * environment the tools share.
 */

import { parseArgs, toConfigOverrides } from '../cli/args.js';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment-config.js';
import { WebEnvironment } from '../environment/web-environment.js';

// Singleton instances
let environmentConfig: EnvironmentConfig | null = null;
let environment: WebEnvironment | null = null;
let setupInFlight: Promise<void> | null = null;

/**
 * Initialize server configuration from CLI arguments and environment variables.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @throws ConfigError when the resulting configuration is invalid
 */
export function initServerConfig(argv: string[]): EnvironmentConfig {
  const args = parseArgs(argv);
  environmentConfig = loadEnvironmentConfig({
    configPath: args.config,
    overrides: toConfigOverrides(args),
  });
  return environmentConfig;
}

/**
 * Get the current environment configuration.
 * Throws if not initialized.
 */
export function getEnvironmentConfig(): EnvironmentConfig {
  if (!environmentConfig) {
    throw new Error('Server config not initialized. Call initServerConfig() first.');
  }
  return environmentConfig;
}

/**
 * Get or create the WebEnvironment singleton.
 */
export function getEnvironment(): WebEnvironment {
  environment ??= new WebEnvironment(getEnvironmentConfig());
  return environment;
}

/**
 * Set up the environment on first use.
 *
 * Concurrent callers share one setup.
 */
export async function ensureEnvironmentReady(): Promise<WebEnvironment> {
  const env = getEnvironment();
  if (env.isReady()) return env;

  setupInFlight ??= env.setup().then(
    () => {
      setupInFlight = null;
    },
    (error: unknown) => {
      setupInFlight = null;
      throw error;
    }
  );
  await setupInFlight;
  return env;
}

/**
 * Close the browser if one was started.
 */
export async function shutdownEnvironment(): Promise<void> {
  if (environment) {
    await environment.close();
  }
}

/**
 * Inject an environment (for testing).
 */
export function setEnvironment(env: WebEnvironment | null): void {
  environment = env;
}

/**
 * Reset server state (for testing).
 */
export function resetServerState(): void {
  environmentConfig = null;
  environment = null;
  setupInFlight = null;
}
