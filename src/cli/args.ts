/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for the tool server. Values given here
 * override the JSON config file.
 */

/**
 * Server configuration from CLI arguments
 */
export interface ServerArgs {
  /** Run browser in headless mode */
  headless?: boolean;

  /** JSON config file */
  config?: string;

  /** Page opened by setup and reset */
  startUrl?: string;

  /** Persistent profile directory */
  userDataDir?: string;

  /** Browser channel (chromium, chrome, msedge, ...) */
  channel?: string;

  /** Path to the browser executable */
  executablePath?: string;

  /** Proxy server; enables the proxy */
  proxy?: string;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set([
  'headless',
  'config',
  'startUrl',
  'userDataDir',
  'channel',
  'executablePath',
  'proxy',
]);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const baseName = arg.slice(2).split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

/**
 * Parse command-line arguments into ServerArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ServerArgs {
  const args: ServerArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--headless=false' || arg === '--headless=0') {
      args.headless = false;
    } else if (arg === '--headless=true' || arg === '--headless=1' || arg === '--headless') {
      args.headless = true;
    } else if (arg === '--config' && argv[i + 1]) {
      args.config = argv[++i];
    } else if (arg === '--startUrl' && argv[i + 1]) {
      args.startUrl = argv[++i];
    } else if (arg === '--userDataDir' && argv[i + 1]) {
      args.userDataDir = argv[++i];
    } else if (arg === '--channel' && argv[i + 1]) {
      args.channel = argv[++i];
    } else if (arg === '--executablePath' && argv[i + 1]) {
      args.executablePath = argv[++i];
    } else if (arg === '--proxy' && argv[i + 1]) {
      args.proxy = argv[++i];
    } else if (!isKnownArg(arg)) {
      // Warn about unknown arguments to catch typos like --hedless
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}

/**
 * Config overrides for the values given on the command line.
 */
export function toConfigOverrides(args: ServerArgs): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (args.headless !== undefined) overrides.headless = args.headless;
  if (args.startUrl) overrides.startUrl = args.startUrl;
  if (args.userDataDir) overrides.userDataDir = args.userDataDir;
  if (args.channel) overrides.channel = args.channel;
  if (args.executablePath) overrides.executablePath = args.executablePath;
  if (args.proxy) overrides.proxy = { enabled: true, server: args.proxy };
  return overrides;
}
