/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

import { isTruthy } from "./output/mode.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Request timeout in milliseconds, when overridden */
  timeout?: number;
  /** Retry attempts per request or transfer, when overridden */
  retry?: number;
  /** API client id from the environment */
  clientId?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function parsePositiveInt(raw: string | undefined, allowZero: boolean): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (isNaN(value)) return undefined;
  if (value < 0 || (value === 0 && !allowZero)) return undefined;
  return value;
}

function flagValue(argv: string[], flag: string): string | undefined {
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (inline) return inline.slice(flag.length + 1);
  const idx = argv.indexOf(flag);
  return idx !== -1 ? argv[idx + 1] : undefined;
}

/**
 * Initialize CLI context from command line arguments and environment.
 * Flags win over environment variables.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (isTruthy(env.ALBUMDL_JSON) || argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (isTruthy(env.ALBUMDL_QUIET) || argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  currentContext.timeout =
    parsePositiveInt(flagValue(argv, "--timeout"), false) ??
    parsePositiveInt(env.ALBUMDL_TIMEOUT, false);

  currentContext.retry =
    parsePositiveInt(flagValue(argv, "--retry"), true) ??
    parsePositiveInt(env.ALBUMDL_RETRY, true);

  if (env.ALBUMDL_CLIENT_ID) {
    currentContext.clientId = env.ALBUMDL_CLIENT_ID;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
