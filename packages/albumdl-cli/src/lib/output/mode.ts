/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "interactive" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `interactive`: terminal with a live spinner
 * - `static`: plain text output (for CI, pipes, redirected stderr)
 * - `json`: structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stderr.isTTY === true
): OutputMode {
  if (argv.includes("--json") || isTruthy(env.ALBUMDL_JSON)) {
    return "json";
  }

  if (env.CI || env.TERM === "dumb") {
    return "static";
  }

  // Progress goes to stderr, so that is the stream that must be a terminal
  if (!isTTY) {
    return "static";
  }

  return "interactive";
}

export function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}
