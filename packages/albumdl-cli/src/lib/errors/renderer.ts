import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

const MAX_WIDTH = 80;

function getTerminalWidth(): number {
  return Math.min(process.stderr.columns || MAX_WIDTH, MAX_WIDTH);
}

/**
 * Wrap text to fit within a given width. Explicit newlines are kept.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split("\n")) {
    let currentLine = "";
    for (const word of paragraph.split(" ")) {
      const testLine = currentLine ? `${currentLine} ${word}` : word;
      if (testLine.length <= maxWidth) {
        currentLine = testLine;
      } else {
        if (currentLine) lines.push(currentLine);
        currentLine = word;
      }
    }
    lines.push(currentLine);
  }

  return lines;
}

/**
 * Build the human-readable lines for an error block.
 */
export function formatStaticError(error: CLIError, width: number = getTerminalWidth()): string[] {
  const output: string[] = [""];
  const inner = width - 4;

  const [first, ...rest] = wrapText(error.message, inner);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const line of wrapText(error.details, inner)) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];

  if (error.suggestion || examples.length > 0) {
    output.push("");

    if (error.suggestion) {
      const [head, ...tail] = wrapText(error.suggestion, inner);
      output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
      for (const line of tail) {
        output.push(`    ${line}`);
      }
    }

    if (examples.length === 1) {
      output.push("");
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
    } else if (examples.length > 1) {
      output.push("");
      output.push(`  ${chalk.dim("Examples:")}`);
      for (const ex of examples.slice(0, 3)) {
        output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
      }
    }
  }

  output.push("");
  return output;
}

/**
 * Build the JSON error object, without undefined fields.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    details: error.details,
  };

  return Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      console.error(JSON.stringify(formatJsonError(error), null, 2));
      break;
    case "static":
    case "interactive":
      for (const line of formatStaticError(error)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isCLIError(error)) {
    renderError(error, mode);
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  renderError(
    new CLIError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    }),
    mode
  );
}
