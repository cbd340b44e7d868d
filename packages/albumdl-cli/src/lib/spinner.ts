/**
 * Spinner wrapper that respects quiet/JSON mode.
 * Progress always goes to stderr; stdout carries the report.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  text: string;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  text = "";

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }

  warn(_text?: string): Spinner {
    return this;
  }
}

/**
 * Wrapper around ora.
 */
class OraSpinner implements Spinner {
  private readonly ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }

  warn(text?: string): Spinner {
    this.ora.warn(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}

/**
 * Text for a running download, e.g. `Downloading 3/12 (1 failed)`.
 */
export function progressText(done: number, total: number, failed: number): string {
  const base = `Downloading ${done}/${total}`;
  return failed > 0 ? `${base} (${failed} failed)` : base;
}
