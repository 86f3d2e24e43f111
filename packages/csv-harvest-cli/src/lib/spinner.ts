/**
 * Progress display for long runs. Silent unless stderr is an interactive
 * terminal and neither quiet nor JSON mode is on.
 */

import ora, { type Ora } from "ora";
import { isQuietMode } from "./cli-context.js";
import { getOutputMode } from "./output/mode.js";

export interface Spinner {
  start(text: string): void;
  /** Show "[done/total] label" while a batch is running */
  progress(done: number, total: number, label: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

/**
 * Progress label such as "[ 3/120] https://img.example.test/a.jpg".
 */
export function progressText(done: number, total: number, label: string): string {
  const width = String(total).length;
  return `[${String(done).padStart(width)}/${total}] ${label}`;
}

class SilentSpinner implements Spinner {
  start(_text: string): void {}
  progress(_done: number, _total: number, _label: string): void {}
  succeed(_text: string): void {}
  fail(_text: string): void {}
}

class OraSpinner implements Spinner {
  // stdout carries the summary; progress goes to stderr
  private readonly ora: Ora = ora({ stream: process.stderr });

  start(text: string): void {
    this.ora.start(text);
  }

  progress(done: number, total: number, label: string): void {
    this.ora.text = progressText(done, total, label);
  }

  succeed(text: string): void {
    this.ora.succeed(text);
  }

  fail(text: string): void {
    // nothing to clear if the run failed before start()
    if (this.ora.isSpinning) {
      this.ora.fail(text);
    }
  }
}

export function createSpinner(): Spinner {
  if (isQuietMode() || getOutputMode() !== "interactive") {
    return new SilentSpinner();
  }
  return new OraSpinner();
}
