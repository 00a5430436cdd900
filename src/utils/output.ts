/**
 * Terminal output helpers. Responses go to stdout; status lines, warnings
 * and errors go to stderr so piped output stays clean.
 */

import pc from "picocolors";
import { OlaError } from "../types/errors.js";
import { logger } from "./logger.js";
import type { IReporter } from "../core/types.js";
import type { ITextSink } from "../core/thinking-renderer.js";

export function errorMessage(error: unknown): string {
  if (error instanceof OlaError) {
    return error.userMessage;
  }
  return error instanceof Error ? error.message : String(error);
}

/** Status lines on stderr; `quiet` silences info and success but never warnings. */
export function createReporter(quiet: boolean, stream: ITextSink = process.stderr): IReporter {
  return {
    info(message: string): void {
      if (!quiet) {
        stream.write(`${pc.cyan(message)}\n`);
      }
    },
    success(message: string): void {
      if (!quiet) {
        stream.write(`${pc.green(message)}\n`);
      }
    },
    warn(message: string): void {
      stream.write(`${pc.yellow(`Warning: ${message}`)}\n`);
    },
  };
}

/**
 * Print a command failure and set the process exit code. Typed errors show
 * their user message and recovery hint.
 */
export function reportCommandError(error: unknown, exitCode = 1): void {
  if (error instanceof OlaError) {
    logger.error({ code: error.code, error: error.message }, "Command failed");
    process.stderr.write(pc.red(`Error: ${error.userMessage}\n`));
    if (error.suggestedRecovery !== undefined) {
      process.stderr.write(pc.dim(`${error.suggestedRecovery}\n`));
    }
  } else {
    const message = errorMessage(error);
    logger.error({ error: message }, "Command failed");
    process.stderr.write(pc.red(`Error: ${message}\n`));
  }
  process.exitCode = exitCode;
}

const WAVE_COLORS: ReadonlyArray<(text: string) => string> = [
  pc.blue,
  pc.cyan,
  (text) => pc.bold(pc.blue(text)),
  (text) => pc.bold(pc.cyan(text)),
];

/** Banner printed at the start of each child recursion wave. */
export function waveBanner(wave: number): string {
  const color = WAVE_COLORS[wave % WAVE_COLORS.length] ?? pc.blue;
  return color(`[RECURSION WAVE ${wave}]  Processing...`);
}
