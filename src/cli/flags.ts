/**
 * Prompt flag definitions shared by the root command, `prompt` and the
 * argument list handed to each recursion wave.
 */

import { Command, InvalidArgumentError } from "commander";
import type { IDefaultFlags } from "../types/config.js";

export const MIN_REPEAT = 1;
export const MAX_REPEAT = 10;

/** Options as commander parses them; negated flags arrive as `thinking` and `stream`. */
export interface IPromptFlags {
  readonly goals?: string | undefined;
  readonly format?: string | undefined;
  readonly warnings?: string | undefined;
  readonly context?: string | undefined;
  readonly clipboard?: boolean | undefined;
  readonly quiet?: boolean | undefined;
  readonly pipe?: boolean | undefined;
  readonly thinking?: boolean | undefined;
  readonly stream?: boolean | undefined;
  readonly recursive?: number | undefined;
  readonly iterations?: number | undefined;
  readonly autoFeedback?: boolean | undefined;
}

/** Flags merged with settings defaults and piped input. */
export interface IResolvedPromptFlags {
  /** Undefined when goals must be asked for. */
  readonly goals?: string | undefined;
  readonly returnFormat?: string | undefined;
  readonly warnings?: string | undefined;
  readonly context?: string | undefined;
  readonly clipboard: boolean;
  readonly quiet: boolean;
  readonly hideThinking: boolean;
  readonly streaming: boolean;
  readonly recursive?: number | undefined;
  readonly iterations?: number | undefined;
  readonly autoFeedback: boolean;
}

export function parseBoundedInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < MIN_REPEAT || parsed > MAX_REPEAT) {
    throw new InvalidArgumentError(`Must be a whole number from ${MIN_REPEAT} to ${MAX_REPEAT}.`);
  }
  return parsed;
}

export function addPromptOptions(command: Command): Command {
  return command
    .option("-g, --goals <goals>", "What the response should achieve")
    .option("-f, --format <format>", "Return format")
    .option("-w, --warnings <warnings>", "Warnings or constraints")
    .option("--context <text>", "Additional context for the prompt")
    .option("-c, --clipboard", "Copy the final response to the clipboard")
    .option("-q, --quiet", "Suppress status messages")
    .option("-p, --pipe", "Read piped input from stdin")
    .option("-t, --no-thinking", "Hide <think> blocks from live output")
    .option("--no-stream", "Wait for the complete response before printing")
    .option("-r, --recursive <waves>", "Run this many recursive waves (1-10)", parseBoundedInt)
    .option("-i, --iterations <rounds>", "Refine the response over this many rounds (1-10)", parseBoundedInt)
    .option("--auto-feedback", "Use automatic feedback between rounds");
}

function joinContext(...parts: ReadonlyArray<string | undefined>): string | undefined {
  const present = parts.filter((part): part is string => part !== undefined && part !== "");
  return present.length > 0 ? present.join("\n") : undefined;
}

/**
 * Piped input becomes the goals when none were given, otherwise context.
 * Explicit context comes first.
 */
export function resolvePromptFlags(
  flags: IPromptFlags,
  defaults: IDefaultFlags,
  piped?: string,
): IResolvedPromptFlags {
  const goalsFromPipe = flags.goals === undefined && piped !== undefined;
  const goals = flags.goals ?? piped;

  return {
    goals,
    returnFormat: flags.format ?? (goals !== undefined ? defaults.returnFormat : undefined),
    warnings: flags.warnings ?? (goals !== undefined ? "" : undefined),
    context: joinContext(flags.context, goalsFromPipe ? undefined : piped),
    clipboard: flags.clipboard === true || defaults.clipboard,
    quiet: flags.quiet === true || defaults.quiet,
    hideThinking: flags.thinking === false || defaults.noThinking,
    streaming: flags.stream !== false,
    recursive: flags.recursive,
    iterations: flags.iterations,
    autoFeedback: flags.autoFeedback === true,
  };
}

export interface IWaveArgs {
  readonly goals: string;
  readonly returnFormat: string;
  readonly warnings: string;
  readonly context?: string | undefined;
  readonly clipboard: boolean;
  readonly quiet: boolean;
  readonly hideThinking: boolean;
  readonly streaming: boolean;
  readonly recursive: number;
  readonly iterations?: number | undefined;
  readonly autoFeedback: boolean;
}

/**
 * Arguments that make a child process run the same prompt as the next wave.
 * Text values use the `--name=value` form so a leading dash stays a value.
 */
export function serializePromptArgs(args: IWaveArgs): string[] {
  const argv = [
    "prompt",
    `--goals=${args.goals}`,
    `--format=${args.returnFormat}`,
    `--warnings=${args.warnings}`,
  ];
  if (args.context !== undefined && args.context !== "") {
    argv.push(`--context=${args.context}`);
  }
  if (args.clipboard) {
    argv.push("-c");
  }
  if (args.quiet) {
    argv.push("-q");
  }
  if (args.hideThinking) {
    argv.push("-t");
  }
  if (!args.streaming) {
    argv.push("--no-stream");
  }
  argv.push("-r", String(args.recursive));
  if (args.iterations !== undefined) {
    argv.push("-i", String(args.iterations));
  }
  if (args.autoFeedback) {
    argv.push("--auto-feedback");
  }
  return argv;
}
