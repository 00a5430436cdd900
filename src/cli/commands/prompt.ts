/**
 * `ola prompt`: structured prompt from goals, return format and warnings.
 * Also the root command's default action.
 */

import { Command } from "commander";
import { addPromptOptions, resolvePromptFlags, serializePromptArgs } from "../flags.js";
import type { IPromptFlags, IResolvedPromptFlags } from "../flags.js";
import { askPromptFields } from "../interactive.js";
import type { IPromptFields } from "../interactive.js";
import { createOrchestrator, loadRuntime } from "../runtime.js";
import { loadHints } from "../../core/hints.js";
import { recursionContext } from "../../core/recursion.js";
import type { IPromptJob } from "../../core/orchestrator.js";
import { readPipedInput } from "../../utils/stdin.js";
import { reportCommandError, waveBanner } from "../../utils/output.js";
import { logger } from "../../utils/logger.js";

/** The prompt fields when goals are known without asking. */
export function knownPromptFields(
  resolved: IResolvedPromptFlags,
  defaultFormat: string,
): IPromptFields | undefined {
  if (resolved.goals === undefined) {
    return undefined;
  }
  return {
    goals: resolved.goals,
    returnFormat: resolved.returnFormat ?? defaultFormat,
    warnings: resolved.warnings ?? "",
  };
}

export interface IPromptPlanOptions {
  readonly model: string;
  readonly hints?: string | undefined;
  /** Whether stdin is a terminal someone can answer questions on. */
  readonly terminal: boolean;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export interface IPromptPlan {
  readonly job: IPromptJob;
  readonly interactiveFeedback: boolean;
  /** Printed by child waves only; the first wave is the user's own run. */
  readonly banner?: string | undefined;
}

/** Child waves get the fields as finally resolved, asked ones included. */
export function planPrompt(
  resolved: IResolvedPromptFlags,
  fields: IPromptFields,
  options: IPromptPlanOptions,
): IPromptPlan {
  const recursion =
    resolved.recursive !== undefined ? recursionContext(resolved.recursive, options.env) : undefined;

  return {
    interactiveFeedback: !resolved.autoFeedback && options.terminal,
    banner:
      recursion !== undefined && recursion.wave > 0 && !resolved.quiet ? waveBanner(recursion.wave) : undefined,
    job: {
      input: { ...fields, context: resolved.context, hints: options.hints },
      model: options.model,
      output: {
        streaming: resolved.streaming,
        hideThinking: resolved.hideThinking,
        stripThinking: false,
      },
      clipboard: resolved.clipboard,
      iterations: resolved.iterations,
      recursion,
      nextWaveArgs:
        resolved.recursive !== undefined
          ? serializePromptArgs({ ...resolved, ...fields, recursive: resolved.recursive })
          : undefined,
    },
  };
}

export async function runPrompt(flags: IPromptFlags): Promise<void> {
  const runtime = loadRuntime();
  const { settings } = runtime;

  const piped = flags.pipe === true ? await readPipedInput() : undefined;
  const resolved = resolvePromptFlags(flags, settings.defaults, piped);
  const fields =
    knownPromptFields(resolved, settings.defaults.returnFormat) ??
    (await askPromptFields(resolved, settings.defaults.returnFormat));

  const plan = planPrompt(resolved, fields, {
    model: runtime.model,
    hints: await loadHints(),
    terminal: process.stdin.isTTY === true,
  });
  if (plan.banner !== undefined) {
    process.stderr.write(`${plan.banner}\n`);
  }
  const { recursion } = plan.job;

  const { orchestrator, reporter } = createOrchestrator(runtime, {
    quiet: resolved.quiet,
    interactiveFeedback: plan.interactiveFeedback,
    recursive: recursion !== undefined,
  });
  reporter.info(`Using model: ${runtime.model}`);
  logger.debug({ provider: runtime.client.name, model: runtime.model, wave: recursion?.wave }, "Prompt run");

  const outcome = await orchestrator.run(plan.job);
  if (outcome.exitCode !== 0) {
    process.exitCode = outcome.exitCode;
  }
}

export function createPromptCommand(): Command {
  return addPromptOptions(
    new Command("prompt").description("Send a structured prompt built from goals, format and warnings"),
  ).action(async (flags: IPromptFlags) => {
    try {
      await runPrompt(flags);
    } catch (error: unknown) {
      reportCommandError(error);
    }
  });
}
