/**
 * Orchestrator: drives one logical request through single-shot,
 * iterative-feedback or recursive-wave invocation.
 *
 * Each round assembles a prompt, streams the response, and appends a
 * session record. Clipboard copy happens once, after the final round of
 * the final wave. Fatal errors propagate to the caller and stop further
 * rounds and waves; logging and clipboard failures are reported as
 * warnings.
 */

import { logger } from "../utils/logger.js";
import { OlaError } from "../types/errors.js";
import type { IPromptTemplate } from "../types/config.js";
import type { IAccumulatedResponse } from "../types/model.js";
import type {
  ConversationEntry,
  IPromptSessionRecord,
  IRawSessionRecord,
  IRecursionContext,
} from "../types/session.js";
import {
  assembleIterationPrompt,
  assemblePrompt,
  assembleRawPrompt,
} from "./prompt-assembler.js";
import type { IPromptInput } from "./prompt-assembler.js";
import { ResponseStreamer } from "./response-stream.js";
import type { IResponseOptions, IResponseSinks } from "./response-stream.js";
import { AUTO_FEEDBACK } from "./feedback.js";
import type { FeedbackDecision, IFeedbackSource } from "./feedback.js";
import { hasNextWave } from "./recursion.js";
import type { IWaveLauncher } from "./recursion.js";
import type {
  IClipboardSink,
  IPromptSender,
  IReporter,
  ISessionSink,
} from "./types.js";

// ── Jobs ─────────────────────────────────────────────────────────────────

export interface IPromptJob {
  readonly input: IPromptInput;
  readonly model: string;
  readonly output: IResponseOptions;
  readonly clipboard: boolean;
  /** Run an iterative-feedback session of this many rounds. */
  readonly iterations?: number | undefined;
  /** Part of a recursive run; `nextWaveArgs` re-creates this job in a child. */
  readonly recursion?: IRecursionContext | undefined;
  readonly nextWaveArgs?: readonly string[] | undefined;
}

export interface IRawPromptJob {
  readonly prompt: string;
  readonly context?: string | undefined;
  readonly hints?: string | undefined;
  readonly model: string;
  readonly output: IResponseOptions;
  readonly clipboard: boolean;
}

export interface IOrchestrationOutcome {
  readonly response: IAccumulatedResponse;
  /** Empty outside iterative sessions. */
  readonly history: readonly ConversationEntry[];
  /** The child wave's exit code when one ran, otherwise 0. */
  readonly exitCode: number;
}

export interface IOrchestratorDeps {
  readonly client: IPromptSender;
  readonly sinks: IResponseSinks;
  readonly template: IPromptTemplate;
  readonly reporter: IReporter;
  /** Absent when session logging is disabled. */
  readonly sessionLog?: ISessionSink | undefined;
  readonly clipboard?: IClipboardSink | undefined;
  readonly feedback?: IFeedbackSource | undefined;
  readonly launcher?: IWaveLauncher | undefined;
  readonly now?: (() => Date) | undefined;
}

interface IRoundResult {
  readonly response: IAccumulatedResponse;
  readonly history: readonly ConversationEntry[];
}

// ── Orchestrator ─────────────────────────────────────────────────────────

export class Orchestrator {
  private readonly deps: IOrchestratorDeps;
  private readonly streamer: ResponseStreamer;

  constructor(deps: IOrchestratorDeps) {
    this.deps = deps;
    this.streamer = new ResponseStreamer(deps.client, deps.sinks);
  }

  async run(job: IPromptJob): Promise<IOrchestrationOutcome> {
    const finalWave = job.recursion === undefined || !hasNextWave(job.recursion);

    const result =
      job.iterations !== undefined
        ? await this.runIterations(job, job.iterations)
        : await this.runSingleShot(job);

    if (finalWave && job.clipboard) {
      await this.copyToClipboard(result.response.text);
    }

    const exitCode = await this.continueRecursion(job);
    return { ...result, exitCode };
  }

  async runRaw(job: IRawPromptJob): Promise<IAccumulatedResponse> {
    const prompt = assembleRawPrompt(job.prompt, job.context, job.hints);
    const response = await this.streamer.run(prompt, job.model, job.output);

    const record: IRawSessionRecord = {
      timestamp: this.timestamp(),
      prompt: job.prompt,
      model: job.model,
      output_length: Buffer.byteLength(response.text, "utf8"),
    };
    await this.appendSession(record);

    if (job.clipboard) {
      await this.copyToClipboard(response.text);
    }
    return response;
  }

  // ── Modes ──────────────────────────────────────────────────────────────

  private async runSingleShot(job: IPromptJob): Promise<IRoundResult> {
    const prompt = assemblePrompt(job.input, this.deps.template);
    const response = await this.streamer.run(prompt, job.model, job.output);
    await this.logRound(job, job.input, response, undefined);
    return { response, history: [] };
  }

  private async runIterations(job: IPromptJob, maxIterations: number): Promise<IRoundResult> {
    const history: ConversationEntry[] = [];
    let input = job.input;
    let response: IAccumulatedResponse | undefined;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      this.deps.reporter.info(`[ITERATION ${iteration}/${maxIterations}]`);

      const base = assemblePrompt(input, this.deps.template);
      const prompt = assembleIterationPrompt(base, history);
      response = await this.streamer.run(prompt, job.model, job.output);

      history.push({ kind: "response", iteration, goals: input.goals, response: response.text });
      await this.logRound(job, input, response, iteration);

      if (iteration === maxIterations) {
        break;
      }

      const decision = await this.nextFeedback(iteration, maxIterations, input.goals, history);
      if (decision.kind === "finish") {
        this.deps.reporter.info(`Finished after ${iteration} of ${maxIterations} iterations`);
        break;
      }

      input = applyDecision(input, decision);
      history.push(feedbackEntry(iteration, decision));
    }

    if (response === undefined) {
      throw new RangeError(`Iteration count must be at least 1, got ${maxIterations}`);
    }
    return { response, history };
  }

  private async nextFeedback(
    iteration: number,
    maxIterations: number,
    goals: string,
    history: readonly ConversationEntry[],
  ): Promise<FeedbackDecision> {
    if (this.deps.feedback === undefined) {
      return { kind: "auto" };
    }
    return this.deps.feedback.next({ iteration, maxIterations, goals, history });
  }

  private async continueRecursion(job: IPromptJob): Promise<number> {
    const recursion = job.recursion;
    if (recursion === undefined) {
      return 0;
    }

    if (!hasNextWave(recursion)) {
      this.deps.reporter.info(`Reached maximum recursion depth (${recursion.maxWaves} waves)`);
      return 0;
    }

    if (this.deps.launcher === undefined || job.nextWaveArgs === undefined) {
      throw new Error("Recursive run requested without a wave launcher");
    }

    const nextWave = recursion.wave + 1;
    this.deps.reporter.info(`Launching recursion wave ${nextWave}...`);
    const exitCode = await this.deps.launcher.launch(nextWave, job.nextWaveArgs);
    if (exitCode !== 0) {
      this.deps.reporter.warn(`Recursion wave ${nextWave} failed with status: ${exitCode}`);
    }
    return exitCode;
  }

  // ── Sinks ──────────────────────────────────────────────────────────────

  private async logRound(
    job: IPromptJob,
    input: IPromptInput,
    response: IAccumulatedResponse,
    iteration: number | undefined,
  ): Promise<void> {
    const record: IPromptSessionRecord = {
      timestamp: this.timestamp(),
      goals: input.goals,
      return_format: input.returnFormat,
      warnings: input.warnings,
      model: response.model,
      output_length: Buffer.byteLength(response.text, "utf8"),
      ...(job.recursion !== undefined ? { recursion_wave: job.recursion.wave } : {}),
      ...(iteration !== undefined ? { iteration } : {}),
    };
    await this.appendSession(record);
  }

  private async appendSession(record: IPromptSessionRecord | IRawSessionRecord): Promise<void> {
    if (this.deps.sessionLog === undefined) {
      return;
    }
    try {
      await this.deps.sessionLog.append(record);
    } catch (error: unknown) {
      this.reportSinkFailure(error);
    }
  }

  private async copyToClipboard(text: string): Promise<void> {
    if (this.deps.clipboard === undefined) {
      return;
    }
    try {
      await this.deps.clipboard.copy(text);
      this.deps.reporter.success("Response copied to clipboard");
    } catch (error: unknown) {
      this.reportSinkFailure(error);
    }
  }

  private reportSinkFailure(error: unknown): void {
    if (!(error instanceof OlaError)) {
      throw error;
    }
    logger.warn({ code: error.code }, error.message);
    this.deps.reporter.warn(error.userMessage);
  }

  private timestamp(): string {
    return (this.deps.now?.() ?? new Date()).toISOString();
  }
}

// ── Feedback Application ─────────────────────────────────────────────────

function applyDecision(input: IPromptInput, decision: FeedbackDecision): IPromptInput {
  switch (decision.kind) {
    case "change-goals":
      return decision.goals.trim() === "" ? input : { ...input, goals: decision.goals };
    case "add-context": {
      if (decision.context.trim() === "") {
        return input;
      }
      const context =
        input.context !== undefined && input.context !== ""
          ? `${input.context}\n${decision.context}`
          : decision.context;
      return { ...input, context };
    }
    default:
      return input;
  }
}

function feedbackEntry(iteration: number, decision: FeedbackDecision): ConversationEntry {
  switch (decision.kind) {
    case "feedback":
      return decision.text.trim() === ""
        ? { kind: "feedback", iteration, feedback: AUTO_FEEDBACK, automatic: true }
        : { kind: "feedback", iteration, feedback: decision.text.trim(), automatic: false };
    case "change-goals":
      return { kind: "feedback", iteration, feedback: `Goals changed to: ${decision.goals}`, automatic: false };
    case "add-context":
      return { kind: "feedback", iteration, feedback: `Additional context: ${decision.context}`, automatic: false };
    case "auto":
    case "finish":
      return { kind: "feedback", iteration, feedback: AUTO_FEEDBACK, automatic: true };
  }
}
