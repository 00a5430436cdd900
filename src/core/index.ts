/**
 * Core request pipeline barrel export
 */

export { ThinkingFilter, stripThinkingBlocks, OPEN_TAG, CLOSE_TAG } from "./thinking-filter.js";
export type { ThinkingEvent, ThinkingState } from "./thinking-filter.js";

export { ThinkingRenderer } from "./thinking-renderer.js";
export type { ITextSink } from "./thinking-renderer.js";

export {
  assemblePrompt,
  assembleRawPrompt,
  assembleIterationPrompt,
  formatProjectSection,
  appendHints,
  truncateUtf8,
  MAX_FILE_BYTES,
} from "./prompt-assembler.js";
export type { IPromptInput, ITruncatedText } from "./prompt-assembler.js";

export { loadHints } from "./hints.js";

export { ResponseStreamer } from "./response-stream.js";
export type { IResponseOptions, IResponseSinks } from "./response-stream.js";

export { AutomaticFeedbackSource, InteractiveFeedbackSource, AUTO_FEEDBACK } from "./feedback.js";
export type { FeedbackDecision, IFeedbackRequest, IFeedbackSource } from "./feedback.js";

export {
  ProcessWaveLauncher,
  readRecursionWave,
  recursionContext,
  hasNextWave,
  RECURSION_ENV_VAR,
} from "./recursion.js";
export type { IWaveLauncher } from "./recursion.js";

export { Orchestrator } from "./orchestrator.js";
export type {
  IPromptJob,
  IRawPromptJob,
  IOrchestrationOutcome,
  IOrchestratorDeps,
} from "./orchestrator.js";

export type { IPromptSender, ISessionSink, IClipboardSink, IReporter } from "./types.js";
