/**
 * Contracts between the orchestrator and its collaborators.
 */

import type { ChunkListener } from "../types/model.js";
import type { SessionRecord } from "../types/session.js";

/** What the orchestrator needs from a provider client. */
export interface IPromptSender {
  send(prompt: string, model: string): Promise<string>;
  sendStreaming(prompt: string, model: string, onChunk: ChunkListener): Promise<string>;
}

/** Rejects with LoggingError. */
export interface ISessionSink {
  append(record: SessionRecord): Promise<void>;
}

/** Rejects with ClipboardError. */
export interface IClipboardSink {
  copy(text: string): Promise<void>;
}

/** Human-facing status lines, kept off stdout. */
export interface IReporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}
