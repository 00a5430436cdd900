/**
 * Session log records and in-process conversation history
 */

// ── Session Log ──────────────────────────────────────────────────────────

/** One JSON line per completed prompt call. Keys are the on-disk format. */
export interface IPromptSessionRecord {
  readonly timestamp: string;
  readonly goals: string;
  readonly return_format: string;
  readonly warnings: string;
  readonly model: string;
  readonly output_length: number;
  readonly recursion_wave?: number | undefined;
  readonly iteration?: number | undefined;
}

export interface IRawSessionRecord {
  readonly timestamp: string;
  readonly prompt: string;
  readonly model: string;
  readonly output_length: number;
}

export type SessionRecord = IPromptSessionRecord | IRawSessionRecord;

// ── Conversation History ─────────────────────────────────────────────────

export interface IResponseEntry {
  readonly kind: "response";
  readonly iteration: number;
  readonly goals: string;
  readonly response: string;
}

export interface IFeedbackEntry {
  readonly kind: "feedback";
  readonly iteration: number;
  readonly feedback: string;
  readonly automatic: boolean;
}

export type ConversationEntry = IResponseEntry | IFeedbackEntry;

// ── Recursion ────────────────────────────────────────────────────────────

export interface IRecursionContext {
  readonly wave: number;
  readonly maxWaves: number;
}
