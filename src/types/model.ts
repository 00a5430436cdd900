/**
 * Provider and model types.
 */

// ── Providers ────────────────────────────────────────────────────────────

export type ProviderName = "OpenAI" | "Anthropic" | "Ollama" | "Gemini";

export const PROVIDER_NAMES: readonly ProviderName[] = [
  "OpenAI",
  "Anthropic",
  "Ollama",
  "Gemini",
];

export const DEFAULT_BASE_URLS: Readonly<Record<ProviderName, string>> = {
  OpenAI: "https://api.openai.com",
  Anthropic: "https://api.anthropic.com",
  Ollama: "http://localhost:11434",
  Gemini: "https://generativelanguage.googleapis.com",
};

/** Immutable once a client is built from it. */
export interface IProviderIdentity {
  readonly name: ProviderName;
  readonly baseUrl: string;
  /** May be empty for local providers. */
  readonly apiKey: string;
}

// ── Invocation ───────────────────────────────────────────────────────────

export interface IInvocationRequest {
  readonly prompt: string;
  readonly model: string;
  readonly streaming: boolean;
}

/** Receives each raw fragment in arrival order. */
export type ChunkListener = (chunk: string) => void;

export interface IAccumulatedResponse {
  readonly text: string;
  readonly model: string;
}

// ── Model Catalog ────────────────────────────────────────────────────────

export const STATIC_MODELS: Readonly<Record<Exclude<ProviderName, "Ollama">, readonly string[]>> = {
  OpenAI: ["gpt-4o", "gpt-4", "o3", "o3-pro", "o4", "o4-mini", "o4-mini-high"],
  Anthropic: [
    "claude-3-opus-20240229",
    "claude-3-sonnet-20240229",
    "claude-3-haiku-20240307",
    "claude-2.1",
    "claude-2.0",
  ],
  Gemini: ["gemini-1.5-pro", "gemini-1.5-flash", "gemini-1.0-pro", "gemini-1.0-pro-vision"],
};

export const MAX_OUTPUT_TOKENS = 2048;
export const REQUEST_TIMEOUT_MS = 120_000;
