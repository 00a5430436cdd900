/**
 * ola: main barrel export.
 * Public API surface for programmatic usage.
 */

// ── Types ───────────────────────────────────────────────────────────────

export * from "./types/index.js";

// ── Providers ───────────────────────────────────────────────────────────

export {
  OpenAIAdapter,
  AnthropicAdapter,
  OllamaAdapter,
  GeminiAdapter,
  ProviderClient,
  createProvider,
  identityFromEntry,
  listModels,
} from "./providers/index.js";
export type { ILlmProvider, IProviderOptions, ProviderFactory } from "./providers/index.js";

// ── Core ────────────────────────────────────────────────────────────────

export * from "./core/index.js";

// ── Storage ─────────────────────────────────────────────────────────────

export * from "./storage/index.js";

// ── Auth ────────────────────────────────────────────────────────────────

export * from "./auth/index.js";

// ── Utilities ───────────────────────────────────────────────────────────

export * from "./utils/index.js";
