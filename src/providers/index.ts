/**
 * Provider module: barrel export
 */

export type { ILlmProvider, IProviderOptions } from "./types.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export { AnthropicAdapter } from "./anthropic-adapter.js";
export { OllamaAdapter } from "./ollama-adapter.js";
export { GeminiAdapter } from "./gemini-adapter.js";
export {
  ProviderClient,
  createProvider,
  identityFromEntry,
} from "./registry.js";
export type { ProviderFactory } from "./registry.js";
export { listModels } from "./models.js";
export { withRequestTimeout, postJson, readJsonBody } from "./http.js";
export { readLines, eventPayload, parseStreamLine } from "./stream.js";
