/**
 * Unified provider interface.
 * OpenAI, Anthropic, Ollama and Gemini adapters all implement ILlmProvider.
 */

import type {
  ChunkListener,
  IInvocationRequest,
  ProviderName,
} from "../types/model.js";

export interface ILlmProvider {
  readonly name: ProviderName;

  /**
   * Send one prompt and resolve with the full response text. When
   * `request.streaming` is set, each fragment reaches `onChunk` before it
   * is appended to the result.
   */
  send(request: IInvocationRequest, onChunk?: ChunkListener): Promise<string>;
}

export interface IProviderOptions {
  readonly apiKey?: string | undefined;
  readonly baseUrl?: string | undefined;
  /** Whole-exchange timeout, body included. */
  readonly timeoutMs?: number | undefined;
}
