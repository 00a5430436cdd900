/**
 * Provider registry: maps provider names to adapter factories and owns
 * the client that the orchestrator talks to.
 */

import { logger } from "../utils/logger.js";
import { ConfigurationError } from "../types/errors.js";
import { DEFAULT_BASE_URLS } from "../types/model.js";
import type {
  ChunkListener,
  IProviderIdentity,
  ProviderName,
} from "../types/model.js";
import type { IProviderEntry } from "../types/config.js";
import { OpenAIAdapter } from "./openai-adapter.js";
import { AnthropicAdapter } from "./anthropic-adapter.js";
import { OllamaAdapter } from "./ollama-adapter.js";
import { GeminiAdapter } from "./gemini-adapter.js";
import { trimTrailingSlashes } from "./http.js";
import type { ILlmProvider, IProviderOptions } from "./types.js";

export type ProviderFactory = (options: IProviderOptions) => ILlmProvider;

const PROVIDER_FACTORIES: Readonly<Record<ProviderName, ProviderFactory>> = {
  OpenAI: (options) => new OpenAIAdapter(options),
  Anthropic: (options) => new AnthropicAdapter(options),
  Ollama: (options) => new OllamaAdapter(options),
  Gemini: (options) => new GeminiAdapter(options),
};

export function createProvider(
  identity: IProviderIdentity,
  timeoutMs?: number,
): ILlmProvider {
  const factory = PROVIDER_FACTORIES[identity.name];
  return factory({
    apiKey: identity.apiKey,
    baseUrl: identity.baseUrl,
    timeoutMs,
  });
}

export function identityFromEntry(entry: IProviderEntry): IProviderIdentity {
  return {
    name: entry.provider,
    baseUrl: trimTrailingSlashes(entry.baseUrl ?? DEFAULT_BASE_URLS[entry.provider]),
    apiKey: entry.apiKey,
  };
}

/**
 * Owns one concrete provider, chosen once at construction.
 */
export class ProviderClient {
  readonly identity: IProviderIdentity;
  private readonly provider: ILlmProvider;

  constructor(identity: IProviderIdentity, provider?: ILlmProvider) {
    this.identity = identity;
    this.provider = provider ?? createProvider(identity);
    logger.debug({ provider: identity.name, baseUrl: identity.baseUrl }, "Provider client ready");
  }

  static fromEntry(entry: IProviderEntry | undefined): ProviderClient {
    if (entry === undefined) {
      throw new ConfigurationError("No active provider configured. Run 'ola configure' first.");
    }
    return new ProviderClient(identityFromEntry(entry));
  }

  get name(): ProviderName {
    return this.identity.name;
  }

  send(prompt: string, model: string): Promise<string> {
    return this.provider.send({ prompt, model, streaming: false });
  }

  sendStreaming(prompt: string, model: string, onChunk: ChunkListener): Promise<string> {
    return this.provider.send({ prompt, model, streaming: true }, onChunk);
  }
}
