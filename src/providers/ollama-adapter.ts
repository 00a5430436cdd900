/**
 * Ollama adapter: local models over /api/generate.
 * Streaming responses are newline-delimited JSON with no end sentinel.
 * Dynamic model listing from the Ollama API.
 */

import { z } from "zod";
import { logger } from "../utils/logger.js";
import {
  DEFAULT_BASE_URLS,
  MAX_OUTPUT_TOKENS,
  REQUEST_TIMEOUT_MS,
} from "../types/model.js";
import type {
  ChunkListener,
  IInvocationRequest,
  ProviderName,
} from "../types/model.js";
import { ProviderHttpError } from "../types/errors.js";
import {
  postJson,
  readJsonBody,
  trimTrailingSlashes,
  withRequestTimeout,
} from "./http.js";
import { parseStreamLine, readLines, requireBody } from "./stream.js";
import type { ILlmProvider, IProviderOptions } from "./types.js";

const PROVIDER_NAME: ProviderName = "Ollama";
const LIST_TIMEOUT_MS = 30_000;

const GenerateSchema = z.object({
  response: z.string(),
});

const GenerateChunkSchema = z.object({
  response: z.string().optional(),
});

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const VersionSchema = z.object({
  version: z.string(),
});

export class OllamaAdapter implements ILlmProvider {
  readonly name = PROVIDER_NAME;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options?: IProviderOptions) {
    this.baseUrl = trimTrailingSlashes(options?.baseUrl ?? DEFAULT_BASE_URLS.Ollama);
    this.timeoutMs = options?.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async send(request: IInvocationRequest, onChunk?: ChunkListener): Promise<string> {
    const url = `${this.baseUrl}/api/generate`;
    const body: Record<string, unknown> = {
      model: request.model,
      prompt: request.prompt,
      stream: request.streaming,
      options: { num_predict: MAX_OUTPUT_TOKENS },
    };

    return withRequestTimeout(PROVIDER_NAME, url, this.timeoutMs, async (signal) => {
      const response = await postJson(PROVIDER_NAME, url, body, { signal });

      if (!request.streaming) {
        const data = await readJsonBody(PROVIDER_NAME, response, GenerateSchema);
        return data.response;
      }

      let accumulated = "";
      for await (const line of readLines(requireBody(PROVIDER_NAME, response))) {
        const trimmed = line.trim();
        if (trimmed === "") {
          continue;
        }
        const chunk = parseStreamLine(PROVIDER_NAME, trimmed, GenerateChunkSchema);
        const text = chunk?.response;
        if (text === undefined || text === "") {
          continue;
        }
        onChunk?.(text);
        accumulated += text;
      }
      return accumulated;
    });
  }

  /** Names of the models pulled into the local Ollama instance. */
  async listModels(): Promise<readonly string[]> {
    const url = `${this.baseUrl}/api/tags`;
    const data = await this.getJson(url, TagsSchema);
    const names = data.models.map((model) => model.name);
    logger.debug({ models: names }, "Ollama models discovered");
    return names;
  }

  /** Resolve with the server version, or reject when Ollama is not reachable. */
  async checkConnection(): Promise<string> {
    const data = await this.getJson(`${this.baseUrl}/api/version`, VersionSchema);
    return data.version;
  }

  private async getJson<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.infer<S>> {
    return withRequestTimeout(PROVIDER_NAME, url, LIST_TIMEOUT_MS, async (signal) => {
      const response = await fetch(url, { signal });
      if (!response.ok) {
        const text = await response.text();
        throw new ProviderHttpError(PROVIDER_NAME, response.status, text);
      }
      return readJsonBody(PROVIDER_NAME, response, schema);
    });
  }
}
