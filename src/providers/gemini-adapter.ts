/**
 * Gemini adapter: generateContent with the API key in the query string.
 * The API is used non-streaming; a streaming caller still receives each
 * part through its listener once the response is read.
 */

import { z } from "zod";
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
import {
  postJson,
  readJsonBody,
  trimTrailingSlashes,
  withRequestTimeout,
} from "./http.js";
import type { ILlmProvider, IProviderOptions } from "./types.js";

const PROVIDER_NAME: ProviderName = "Gemini";
const TEMPERATURE = 0.7;

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })),
        }),
      }),
    )
    .min(1, "response has no candidates"),
});

export class GeminiAdapter implements ILlmProvider {
  readonly name = PROVIDER_NAME;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options?: IProviderOptions) {
    this.apiKey = options?.apiKey ?? "";
    this.baseUrl = trimTrailingSlashes(options?.baseUrl ?? DEFAULT_BASE_URLS.Gemini);
    this.timeoutMs = options?.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async send(request: IInvocationRequest, onChunk?: ChunkListener): Promise<string> {
    const endpoint = `${this.baseUrl}/v1beta/models/${request.model}:generateContent`;
    const url = `${endpoint}?key=${encodeURIComponent(this.apiKey)}`;
    const body: Record<string, unknown> = {
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
      generationConfig: {
        temperature: TEMPERATURE,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
      },
    };

    return withRequestTimeout(PROVIDER_NAME, endpoint, this.timeoutMs, async (signal) => {
      const response = await postJson(PROVIDER_NAME, url, body, { signal });
      const data = await readJsonBody(PROVIDER_NAME, response, GenerateContentSchema);

      let accumulated = "";
      for (const part of data.candidates[0]?.content.parts ?? []) {
        const text = part.text ?? "";
        if (request.streaming && text !== "") {
          onChunk?.(text);
        }
        accumulated += text;
      }
      return accumulated;
    });
  }
}
