/**
 * OpenAI adapter: chat completions over HTTP, `data: ` event streaming.
 */

import { z } from "zod";
import {
  DEFAULT_BASE_URLS,
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
import { eventPayload, parseStreamLine, readLines, requireBody } from "./stream.js";
import type { ILlmProvider, IProviderOptions } from "./types.js";

const PROVIDER_NAME: ProviderName = "OpenAI";

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1, "response has no choices"),
});

const ChatCompletionChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({ content: z.string().nullish() }),
    }),
  ),
});

export class OpenAIAdapter implements ILlmProvider {
  readonly name = PROVIDER_NAME;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options?: IProviderOptions) {
    this.apiKey = options?.apiKey ?? "";
    this.baseUrl = trimTrailingSlashes(options?.baseUrl ?? DEFAULT_BASE_URLS.OpenAI);
    this.timeoutMs = options?.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async send(request: IInvocationRequest, onChunk?: ChunkListener): Promise<string> {
    const url = `${this.baseUrl}/v1/chat/completions`;
    const body: Record<string, unknown> = {
      model: request.model,
      messages: [{ role: "user", content: request.prompt }],
      stream: request.streaming,
    };

    return withRequestTimeout(PROVIDER_NAME, url, this.timeoutMs, async (signal) => {
      const response = await postJson(PROVIDER_NAME, url, body, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
        signal,
      });

      if (!request.streaming) {
        const data = await readJsonBody(PROVIDER_NAME, response, ChatCompletionSchema);
        return data.choices[0]?.message.content ?? "";
      }

      let accumulated = "";
      for await (const line of readLines(requireBody(PROVIDER_NAME, response))) {
        const payload = eventPayload(line);
        if (payload === undefined) {
          continue;
        }
        const chunk = parseStreamLine(PROVIDER_NAME, payload, ChatCompletionChunkSchema);
        const content = chunk?.choices[0]?.delta.content;
        if (content === undefined || content === null || content === "") {
          continue;
        }
        onChunk?.(content);
        accumulated += content;
      }
      return accumulated;
    });
  }
}
