/**
 * Anthropic adapter: Messages API with header auth and a fixed output cap.
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
import { eventPayload, parseStreamLine, readLines, requireBody } from "./stream.js";
import type { ILlmProvider, IProviderOptions } from "./types.js";

const PROVIDER_NAME: ProviderName = "Anthropic";
const ANTHROPIC_VERSION = "2023-06-01";

const MessageSchema = z.object({
  content: z.array(z.object({ text: z.string().optional() })),
});

// content_block_delta events carry `delta.text`; everything else is skipped
const MessageEventSchema = z.object({
  delta: z.object({ text: z.string() }),
});

export class AnthropicAdapter implements ILlmProvider {
  readonly name = PROVIDER_NAME;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options?: IProviderOptions) {
    this.apiKey = options?.apiKey ?? "";
    this.baseUrl = trimTrailingSlashes(options?.baseUrl ?? DEFAULT_BASE_URLS.Anthropic);
    this.timeoutMs = options?.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async send(request: IInvocationRequest, onChunk?: ChunkListener): Promise<string> {
    const url = `${this.baseUrl}/v1/messages`;
    const body: Record<string, unknown> = {
      model: request.model,
      messages: [{ role: "user", content: request.prompt }],
      max_tokens: MAX_OUTPUT_TOKENS,
      stream: request.streaming,
    };
    const headers = {
      "X-API-Key": this.apiKey,
      "anthropic-version": ANTHROPIC_VERSION,
    };

    return withRequestTimeout(PROVIDER_NAME, url, this.timeoutMs, async (signal) => {
      const response = await postJson(PROVIDER_NAME, url, body, { headers, signal });

      if (!request.streaming) {
        const data = await readJsonBody(PROVIDER_NAME, response, MessageSchema);
        return data.content.map((block) => block.text ?? "").join("");
      }

      let accumulated = "";
      for await (const line of readLines(requireBody(PROVIDER_NAME, response))) {
        const payload = eventPayload(line);
        if (payload === undefined) {
          continue;
        }
        const event = parseStreamLine(PROVIDER_NAME, payload, MessageEventSchema);
        if (event === undefined || event.delta.text === "") {
          continue;
        }
        onChunk?.(event.delta.text);
        accumulated += event.delta.text;
      }
      return accumulated;
    });
  }
}
