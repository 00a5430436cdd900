import { afterEach, describe, expect, it, vi } from "vitest";
import { AnthropicAdapter } from "./anthropic-adapter.js";
import { ProviderHttpError } from "../types/errors.js";
import {
  firstCall,
  jsonResponse,
  streamingResponse,
  stubFetch,
  textResponse,
} from "../testing/http.js";

describe("AnthropicAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("authenticates with headers and caps output tokens", async () => {
    const calls = stubFetch(
      jsonResponse({
        content: [
          { type: "text", text: "Hello " },
          { type: "text", text: "world" },
        ],
      }),
    );
    const adapter = new AnthropicAdapter({ apiKey: "sk-ant-test" });

    const text = await adapter.send({
      prompt: "Hi",
      model: "claude-3-haiku-20240307",
      streaming: false,
    });

    expect(text).toBe("Hello world");
    const call = firstCall(calls);
    expect(call.url).toBe("https://api.anthropic.com/v1/messages");
    expect(call.headers.get("x-api-key")).toBe("sk-ant-test");
    expect(call.headers.get("anthropic-version")).toBe("2023-06-01");
    expect(call.headers.get("authorization")).toBeNull();
    expect(call.body).toEqual({
      model: "claude-3-haiku-20240307",
      messages: [{ role: "user", content: "Hi" }],
      max_tokens: 2048,
      stream: false,
    });
  });

  it("extracts delta.text from streamed events and ignores the rest", async () => {
    stubFetch(
      streamingResponse([
        "event: message_start\n",
        'data: {"type":"message_start","message":{"id":"msg_1"}}\n\n',
        "event: content_block_delta\n",
        'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi"}}\n\n',
        'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":" there"}}\n',
        "event: message_stop\n",
        'data: {"type":"message_stop"}\n',
      ]),
    );
    const chunks: string[] = [];
    const adapter = new AnthropicAdapter({ apiKey: "sk-ant-test" });

    const text = await adapter.send(
      { prompt: "Hi", model: "claude-3-haiku-20240307", streaming: true },
      (chunk) => chunks.push(chunk),
    );

    expect(text).toBe("Hi there");
    expect(chunks).toEqual(["Hi", " there"]);
  });

  it("surfaces overloaded responses as HTTP errors", async () => {
    stubFetch(textResponse('{"type":"error"}', 529));
    const adapter = new AnthropicAdapter({ apiKey: "sk-ant-test" });

    const result = adapter.send({ prompt: "Hi", model: "claude-2.1", streaming: true });

    await expect(result).rejects.toBeInstanceOf(ProviderHttpError);
    await expect(result).rejects.toMatchObject({ status: 529 });
  });
});
