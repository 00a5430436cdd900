import { afterEach, describe, expect, it, vi } from "vitest";
import { OpenAIAdapter } from "./openai-adapter.js";
import {
  MalformedResponseError,
  NetworkError,
  ProviderHttpError,
} from "../types/errors.js";
import {
  firstCall,
  jsonResponse,
  streamingResponse,
  stubFailingFetch,
  stubFetch,
  textResponse,
} from "../testing/http.js";

describe("OpenAIAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a chat completion and reads the first choice", async () => {
    const calls = stubFetch(jsonResponse({ choices: [{ message: { content: "Hello" } }] }));
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    const text = await adapter.send({ prompt: "Hi", model: "gpt-4o", streaming: false });

    expect(text).toBe("Hello");
    const call = firstCall(calls);
    expect(call.url).toBe("https://api.openai.com/v1/chat/completions");
    expect(call.method).toBe("POST");
    expect(call.headers.get("authorization")).toBe("Bearer sk-test");
    expect(call.headers.get("content-type")).toBe("application/json");
    expect(call.body).toEqual({
      model: "gpt-4o",
      messages: [{ role: "user", content: "Hi" }],
      stream: false,
    });
  });

  it("accumulates streamed deltas and skips the DONE sentinel", async () => {
    stubFetch(
      streamingResponse([
        'data: {"choices":[{"delta":{"content":"Hi"}}]}\n',
        "\n",
        "data: [DONE]\n",
      ]),
    );
    const chunks: string[] = [];
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    const text = await adapter.send(
      { prompt: "Hi", model: "gpt-4o", streaming: true },
      (chunk) => chunks.push(chunk),
    );

    expect(text).toBe("Hi");
    expect(chunks).toEqual(["Hi"]);
  });

  it("reassembles event lines split across network reads", async () => {
    stubFetch(
      streamingResponse([
        'data: {"choices":[{"delta":{"content":"Hel',
        'lo"}}]}\ndata: {"choices":[{"delta":{"role":"assistant"}}]}\ndata: {"choices":[{"delta":{"content":" world"}}]}',
        "\ndata: [DONE]\n",
      ]),
    );
    const chunks: string[] = [];
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    const text = await adapter.send(
      { prompt: "Hi", model: "gpt-4o", streaming: true },
      (chunk) => chunks.push(chunk),
    );

    expect(text).toBe("Hello world");
    expect(chunks).toEqual(["Hello", " world"]);
  });

  it("sets the stream flag on streaming requests", async () => {
    const calls = stubFetch(streamingResponse(["data: [DONE]\n"]));
    const adapter = new OpenAIAdapter({ apiKey: "sk-test", baseUrl: "http://localhost:8080/" });

    await adapter.send({ prompt: "Hi", model: "gpt-4o", streaming: true });

    const call = firstCall(calls);
    expect(call.url).toBe("http://localhost:8080/v1/chat/completions");
    expect(call.body).toMatchObject({ stream: true });
  });

  it("surfaces non-2xx responses with status and body", async () => {
    stubFetch(textResponse("invalid api key", 401));
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    const result = adapter.send({ prompt: "Hi", model: "gpt-4o", streaming: false });

    await expect(result).rejects.toBeInstanceOf(ProviderHttpError);
    await expect(result).rejects.toMatchObject({ status: 401, body: "invalid api key" });
  });

  it("fails the call when a complete response is not JSON", async () => {
    stubFetch(textResponse("<html>gateway</html>", 200));
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    await expect(
      adapter.send({ prompt: "Hi", model: "gpt-4o", streaming: false }),
    ).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("fails the call when the response has no choices", async () => {
    stubFetch(jsonResponse({ choices: [] }));
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    await expect(
      adapter.send({ prompt: "Hi", model: "gpt-4o", streaming: false }),
    ).rejects.toThrow("response has no choices");
  });

  it("reports connection failures as network errors", async () => {
    stubFailingFetch("connect ECONNREFUSED 127.0.0.1:443");
    const adapter = new OpenAIAdapter({ apiKey: "sk-test" });

    const result = adapter.send({ prompt: "Hi", model: "gpt-4o", streaming: false });

    await expect(result).rejects.toBeInstanceOf(NetworkError);
    await expect(result).rejects.toMatchObject({
      timedOut: false,
      userMessage: "Could not reach OpenAI: connect ECONNREFUSED 127.0.0.1:443",
    });
  });
});
