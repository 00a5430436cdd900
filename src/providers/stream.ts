/**
 * Line-oriented decoding of streamed response bodies.
 * Covers both `data: `-prefixed event streams and newline-delimited JSON.
 */

import type { z } from "zod";
import { logger } from "../utils/logger.js";
import { MalformedChunkError, MalformedResponseError } from "../types/errors.js";
import type { ProviderName } from "../types/model.js";

const DATA_PREFIX = "data: ";
const DONE_SENTINEL = "data: [DONE]";
const MAX_LOGGED_LINE = 200;

/** Yield complete lines as they arrive. A trailing unterminated line is yielded at end of stream. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        yield line;
      }
    }

    buffer += decoder.decode();
    if (buffer !== "") {
      yield buffer;
    }
  } finally {
    reader.releaseLock();
  }
}

export function requireBody(
  provider: ProviderName,
  response: Response,
): ReadableStream<Uint8Array> {
  if (response.body === null) {
    throw new MalformedResponseError(provider, "empty stream body");
  }
  return response.body;
}

/**
 * Payload of a `data: ` event line, or undefined for blank lines, the
 * `[DONE]` sentinel, and non-data lines such as `event:`.
 */
export function eventPayload(line: string): string | undefined {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed === DONE_SENTINEL) {
    return undefined;
  }
  if (!trimmed.startsWith(DATA_PREFIX)) {
    return undefined;
  }
  return trimmed.slice(DATA_PREFIX.length);
}

/**
 * Parse one streamed JSON payload. Unparseable lines are logged and skipped;
 * well-formed events of a shape we do not read are skipped quietly.
 */
export function parseStreamLine<S extends z.ZodTypeAny>(
  provider: ProviderName,
  payload: string,
  schema: S,
): z.infer<S> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    const skipped = new MalformedChunkError(provider, payload, reason);
    logger.warn(
      { code: skipped.code, provider, line: payload.slice(0, MAX_LOGGED_LINE) },
      skipped.message,
    );
    return undefined;
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    logger.debug({ provider }, "Ignoring stream event without text");
    return undefined;
  }
  return validated.data;
}
