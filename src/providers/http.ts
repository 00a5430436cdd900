/**
 * Shared HTTP plumbing for provider adapters: a whole-exchange timeout,
 * JSON POST with status checking, and schema-validated body decoding.
 */

import type { z } from "zod";
import {
  OlaError,
  NetworkError,
  ProviderHttpError,
  MalformedResponseError,
} from "../types/errors.js";
import type { ProviderName } from "../types/model.js";

export interface IPostOptions {
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly signal: AbortSignal;
}

function describeFetchFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // undici reports the socket-level reason on `cause`
  return error.cause instanceof Error ? error.cause.message : error.message;
}

/**
 * Run one request/response exchange under a timeout. The signal handed to
 * `exchange` stays armed until it settles, so reading a streamed body is
 * covered too. `endpoint` is used in error messages and must not carry
 * credentials.
 */
export async function withRequestTimeout<T>(
  provider: ProviderName,
  endpoint: string,
  timeoutMs: number,
  exchange: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await exchange(controller.signal);
  } catch (error: unknown) {
    if (controller.signal.aborted) {
      throw new NetworkError(provider, endpoint, "timed out", timeoutMs);
    }
    if (error instanceof OlaError) {
      throw error;
    }
    throw new NetworkError(provider, endpoint, describeFetchFailure(error));
  } finally {
    clearTimeout(timer);
  }
}

/** POST a JSON body; non-2xx responses become ProviderHttpError. */
export async function postJson(
  provider: ProviderName,
  url: string,
  body: Record<string, unknown>,
  options: IPostOptions,
): Promise<Response> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...options.headers },
    body: JSON.stringify(body),
    signal: options.signal,
  });

  if (!response.ok) {
    const text = await response.text();
    throw new ProviderHttpError(provider, response.status, text);
  }

  return response;
}

/** Decode a complete JSON body. Any parse or shape failure is fatal for the call. */
export async function readJsonBody<S extends z.ZodTypeAny>(
  provider: ProviderName,
  response: Response,
  schema: S,
): Promise<z.infer<S>> {
  const text = await response.text();

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedResponseError(provider, message);
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MalformedResponseError(provider, `${issue?.message ?? "unexpected shape"}${where}`);
  }

  return validated.data;
}

export function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}
