/**
 * ola typed error hierarchy.
 * Every error carries a stable code, a user message, and optionally a
 * diagnostic and a recovery hint.
 */

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
}

export abstract class OlaError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class ConfigurationError extends OlaError {
  readonly code = "OLA_CONFIG_MISS_001" as const;
  readonly userMessage: string;

  constructor(detail: string) {
    super(`Configuration missing: ${detail}`);
    this.userMessage = detail;
    this.suggestedRecovery = "Run 'ola configure' to set up a provider.";
  }
}

export class InvalidConfigError extends OlaError {
  readonly code = "OLA_CONFIG_INVALID_001" as const;
  readonly userMessage: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`);
    this.userMessage = `Invalid configuration "${key}": ${reason}`;
  }
}

export class UnsupportedProviderError extends OlaError {
  readonly code = "OLA_CONFIG_PROVIDER_001" as const;
  readonly userMessage: string;

  constructor(provider: string) {
    super(`Unsupported provider: ${provider}`);
    this.userMessage = `Unsupported provider "${provider}". Use one of: OpenAI, Anthropic, Ollama, Gemini.`;
  }
}

// ── Provider Errors ──────────────────────────────────────────────────────

export class NetworkError extends OlaError {
  readonly code: "OLA_NET_001" | "OLA_NET_TIMEOUT_001";
  readonly userMessage: string;
  readonly timedOut: boolean;

  constructor(provider: string, url: string, reason: string, timeoutMs?: number) {
    super(`Request to ${url} failed: ${reason}`);
    this.timedOut = timeoutMs !== undefined;
    this.code = this.timedOut ? "OLA_NET_TIMEOUT_001" : "OLA_NET_001";
    this.userMessage = this.timedOut
      ? `${provider} request timed out after ${Math.ceil((timeoutMs ?? 0) / 1000)}s.`
      : `Could not reach ${provider}: ${reason}`;
    this.diagnosticMessage = url;
  }
}

export class ProviderHttpError extends OlaError {
  readonly code = "OLA_PROVIDER_HTTP_001" as const;
  readonly userMessage: string;
  readonly status: number;
  readonly body: string;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error (${status}): ${body}`);
    this.status = status;
    this.body = body;
    this.userMessage = `${provider} API error (${status}): ${body}`;
    if (status === 401 || status === 403) {
      this.suggestedRecovery = "Check the API key with 'ola configure'.";
    }
  }
}

export class MalformedResponseError extends OlaError {
  readonly code = "OLA_PROVIDER_PARSE_001" as const;
  readonly userMessage: string;

  constructor(provider: string, reason: string) {
    super(`Malformed ${provider} response: ${reason}`);
    this.userMessage = `${provider} returned a response that could not be read: ${reason}`;
  }
}

export class MalformedChunkError extends OlaError {
  readonly code = "OLA_STREAM_CHUNK_001" as const;
  readonly userMessage: string;
  readonly line: string;

  constructor(provider: string, line: string, reason: string) {
    super(`Skipped malformed ${provider} stream line: ${reason}`);
    this.line = line;
    this.userMessage = `Skipped an unreadable line in the ${provider} stream.`;
    this.diagnosticMessage = reason;
  }
}

// ── Sink Errors ──────────────────────────────────────────────────────────

export class ClipboardError extends OlaError {
  readonly code = "OLA_CLIPBOARD_001" as const;
  readonly userMessage: string;

  constructor(reason: string) {
    super(`Clipboard copy failed: ${reason}`);
    this.userMessage = `Could not copy to clipboard: ${reason}`;
  }
}

export class LoggingError extends OlaError {
  readonly code = "OLA_LOG_001" as const;
  readonly userMessage: string;

  constructor(path: string, reason: string) {
    super(`Session log write failed for ${path}: ${reason}`);
    this.userMessage = `Could not write session log ${path}: ${reason}`;
  }
}

// ── Project Errors ───────────────────────────────────────────────────────

export class ProjectNotFoundError extends OlaError {
  readonly code = "OLA_PROJECT_MISS_001" as const;
  readonly userMessage: string;

  constructor(nameOrId: string) {
    super(`Project not found: ${nameOrId}`);
    this.userMessage = `Project "${nameOrId}" not found.`;
    this.suggestedRecovery = "Run 'ola project list' to see available projects.";
  }
}

export class DuplicateProjectError extends OlaError {
  readonly code = "OLA_PROJECT_DUP_001" as const;
  readonly userMessage: string;

  constructor(name: string) {
    super(`Project already exists: ${name}`);
    this.userMessage = `A project named "${name}" already exists.`;
  }
}

// ── Discriminated Error Union ────────────────────────────────────────────

export type ConfigError =
  | ConfigurationError
  | InvalidConfigError
  | UnsupportedProviderError;

export type ProviderError =
  | NetworkError
  | ProviderHttpError
  | MalformedResponseError;

export type SinkError =
  | ClipboardError
  | LoggingError;

export type ProjectError =
  | ProjectNotFoundError
  | DuplicateProjectError;

export type AnyOlaError =
  | ConfigError
  | ProviderError
  | MalformedChunkError
  | SinkError
  | ProjectError;
