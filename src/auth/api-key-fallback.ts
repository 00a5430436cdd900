/**
 * API key resolution: provider aliases, key validation, and detection of
 * provider credentials from environment variables.
 */

import { InvalidConfigError, UnsupportedProviderError } from "../types/errors.js";
import type { IProviderEntry } from "../types/config.js";
import type { ProviderName } from "../types/model.js";

// ── Environment Variable Mapping ─────────────────────────────────────────

/** Checked in this order when detecting a provider from the environment. */
const ENV_KEY_MAP: ReadonlyArray<readonly [ProviderName, string]> = [
  ["OpenAI", "OPENAI_API_KEY"],
  ["Anthropic", "ANTHROPIC_API_KEY"],
  ["Gemini", "GEMINI_API_KEY"],
];

const ENV_MODEL_VAR = "OLA_MODEL";

// ── CLI-Friendly Provider Names ──────────────────────────────────────────

const CLI_PROVIDER_MAP: Readonly<Record<string, ProviderName>> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  claude: "Anthropic",
  ollama: "Ollama",
  gemini: "Gemini",
  google: "Gemini",
} as const;

// ── API Key Validation ───────────────────────────────────────────────────

const KEY_PREFIXES: Readonly<Record<ProviderName, string | undefined>> = {
  OpenAI: "sk-",
  Anthropic: "sk-ant-",
  Gemini: undefined,
  Ollama: undefined,
} as const;

// ── Public Helpers ───────────────────────────────────────────────────────

export function resolveProviderName(alias: string): ProviderName | undefined {
  const normalized = alias.toLowerCase().trim();
  return CLI_PROVIDER_MAP[normalized];
}

/** Like resolveProviderName, but unknown names are an error. */
export function requireProviderName(alias: string): ProviderName {
  const name = resolveProviderName(alias);
  if (name === undefined) {
    throw new UnsupportedProviderError(alias);
  }
  return name;
}

export function getEnvKeyName(provider: ProviderName): string | undefined {
  return ENV_KEY_MAP.find(([name]) => name === provider)?.[1];
}

/**
 * Check a provider entry before it is saved. Hosted providers need a key
 * with the expected prefix; every provider needs a model.
 */
export function validateProviderEntry(entry: IProviderEntry): void {
  if (entry.provider !== "Ollama" && entry.apiKey.trim() === "") {
    throw new InvalidConfigError("apiKey", `an API key is required for ${entry.provider}`);
  }

  const prefix = KEY_PREFIXES[entry.provider];
  if (prefix !== undefined && !entry.apiKey.startsWith(prefix)) {
    throw new InvalidConfigError("apiKey", `${entry.provider} API keys start with "${prefix}"`);
  }

  if (entry.model === undefined || entry.model.trim() === "") {
    throw new InvalidConfigError("model", `a model is required for ${entry.provider}`);
  }
}

/**
 * First provider whose API key is present in the environment, with the
 * model from OLA_MODEL when set.
 */
export function detectProviderFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): IProviderEntry | undefined {
  for (const [provider, variable] of ENV_KEY_MAP) {
    const apiKey = env[variable];
    if (apiKey === undefined || apiKey.length === 0) {
      continue;
    }
    const model = env[ENV_MODEL_VAR];
    return {
      provider,
      apiKey,
      ...(model !== undefined && model.length > 0 ? { model } : {}),
    };
  }
  return undefined;
}
