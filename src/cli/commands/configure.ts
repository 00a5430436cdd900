/**
 * `ola configure`: choose a provider, API key and model, validate them
 * and make the provider active.
 */

import { Command } from "commander";
import pc from "picocolors";
import {
  detectProviderFromEnv,
  getEnvKeyName,
  requireProviderName,
  validateProviderEntry,
} from "../../auth/api-key-fallback.js";
import { OllamaAdapter } from "../../providers/ollama-adapter.js";
import { ConfigStore } from "../../storage/config-store.js";
import { PROVIDER_NAMES, STATIC_MODELS } from "../../types/model.js";
import type { ProviderName } from "../../types/model.js";
import type { IProviderEntry } from "../../types/config.js";
import { errorMessage, reportCommandError } from "../../utils/output.js";
import { askChoice, askConfirm, askSecret, askText } from "../interactive.js";

interface IConfigureFlags {
  readonly provider?: string | undefined;
  readonly apiKey?: string | undefined;
  readonly model?: string | undefined;
}

const OLLAMA_FALLBACK_MODEL = "llama2";

function log(message: string): void {
  process.stderr.write(`${message}\n`);
}

async function chooseProvider(flag: string | undefined): Promise<ProviderName> {
  if (flag !== undefined) {
    return requireProviderName(flag);
  }
  return askChoice(
    "Provider",
    PROVIDER_NAMES.map((name) => ({ name, value: name })),
  );
}

async function chooseApiKey(provider: ProviderName, flag: string | undefined): Promise<string> {
  if (flag !== undefined) {
    return flag;
  }
  if (provider === "Ollama") {
    log(pc.dim("No API key needed for Ollama (using local instance)"));
    return "";
  }

  const variable = getEnvKeyName(provider);
  const fromEnv = variable !== undefined ? process.env[variable] : undefined;
  if (fromEnv !== undefined && fromEnv.trim() !== "") {
    log(pc.cyan(`Using API key from ${variable ?? "environment"}`));
    return fromEnv;
  }

  if (provider === "Gemini") {
    log("Gemini keys are issued by Google AI Studio (https://aistudio.google.com/)");
    return askSecret("Google API Key");
  }
  return askSecret(`${provider} API Key`);
}

async function chooseOllamaModel(baseUrl: string | undefined): Promise<string> {
  try {
    const models = await new OllamaAdapter({ baseUrl }).listModels();
    if (models.length > 0) {
      log(pc.green(`Found ${models.length} models in Ollama`));
      return askChoice(
        "Select a model",
        models.map((name) => ({ name, value: name })),
      );
    }
    log(pc.yellow("No models found in Ollama. Using manual input..."));
  } catch (error: unknown) {
    log(pc.yellow(`Failed to fetch Ollama models: ${errorMessage(error)}. Using manual input...`));
  }
  return askText("Model name (e.g., llama2, mistral)", OLLAMA_FALLBACK_MODEL);
}

async function chooseModel(
  provider: ProviderName,
  flag: string | undefined,
  baseUrl: string | undefined,
): Promise<string> {
  if (flag !== undefined) {
    return flag;
  }
  if (provider === "Ollama") {
    return chooseOllamaModel(baseUrl);
  }
  return askChoice(
    "Model",
    STATIC_MODELS[provider].map((name) => ({ name, value: name })),
  );
}

/** Warn, without failing, when the Ollama server does not answer. */
async function checkOllama(baseUrl: string | undefined): Promise<void> {
  try {
    const version = await new OllamaAdapter({ baseUrl }).checkConnection();
    log(pc.green(`Connected to Ollama ${version}`));
  } catch (error: unknown) {
    log(pc.yellow(`Could not reach Ollama: ${errorMessage(error)}. Make sure it is running.`));
  }
}

function save(store: ConfigStore, entry: IProviderEntry): void {
  validateProviderEntry(entry);
  store.addProvider(entry);
  process.stdout.write(pc.green(`Configuration saved for provider: ${entry.provider}\n`));
  if (entry.model !== undefined) {
    process.stdout.write(`Using model: ${entry.model}\n`);
  }
}

/** A base URL configured earlier survives reconfiguring the same provider. */
function configuredBaseUrl(store: ConfigStore, provider: ProviderName): string | undefined {
  return store.load().providers.find((entry) => entry.provider === provider)?.baseUrl;
}

async function runConfigure(store: ConfigStore, flags: IConfigureFlags): Promise<void> {
  log(pc.bold(pc.blue("ola configuration")));

  const noFlags = flags.provider === undefined && flags.apiKey === undefined && flags.model === undefined;
  const detected = noFlags ? detectProviderFromEnv() : undefined;
  if (detected !== undefined) {
    log(`Detected configuration from environment variables:`);
    log(`  Provider: ${detected.provider}`);
    log(`  Model: ${detected.model ?? "(not set)"}`);
    if (await askConfirm("Use this configuration?")) {
      const baseUrl = configuredBaseUrl(store, detected.provider);
      const model = detected.model ?? (await chooseModel(detected.provider, undefined, baseUrl));
      save(store, { ...detected, model, baseUrl });
      return;
    }
  }

  const provider = await chooseProvider(flags.provider);
  const apiKey = await chooseApiKey(provider, flags.apiKey);
  const baseUrl = configuredBaseUrl(store, provider);
  const model = await chooseModel(provider, flags.model, baseUrl);

  if (provider === "Ollama") {
    await checkOllama(baseUrl);
  }
  save(store, { provider, apiKey, model, baseUrl });
}

export function createConfigureCommand(store: ConfigStore = new ConfigStore()): Command {
  return new Command("configure")
    .description("Configure the LLM provider, API key and model")
    .option("-p, --provider <name>", "OpenAI, Anthropic, Ollama or Gemini")
    .option("-k, --api-key <key>", "API key for the provider")
    .option("-m, --model <model>", "Model to use")
    .action(async (flags: IConfigureFlags) => {
      try {
        await runConfigure(store, flags);
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });
}
