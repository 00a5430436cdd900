/**
 * Provider configuration store.
 * Reads ~/.ola/config.yaml (falling back to the legacy config.json),
 * validates it with Zod, and writes it back with owner-only permissions.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import {
  ensureSecureDirectory,
  getConfigPath,
  getLegacyConfigPath,
} from "../utils/pathResolver.js";
import { resolveProviderName } from "../auth/api-key-fallback.js";
import { ConfigurationError, InvalidConfigError } from "../types/errors.js";
import { EMPTY_PROVIDER_CONFIG } from "../types/config.js";
import type { IProviderConfig, IProviderEntry } from "../types/config.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const ProviderNameSchema = z.string().transform((value, ctx) => {
  const name = resolveProviderName(value);
  if (name === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported provider "${value}"` });
    return z.NEVER;
  }
  return name;
});

/** Empty or absent means no provider is active. */
const ActiveProviderSchema = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (value === undefined || value === null || value.trim() === "") {
      return undefined;
    }
    const name = resolveProviderName(value);
    if (name === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported provider "${value}"` });
      return z.NEVER;
    }
    return name;
  });

const OptionalText = z
  .string()
  .nullish()
  .transform((value) => (value === null || value === "" ? undefined : value));

const ProviderEntrySchema = z.object({
  provider: ProviderNameSchema,
  apiKey: z.string().default(""),
  model: OptionalText,
  baseUrl: OptionalText,
});

const ProviderConfigSchema = z.object({
  activeProvider: ActiveProviderSchema,
  providers: z.array(ProviderEntrySchema).default([]),
});

/** Earlier releases wrote snake_case JSON. */
const LegacyProviderConfigSchema = z
  .object({
    active_provider: ActiveProviderSchema,
    providers: z
      .array(
        z.object({
          provider: ProviderNameSchema,
          api_key: z.string().default(""),
          model: OptionalText,
          additional_settings: z.object({ base_url: OptionalText }).passthrough().nullish(),
        }),
      )
      .default([]),
  })
  .transform(
    (legacy): z.input<typeof ProviderConfigSchema> => ({
      activeProvider: legacy.active_provider,
      providers: legacy.providers.map((entry) => ({
        provider: entry.provider,
        apiKey: entry.api_key,
        model: entry.model,
        baseUrl: entry.additional_settings?.base_url,
      })),
    }),
  );

// ── Store ────────────────────────────────────────────────────────────────

export class ConfigStore {
  private readonly configPath: string;
  private readonly legacyPath: string;

  constructor(configPath: string = getConfigPath(), legacyPath: string = getLegacyConfigPath()) {
    this.configPath = configPath;
    this.legacyPath = legacyPath;
  }

  get path(): string {
    return this.configPath;
  }

  load(): IProviderConfig {
    if (existsSync(this.configPath)) {
      return this.parse(this.configPath, parseYaml(readFileSync(this.configPath, "utf-8")), ProviderConfigSchema);
    }

    if (existsSync(this.legacyPath)) {
      logger.info({ path: this.legacyPath }, "Reading legacy JSON config");
      return this.parse(this.legacyPath, readJson(this.legacyPath), LegacyProviderConfigSchema.pipe(ProviderConfigSchema));
    }

    logger.debug({ path: this.configPath }, "Config not found, no providers configured");
    return EMPTY_PROVIDER_CONFIG;
  }

  save(config: IProviderConfig): void {
    ensureSecureDirectory(dirname(this.configPath));
    const document = {
      activeProvider: config.activeProvider ?? "",
      providers: config.providers.map(serializeEntry),
    };
    writeFileSync(this.configPath, stringifyYaml(document), { encoding: "utf-8", mode: 0o600 });
    logger.info({ path: this.configPath }, "Config saved");
  }

  /** The active provider's entry. */
  getActiveProvider(): IProviderEntry {
    const config = this.load();
    const entry =
      config.activeProvider === undefined
        ? undefined
        : config.providers.find((candidate) => candidate.provider === config.activeProvider);

    if (entry === undefined) {
      throw new ConfigurationError("No active provider configured. Run 'ola configure' first.");
    }
    return entry;
  }

  /** Replace any entry for the same provider and make it active. */
  addProvider(entry: IProviderEntry): IProviderConfig {
    const current = this.load();
    const next: IProviderConfig = {
      activeProvider: entry.provider,
      providers: [
        ...current.providers.filter((existing) => existing.provider !== entry.provider),
        entry,
      ],
    };
    this.save(next);
    return next;
  }

  private parse<S extends z.ZodTypeAny>(path: string, raw: unknown, schema: S): z.output<S> {
    const validated = schema.safeParse(raw ?? {});
    if (!validated.success) {
      const issue = validated.error.issues[0];
      const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new InvalidConfigError(path, `${issue?.message ?? "invalid document"}${where}`);
    }
    logger.debug({ path }, "Config loaded");
    return validated.data;
  }
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError(path, message);
  }
}

function serializeEntry(entry: IProviderEntry): Record<string, string> {
  return {
    provider: entry.provider,
    apiKey: entry.apiKey,
    ...(entry.model !== undefined ? { model: entry.model } : {}),
    ...(entry.baseUrl !== undefined ? { baseUrl: entry.baseUrl } : {}),
  };
}
