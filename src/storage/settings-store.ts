/**
 * Settings store: ~/.ola/settings.yaml.
 * Every field has a default; a missing file is created from the defaults
 * and an unreadable one is reported and replaced by them in memory.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { ensureDirectory, getSettingsPath } from "../utils/pathResolver.js";
import { DEFAULT_SETTINGS } from "../types/config.js";
import type { ISettings } from "../types/config.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const { promptTemplate, defaults, behavior } = DEFAULT_SETTINGS;

const PromptTemplateSchema = z.object({
  goalsPrefix: z.string().default(promptTemplate.goalsPrefix),
  returnFormatPrefix: z.string().default(promptTemplate.returnFormatPrefix),
  warningsPrefix: z.string().default(promptTemplate.warningsPrefix),
});

const DefaultFlagsSchema = z.object({
  returnFormat: z.string().default(defaults.returnFormat),
  quiet: z.boolean().default(defaults.quiet),
  noThinking: z.boolean().default(defaults.noThinking),
  clipboard: z.boolean().default(defaults.clipboard),
});

const ThinkingAnimationSchema = z.object({
  emojis: z.array(z.string()).default([...behavior.thinkingAnimation.emojis]),
  text: z.string().default(behavior.thinkingAnimation.text),
});

const BehaviorSchema = z.object({
  logFile: z.string().min(1).default(behavior.logFile),
  enableLogging: z.boolean().default(behavior.enableLogging),
  thinkingAnimation: ThinkingAnimationSchema.default({}),
});

const SettingsSchema = z.object({
  defaultModel: z.string().min(1).default(DEFAULT_SETTINGS.defaultModel),
  promptTemplate: PromptTemplateSchema.default({}),
  defaults: DefaultFlagsSchema.default({}),
  behavior: BehaviorSchema.default({}),
});

/** Earlier releases wrote the same document with snake_case keys. */
const LegacySettingsSchema = z
  .object({
    default_model: z.string().optional(),
    prompt_template: z
      .object({
        goals_prefix: z.string().optional(),
        return_format_prefix: z.string().optional(),
        warnings_prefix: z.string().optional(),
      })
      .default({}),
    defaults: z
      .object({
        return_format: z.string().optional(),
        quiet: z.boolean().optional(),
        no_thinking: z.boolean().optional(),
        clipboard: z.boolean().optional(),
      })
      .default({}),
    behavior: z
      .object({
        log_file: z.string().optional(),
        enable_logging: z.boolean().optional(),
        thinking_animation: z
          .object({
            emojis: z.array(z.string()).optional(),
            text: z.string().optional(),
          })
          .default({}),
      })
      .default({}),
  })
  .transform(
    (legacy): z.input<typeof SettingsSchema> => ({
      defaultModel: legacy.default_model,
      promptTemplate: {
        goalsPrefix: legacy.prompt_template.goals_prefix,
        returnFormatPrefix: legacy.prompt_template.return_format_prefix,
        warningsPrefix: legacy.prompt_template.warnings_prefix,
      },
      defaults: {
        returnFormat: legacy.defaults.return_format,
        quiet: legacy.defaults.quiet,
        noThinking: legacy.defaults.no_thinking,
        clipboard: legacy.defaults.clipboard,
      },
      behavior: {
        logFile: legacy.behavior.log_file,
        enableLogging: legacy.behavior.enable_logging,
        thinkingAnimation: {
          emojis: legacy.behavior.thinking_animation.emojis,
          text: legacy.behavior.thinking_animation.text,
        },
      },
    }),
  )
  .pipe(SettingsSchema);

/** No key of the current layout contains an underscore. */
function hasSnakeCaseKeys(value: unknown): boolean {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.entries(value).some(([key, child]) => key.includes("_") || hasSnakeCaseKeys(child));
}

// ── Updates ──────────────────────────────────────────────────────────────

export interface ISettingsUpdate {
  readonly defaultModel?: string | undefined;
  readonly defaultFormat?: string | undefined;
  readonly enableLogging?: boolean | undefined;
  readonly logFile?: string | undefined;
}

export function applySettingsUpdate(settings: ISettings, update: ISettingsUpdate): ISettings {
  return {
    ...settings,
    defaultModel: update.defaultModel ?? settings.defaultModel,
    defaults: {
      ...settings.defaults,
      returnFormat: update.defaultFormat ?? settings.defaults.returnFormat,
    },
    behavior: {
      ...settings.behavior,
      enableLogging: update.enableLogging ?? settings.behavior.enableLogging,
      logFile: update.logFile ?? settings.behavior.logFile,
    },
  };
}

export function renderSettings(settings: ISettings): string {
  return stringifyYaml(settings);
}

// ── Store ────────────────────────────────────────────────────────────────

export class SettingsStore {
  private readonly settingsPath: string;

  constructor(settingsPath: string = getSettingsPath()) {
    this.settingsPath = settingsPath;
  }

  get path(): string {
    return this.settingsPath;
  }

  load(): ISettings {
    if (!existsSync(this.settingsPath)) {
      logger.info({ path: this.settingsPath }, "Settings not found, writing defaults");
      this.save(DEFAULT_SETTINGS);
      return DEFAULT_SETTINGS;
    }

    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(this.settingsPath, "utf-8"));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path: this.settingsPath, error: message }, "Settings file is not valid YAML, using defaults");
      return DEFAULT_SETTINGS;
    }

    const validated = hasSnakeCaseKeys(raw)
      ? LegacySettingsSchema.safeParse(raw)
      : SettingsSchema.safeParse(raw ?? {});
    if (!validated.success) {
      logger.warn(
        { path: this.settingsPath, errors: validated.error.issues },
        "Settings validation failed, using defaults",
      );
      return DEFAULT_SETTINGS;
    }

    logger.debug({ path: this.settingsPath }, "Settings loaded");
    return validated.data;
  }

  save(settings: ISettings): void {
    ensureDirectory(dirname(this.settingsPath));
    writeFileSync(this.settingsPath, renderSettings(settings), "utf-8");
    logger.info({ path: this.settingsPath }, "Settings saved");
  }

  update(update: ISettingsUpdate): ISettings {
    const next = applySettingsUpdate(this.load(), update);
    this.save(next);
    return next;
  }

  reset(): ISettings {
    this.save(DEFAULT_SETTINGS);
    return DEFAULT_SETTINGS;
  }
}
