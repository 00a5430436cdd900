/**
 * Configuration and settings types
 */

import type { ProviderName } from "./model.js";

// ── Provider Configuration ───────────────────────────────────────────────

export interface IProviderEntry {
  readonly provider: ProviderName;
  readonly apiKey: string;
  readonly model?: string | undefined;
  readonly baseUrl?: string | undefined;
}

export interface IProviderConfig {
  readonly activeProvider?: ProviderName | undefined;
  readonly providers: readonly IProviderEntry[];
}

export const EMPTY_PROVIDER_CONFIG: IProviderConfig = {
  providers: [],
};

// ── Settings ─────────────────────────────────────────────────────────────

export interface IPromptTemplate {
  readonly goalsPrefix: string;
  readonly returnFormatPrefix: string;
  readonly warningsPrefix: string;
}

export interface IDefaultFlags {
  readonly returnFormat: string;
  readonly quiet: boolean;
  readonly noThinking: boolean;
  readonly clipboard: boolean;
}

export interface IThinkingAnimation {
  readonly emojis: readonly string[];
  readonly text: string;
}

export interface IBehaviorSettings {
  readonly logFile: string;
  readonly enableLogging: boolean;
  readonly thinkingAnimation: IThinkingAnimation;
}

export interface ISettings {
  readonly defaultModel: string;
  readonly promptTemplate: IPromptTemplate;
  readonly defaults: IDefaultFlags;
  readonly behavior: IBehaviorSettings;
}

export const DEFAULT_SETTINGS: ISettings = {
  defaultModel: "gpt-5",
  promptTemplate: {
    goalsPrefix: "🏆 Goals: ",
    returnFormatPrefix: "📝 Return Format: ",
    warningsPrefix: "⚠️ Warnings: ",
  },
  defaults: {
    returnFormat: "text",
    quiet: false,
    noThinking: false,
    clipboard: false,
  },
  behavior: {
    logFile: "sessions.jsonl",
    enableLogging: true,
    thinkingAnimation: {
      emojis: ["🌊", "🏄", "🌊", "🏄‍♀️"],
      text: "thinking...",
    },
  },
};
