import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SettingsStore, applySettingsUpdate } from "./settings-store.js";
import { DEFAULT_SETTINGS } from "../types/config.js";

describe("SettingsStore", () => {
  let dir: string;
  let path: string;
  let store: SettingsStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ola-settings-"));
    path = join(dir, "settings.yaml");
    store = new SettingsStore(path);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the defaults on first load", () => {
    expect(store.load()).toEqual(DEFAULT_SETTINGS);
    expect(existsSync(path)).toBe(true);
    expect(store.load()).toEqual(DEFAULT_SETTINGS);
  });

  it("fills missing fields from the defaults", () => {
    writeFileSync(path, "defaultModel: llama3\nbehavior:\n  enableLogging: false\n");

    const settings = store.load();

    expect(settings.defaultModel).toBe("llama3");
    expect(settings.behavior.enableLogging).toBe(false);
    expect(settings.behavior.logFile).toBe("sessions.jsonl");
    expect(settings.promptTemplate).toEqual(DEFAULT_SETTINGS.promptTemplate);
    expect(settings.behavior.thinkingAnimation.emojis).toEqual(["🌊", "🏄", "🌊", "🏄‍♀️"]);
  });

  it("reads the snake_case layout of earlier releases", () => {
    writeFileSync(
      path,
      [
        "default_model: llama3",
        "prompt_template:",
        "  goals_prefix: \"Goals: \"",
        "defaults:",
        "  return_format: markdown",
        "  no_thinking: true",
        "behavior:",
        "  log_file: runs.jsonl",
        "  enable_logging: false",
        "  thinking_animation:",
        "    text: pondering",
        "",
      ].join("\n"),
    );

    const settings = store.load();

    expect(settings.defaultModel).toBe("llama3");
    expect(settings.promptTemplate).toEqual({
      goalsPrefix: "Goals: ",
      returnFormatPrefix: DEFAULT_SETTINGS.promptTemplate.returnFormatPrefix,
      warningsPrefix: DEFAULT_SETTINGS.promptTemplate.warningsPrefix,
    });
    expect(settings.defaults).toEqual({ returnFormat: "markdown", quiet: false, noThinking: true, clipboard: false });
    expect(settings.behavior.logFile).toBe("runs.jsonl");
    expect(settings.behavior.enableLogging).toBe(false);
    expect(settings.behavior.thinkingAnimation).toEqual({
      emojis: ["🌊", "🏄", "🌊", "🏄‍♀️"],
      text: "pondering",
    });
  });

  it("falls back to the defaults for an invalid file", () => {
    writeFileSync(path, "defaults:\n  quiet: sometimes\n");

    expect(store.load()).toEqual(DEFAULT_SETTINGS);
  });

  it("falls back to the defaults for malformed YAML", () => {
    writeFileSync(path, "defaultModel: [unclosed\n");

    expect(store.load()).toEqual(DEFAULT_SETTINGS);
  });

  it("persists updates and resets", () => {
    store.update({ defaultModel: "o3", defaultFormat: "markdown", enableLogging: false, logFile: "runs.jsonl" });

    const updated = new SettingsStore(path).load();
    expect(updated.defaultModel).toBe("o3");
    expect(updated.defaults.returnFormat).toBe("markdown");
    expect(updated.behavior.enableLogging).toBe(false);
    expect(updated.behavior.logFile).toBe("runs.jsonl");

    store.reset();
    expect(store.load()).toEqual(DEFAULT_SETTINGS);
  });
});

describe("applySettingsUpdate", () => {
  it("leaves unspecified fields alone", () => {
    expect(applySettingsUpdate(DEFAULT_SETTINGS, {})).toEqual(DEFAULT_SETTINGS);
    expect(applySettingsUpdate(DEFAULT_SETTINGS, { enableLogging: false }).behavior.logFile).toBe("sessions.jsonl");
  });
});
