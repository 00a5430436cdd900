import { describe, it, expect } from "vitest";
import { knownPromptFields, planPrompt } from "./prompt.js";
import { resolvePromptFlags } from "../flags.js";
import { RECURSION_ENV_VAR } from "../../core/recursion.js";
import { DEFAULT_SETTINGS } from "../../types/config.js";

const defaults = DEFAULT_SETTINGS.defaults;

describe("knownPromptFields", () => {
  it("fills format and warnings once goals are known", () => {
    const resolved = resolvePromptFlags({ goals: "draft a reply" }, defaults);

    expect(knownPromptFields(resolved, "text")).toEqual({
      goals: "draft a reply",
      returnFormat: "text",
      warnings: "",
    });
  });

  it("leaves the fields to be asked without goals", () => {
    expect(knownPromptFields(resolvePromptFlags({ format: "json" }, defaults), "text")).toBeUndefined();
  });
});

describe("planPrompt", () => {
  it("builds a single-shot job with interactive feedback on a terminal", () => {
    const resolved = resolvePromptFlags({ goals: "draft a reply", iterations: 3 }, defaults);
    const fields = { goals: "draft a reply", returnFormat: "text", warnings: "" };

    const plan = planPrompt(resolved, fields, { model: "gpt-4o", hints: "be brief", terminal: true, env: {} });

    expect(plan.interactiveFeedback).toBe(true);
    expect(plan.banner).toBeUndefined();
    expect(plan.job).toEqual({
      input: { goals: "draft a reply", returnFormat: "text", warnings: "", hints: "be brief" },
      model: "gpt-4o",
      output: { streaming: true, hideThinking: false, stripThinking: false },
      clipboard: false,
      iterations: 3,
    });
    expect(plan.job.recursion).toBeUndefined();
    expect(plan.job.nextWaveArgs).toBeUndefined();
  });

  it("falls back to automatic feedback when asked or without a terminal", () => {
    const fields = { goals: "g", returnFormat: "text", warnings: "" };

    const auto = resolvePromptFlags({ goals: "g", iterations: 2, autoFeedback: true }, defaults);
    expect(planPrompt(auto, fields, { model: "m", terminal: true }).interactiveFeedback).toBe(false);

    const piped = resolvePromptFlags({ goals: "g", iterations: 2 }, defaults);
    expect(planPrompt(piped, fields, { model: "m", terminal: false }).interactiveFeedback).toBe(false);
  });

  it("hands the resolved fields and wave settings to the next wave", () => {
    const resolved = resolvePromptFlags({ goals: "-x y", recursive: 3, thinking: false }, defaults);
    const fields = { goals: "-x y", returnFormat: "text", warnings: "" };

    const plan = planPrompt(resolved, fields, {
      model: "gpt-4o",
      terminal: false,
      env: { [RECURSION_ENV_VAR]: "1" },
    });

    expect(plan.job.recursion).toEqual({ wave: 1, maxWaves: 3 });
    expect(plan.job.nextWaveArgs).toEqual([
      "prompt",
      "--goals=-x y",
      "--format=text",
      "--warnings=",
      "-t",
      "-r",
      "3",
    ]);
  });

  it("passes interactively asked fields on so child waves never ask", () => {
    const resolved = resolvePromptFlags({ format: "json", recursive: 2 }, defaults);
    const asked = { goals: "asked goals", returnFormat: "json", warnings: "careful" };

    const plan = planPrompt(resolved, asked, { model: "m", terminal: true, env: {} });

    expect(plan.job.input).toMatchObject(asked);
    expect(plan.job.nextWaveArgs).toEqual([
      "prompt",
      "--goals=asked goals",
      "--format=json",
      "--warnings=careful",
      "-r",
      "2",
    ]);
  });

  it("prints the wave banner in child waves only", () => {
    const resolved = resolvePromptFlags({ goals: "g", recursive: 3 }, defaults);
    const fields = { goals: "g", returnFormat: "text", warnings: "" };

    const first = planPrompt(resolved, fields, { model: "m", terminal: false, env: { [RECURSION_ENV_VAR]: "0" } });
    const child = planPrompt(resolved, fields, { model: "m", terminal: false, env: { [RECURSION_ENV_VAR]: "2" } });
    const quietChild = planPrompt(
      resolvePromptFlags({ goals: "g", recursive: 3, quiet: true }, defaults),
      fields,
      { model: "m", terminal: false, env: { [RECURSION_ENV_VAR]: "2" } },
    );

    expect(first.banner).toBeUndefined();
    expect(child.banner).toContain("[RECURSION WAVE 2]  Processing...");
    expect(quietChild.banner).toBeUndefined();
  });
});
