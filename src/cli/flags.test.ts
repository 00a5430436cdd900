import { describe, it, expect } from "vitest";
import { Command, InvalidArgumentError } from "commander";
import { addPromptOptions, parseBoundedInt, resolvePromptFlags, serializePromptArgs } from "./flags.js";
import type { IPromptFlags } from "./flags.js";
import { DEFAULT_SETTINGS } from "../types/config.js";

const defaults = DEFAULT_SETTINGS.defaults;

function parse(argv: readonly string[]): IPromptFlags {
  const command = addPromptOptions(new Command("prompt")).exitOverride();
  command.parse([...argv], { from: "user" });
  const flags: IPromptFlags = command.opts();
  return flags;
}

describe("parseBoundedInt", () => {
  it("accepts whole numbers from 1 to 10", () => {
    expect(parseBoundedInt("1")).toBe(1);
    expect(parseBoundedInt("10")).toBe(10);
  });

  it("rejects anything else", () => {
    expect(() => parseBoundedInt("0")).toThrow(InvalidArgumentError);
    expect(() => parseBoundedInt("11")).toThrow(InvalidArgumentError);
    expect(() => parseBoundedInt("2.5")).toThrow(InvalidArgumentError);
    expect(() => parseBoundedInt("two")).toThrow(InvalidArgumentError);
  });
});

describe("resolvePromptFlags", () => {
  it("uses piped input as goals when none were given", () => {
    const resolved = resolvePromptFlags({}, defaults, "summarize this");

    expect(resolved.goals).toBe("summarize this");
    expect(resolved.context).toBeUndefined();
    expect(resolved.returnFormat).toBe("text");
    expect(resolved.warnings).toBe("");
  });

  it("uses piped input as context alongside explicit goals", () => {
    const resolved = resolvePromptFlags({ goals: "Review", context: "from flag" }, defaults, "diff text");

    expect(resolved.goals).toBe("Review");
    expect(resolved.context).toBe("from flag\ndiff text");
  });

  it("leaves format and warnings open when goals must be asked for", () => {
    const resolved = resolvePromptFlags({}, defaults);

    expect(resolved.goals).toBeUndefined();
    expect(resolved.returnFormat).toBeUndefined();
    expect(resolved.warnings).toBeUndefined();
  });

  it("merges switches with the settings defaults", () => {
    const resolved = resolvePromptFlags({ goals: "g" }, { ...defaults, quiet: true, noThinking: true });

    expect(resolved).toMatchObject({ quiet: true, hideThinking: true, clipboard: false, streaming: true });
  });
});

describe("prompt options", () => {
  it("parses negated and bounded flags", () => {
    const flags = parse(["-g", "Plan", "-t", "--no-stream", "-r", "3", "-i", "2"]);

    expect(flags).toMatchObject({ goals: "Plan", thinking: false, stream: false, recursive: 3, iterations: 2 });
  });

  it("round-trips the arguments handed to the next wave", () => {
    const argv = serializePromptArgs({
      goals: "-starts with a dash",
      returnFormat: "json",
      warnings: "be careful",
      context: "ctx",
      clipboard: true,
      quiet: true,
      hideThinking: true,
      streaming: false,
      recursive: 3,
      iterations: 2,
      autoFeedback: true,
    });

    expect(argv[0]).toBe("prompt");
    const flags = parse(argv.slice(1));
    expect(resolvePromptFlags(flags, defaults)).toEqual({
      goals: "-starts with a dash",
      returnFormat: "json",
      warnings: "be careful",
      context: "ctx",
      clipboard: true,
      quiet: true,
      hideThinking: true,
      streaming: false,
      recursive: 3,
      iterations: 2,
      autoFeedback: true,
    });
  });
});
