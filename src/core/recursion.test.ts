import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  hasNextWave,
  ProcessWaveLauncher,
  readRecursionWave,
  recursionContext,
  RECURSION_ENV_VAR,
} from "./recursion.js";

const CHILD_SCRIPT = fileURLToPath(new URL("./__fixtures__/wave-child.mjs", import.meta.url));

describe("readRecursionWave", () => {
  it("reads the wave number from the environment", () => {
    expect(readRecursionWave({ [RECURSION_ENV_VAR]: "2" })).toBe(2);
  });

  it("defaults to the first wave when unset or not a number", () => {
    expect(readRecursionWave({})).toBe(0);
    expect(readRecursionWave({ [RECURSION_ENV_VAR]: "two" })).toBe(0);
    expect(readRecursionWave({ [RECURSION_ENV_VAR]: "-1" })).toBe(0);
  });
});

describe("recursionContext", () => {
  it("caps the wave at the maximum", () => {
    expect(recursionContext(3, { [RECURSION_ENV_VAR]: "7" })).toEqual({ wave: 3, maxWaves: 3 });
  });
});

describe("hasNextWave", () => {
  it("runs exactly maxWaves waves numbered from zero", () => {
    expect(hasNextWave({ wave: 0, maxWaves: 3 })).toBe(true);
    expect(hasNextWave({ wave: 1, maxWaves: 3 })).toBe(true);
    expect(hasNextWave({ wave: 2, maxWaves: 3 })).toBe(false);
    expect(hasNextWave({ wave: 0, maxWaves: 1 })).toBe(false);
  });
});

describe("ProcessWaveLauncher", () => {
  let dir: string;
  let reportPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ola-wave-"));
    reportPath = join(dir, "report.json");
    vi.stubEnv("OLA_TEST_WAVE_REPORT", reportPath);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it("hands the wave number and arguments to the child process", async () => {
    const launcher = new ProcessWaveLauncher(CHILD_SCRIPT);

    const exitCode = await launcher.launch(2, ["prompt", "--goals=-x y", "-r", "3"]);

    expect(exitCode).toBe(0);
    expect(JSON.parse(readFileSync(reportPath, "utf-8"))).toEqual({
      wave: "2",
      args: ["prompt", "--goals=-x y", "-r", "3"],
    });
  });

  it("resolves with the child's exit code instead of rejecting", async () => {
    vi.stubEnv("OLA_TEST_WAVE_EXIT", "3");
    const launcher = new ProcessWaveLauncher(CHILD_SCRIPT);

    await expect(launcher.launch(1, ["prompt"])).resolves.toBe(3);
    expect(JSON.parse(readFileSync(reportPath, "utf-8"))).toEqual({ wave: "1", args: ["prompt"] });
  });
});
