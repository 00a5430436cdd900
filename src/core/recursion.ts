/**
 * Recursive waves. Each wave is a fresh process; the wave number travels
 * to the child in OLA_RECURSION_WAVE and everything else as arguments.
 */

import { execa } from "execa";
import { logger } from "../utils/logger.js";
import type { IRecursionContext } from "../types/session.js";

export const RECURSION_ENV_VAR = "OLA_RECURSION_WAVE";

export function readRecursionWave(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[RECURSION_ENV_VAR];
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return 0;
  }
  return Number.parseInt(raw.trim(), 10);
}

export function recursionContext(
  maxWaves: number,
  env: NodeJS.ProcessEnv = process.env,
): IRecursionContext {
  return { wave: Math.min(readRecursionWave(env), maxWaves), maxWaves };
}

/** Waves are numbered from 0, so the last one is maxWaves - 1. */
export function hasNextWave(context: IRecursionContext): boolean {
  return context.wave + 1 < context.maxWaves;
}

export interface IWaveLauncher {
  /** Run the next wave to completion and resolve with its exit code. */
  launch(wave: number, args: readonly string[]): Promise<number>;
}

/** Re-runs the current Node entry script, keeping the loader flags it was started with. */
export class ProcessWaveLauncher implements IWaveLauncher {
  private readonly entryScript: string;

  constructor(entryScript: string | undefined = process.argv[1]) {
    if (entryScript === undefined) {
      throw new Error("Cannot determine the entry script to relaunch");
    }
    this.entryScript = entryScript;
  }

  async launch(wave: number, args: readonly string[]): Promise<number> {
    logger.debug({ wave, args }, "Launching recursion wave");

    const result = await execa(
      process.execPath,
      [...process.execArgv, this.entryScript, ...args],
      {
        env: { [RECURSION_ENV_VAR]: String(wave) },
        stdio: "inherit",
        reject: false,
      },
    );

    if (result.exitCode === undefined) {
      logger.warn({ wave, signal: result.signal }, "Recursion wave ended without an exit code");
      return 1;
    }
    return result.exitCode;
  }
}
