/**
 * Hints file lookup: ./.olaHints in the working directory, otherwise
 * ~/.ola-hints/olaHints.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { logger } from "../utils/logger.js";
import { getGlobalHintsPath, getLocalHintsPath } from "../utils/pathResolver.js";

export async function loadHints(
  localPath: string = getLocalHintsPath(),
  globalPath: string = getGlobalHintsPath(),
): Promise<string | undefined> {
  for (const path of [localPath, globalPath]) {
    if (!existsSync(path)) {
      continue;
    }
    const hints = await readFile(path, "utf-8");
    logger.debug({ path, bytes: hints.length }, "Hints loaded");
    return hints === "" ? undefined : hints;
  }
  return undefined;
}
