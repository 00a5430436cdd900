/**
 * Utilities barrel export
 */

export { logger } from "./logger.js";
export {
  getOlaHome,
  getConfigPath,
  getLegacyConfigPath,
  getSettingsPath,
  getDataDir,
  getProjectsDir,
  getActiveProjectPath,
  resolveLogFilePath,
  getLocalHintsPath,
  getGlobalHintsPath,
  ensureDirectory,
  ensureSecureDirectory,
} from "./pathResolver.js";
export { errorMessage, createReporter, reportCommandError, waveBanner } from "./output.js";
export { SystemClipboard } from "./clipboard.js";
export { readPipedInput } from "./stdin.js";
