/**
 * Auth module: barrel export
 */

export {
  resolveProviderName,
  requireProviderName,
  getEnvKeyName,
  validateProviderEntry,
  detectProviderFromEnv,
} from "./api-key-fallback.js";
