/**
 * Storage layer barrel export
 */

export { ConfigStore } from "./config-store.js";
export { SettingsStore, applySettingsUpdate, renderSettings } from "./settings-store.js";
export type { ISettingsUpdate } from "./settings-store.js";
export { ProjectStore, guessMimeType, decodeFileContent } from "./project-store.js";
export { JsonlSessionLog } from "./session-log.js";
