/**
 * Path layout under the ola home directory (~/.ola, or $OLA_HOME)
 */

import { homedir } from "node:os";
import { join, isAbsolute } from "node:path";
import { existsSync, mkdirSync } from "node:fs";

// ── Home Layout ──────────────────────────────────────────────────────────

export function getOlaHome(): string {
  return process.env["OLA_HOME"] ?? join(homedir(), ".ola");
}

export function getConfigPath(): string {
  return join(getOlaHome(), "config.yaml");
}

/** Earlier releases stored provider config as JSON. */
export function getLegacyConfigPath(): string {
  return join(getOlaHome(), "config.json");
}

export function getSettingsPath(): string {
  return join(getOlaHome(), "settings.yaml");
}

export function getDataDir(): string {
  return join(getOlaHome(), "data");
}

export function getProjectsDir(): string {
  return join(getDataDir(), "projects");
}

export function getActiveProjectPath(): string {
  return join(getDataDir(), "active_project");
}

/** Relative log files live under the ola home. */
export function resolveLogFilePath(logFile: string): string {
  return isAbsolute(logFile) ? logFile : join(getOlaHome(), logFile);
}

// ── Hints ────────────────────────────────────────────────────────────────

export function getLocalHintsPath(cwd: string = process.cwd()): string {
  return join(cwd, ".olaHints");
}

export function getGlobalHintsPath(): string {
  return join(homedir(), ".ola-hints", "olaHints");
}

// ── Directory Initialization ─────────────────────────────────────────────

export function ensureDirectory(dirPath: string, mode?: number): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true, mode: mode ?? 0o755 });
  }
}

export function ensureSecureDirectory(dirPath: string): void {
  ensureDirectory(dirPath, 0o700);
}
