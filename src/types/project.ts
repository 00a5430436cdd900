/**
 * Project types. A project bundles goals, contexts and uploaded files
 * that are folded into every prompt run against it.
 */

export interface IProjectFile {
  readonly id: string;
  readonly filename: string;
  readonly size: number;
  readonly mimeType?: string | undefined;
  readonly uploadedAt: string;
}

export interface IProjectItem {
  readonly id: string;
  readonly text: string;
  readonly order: number;
}

export interface IProject {
  readonly id: string;
  readonly name: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly files: readonly IProjectFile[];
  readonly goals: readonly IProjectItem[];
  readonly contexts: readonly IProjectItem[];
}

export interface IProjectFileContent {
  readonly filename: string;
  readonly content: string;
}

/** What the prompt assembler needs from a project. */
export interface IProjectContent {
  readonly goals: readonly string[];
  readonly contexts: readonly string[];
  readonly files: readonly IProjectFileContent[];
}

/** Created on demand when no project is active. */
export const DEFAULT_PROJECT_ID = "default";
export const DEFAULT_PROJECT_NAME = "Default";
