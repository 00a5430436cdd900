/**
 * Project store: one directory per project under ~/.ola/data/projects:
 *
 *   <id>/project.json   metadata, goals, contexts and the file index
 *   <id>/files/<fileId> uploaded file contents
 *
 * The active project id lives in ~/.ola/data/active_project.
 */

import { randomUUID } from "node:crypto";
import { isUtf8 } from "node:buffer";
import {
  existsSync,
  readdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import {
  ensureDirectory,
  getActiveProjectPath,
  getProjectsDir,
} from "../utils/pathResolver.js";
import {
  DuplicateProjectError,
  InvalidConfigError,
  ProjectNotFoundError,
} from "../types/errors.js";
import { DEFAULT_PROJECT_ID, DEFAULT_PROJECT_NAME } from "../types/project.js";
import type {
  IProject,
  IProjectContent,
  IProjectFile,
  IProjectFileContent,
  IProjectItem,
} from "../types/project.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const ProjectItemSchema = z.object({
  id: z.string(),
  text: z.string(),
  order: z.number().int().nonnegative(),
});

const ProjectFileSchema = z.object({
  id: z.string(),
  filename: z.string(),
  size: z.number().int().nonnegative(),
  mimeType: z.string().optional(),
  uploadedAt: z.string(),
});

const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  files: z.array(ProjectFileSchema).default([]),
  goals: z.array(ProjectItemSchema).default([]),
  contexts: z.array(ProjectItemSchema).default([]),
});

/** Normalized to millisecond ISO form so timestamps from either layout sort together. */
const LegacyTimestampSchema = z.string().transform((value) => {
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
});

/** Earlier releases wrote project.json with snake_case keys. */
const LegacyProjectSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    created_at: LegacyTimestampSchema,
    updated_at: LegacyTimestampSchema,
    files: z
      .array(
        z.object({
          id: z.string(),
          filename: z.string(),
          size: z.number().int().nonnegative(),
          mime_type: z.string().nullish(),
          uploaded_at: LegacyTimestampSchema,
        }),
      )
      .default([]),
    goals: z.array(ProjectItemSchema).default([]),
    contexts: z.array(ProjectItemSchema).default([]),
  })
  .transform(
    (legacy): z.input<typeof ProjectSchema> => ({
      id: legacy.id,
      name: legacy.name,
      createdAt: legacy.created_at,
      updatedAt: legacy.updated_at,
      files: legacy.files.map((file) => ({
        id: file.id,
        filename: file.filename,
        size: file.size,
        mimeType: file.mime_type ?? undefined,
        uploadedAt: file.uploaded_at,
      })),
      goals: legacy.goals,
      contexts: legacy.contexts,
    }),
  )
  .pipe(ProjectSchema);

function isLegacyProject(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "created_at" in raw;
}

// ── MIME Types ───────────────────────────────────────────────────────────

const MIME_TYPES: Readonly<Record<string, string>> = {
  ".rs": "text/rust",
  ".py": "text/python",
  ".js": "text/javascript",
  ".ts": "text/typescript",
  ".json": "application/json",
  ".yaml": "text/yaml",
  ".yml": "text/yaml",
  ".toml": "text/toml",
  ".md": "text/markdown",
  ".txt": "text/plain",
  ".html": "text/html",
  ".css": "text/css",
};

export function guessMimeType(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? "application/octet-stream";
}

/** Files that are not valid UTF-8 reach prompts as a base64 notice. */
export function decodeFileContent(bytes: Buffer): string {
  if (isUtf8(bytes)) {
    return bytes.toString("utf8");
  }
  return `[Binary file - base64 encoded: ${bytes.toString("base64")}]`;
}

type ItemList = "goals" | "contexts";

// ── Store ────────────────────────────────────────────────────────────────

export class ProjectStore {
  private readonly projectsDir: string;
  private readonly activePath: string;
  private readonly now: () => Date;

  constructor(
    projectsDir: string = getProjectsDir(),
    activePath: string = getActiveProjectPath(),
    now: () => Date = () => new Date(),
  ) {
    this.projectsDir = projectsDir;
    this.activePath = activePath;
    this.now = now;
  }

  // ── Lookup ─────────────────────────────────────────────────────────────

  /** Most recently updated first. Unreadable project directories are skipped. */
  list(): IProject[] {
    if (!existsSync(this.projectsDir)) {
      return [];
    }

    const projects: IProject[] = [];
    for (const entry of readdirSync(this.projectsDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) {
        continue;
      }
      try {
        const project = this.load(entry.name);
        if (project !== undefined) {
          projects.push(project);
        }
      } catch (error: unknown) {
        if (!(error instanceof InvalidConfigError)) {
          throw error;
        }
        logger.warn({ id: entry.name, error: error.message }, "Skipping unreadable project");
      }
    }

    return projects.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  load(id: string): IProject | undefined {
    const path = this.projectFilePath(id);
    if (!existsSync(path)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(path, message);
    }

    const validated = isLegacyProject(raw) ? LegacyProjectSchema.safeParse(raw) : ProjectSchema.safeParse(raw);
    if (!validated.success) {
      const issue = validated.error.issues[0];
      throw new InvalidConfigError(path, issue?.message ?? "invalid project file");
    }
    return validated.data;
  }

  require(id: string): IProject {
    const project = this.load(id);
    if (project === undefined) {
      throw new ProjectNotFoundError(id);
    }
    return project;
  }

  /** Names match case-insensitively. */
  findByName(name: string): IProject | undefined {
    const wanted = name.toLowerCase();
    return this.list().find((project) => project.name.toLowerCase() === wanted);
  }

  /**
   * The named project (by name, then by id), or with no name the active
   * project, or the default project, created on demand.
   */
  resolve(nameOrId?: string): IProject {
    if (nameOrId !== undefined) {
      const project = this.findByName(nameOrId) ?? this.load(nameOrId);
      if (project === undefined) {
        throw new ProjectNotFoundError(nameOrId);
      }
      return project;
    }

    const activeId = this.getActiveId();
    return activeId !== undefined ? this.require(activeId) : this.getDefault();
  }

  getDefault(): IProject {
    const existing = this.load(DEFAULT_PROJECT_ID);
    if (existing !== undefined) {
      return existing;
    }
    logger.info("Creating default project");
    return this.initialize(DEFAULT_PROJECT_ID, DEFAULT_PROJECT_NAME);
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────

  create(name: string): IProject {
    const trimmed = name.trim();
    if (trimmed === "") {
      throw new InvalidConfigError("name", "a project name is required");
    }
    if (this.findByName(trimmed) !== undefined) {
      throw new DuplicateProjectError(trimmed);
    }
    return this.initialize(randomUUID(), trimmed);
  }

  rename(id: string, name: string): IProject {
    const trimmed = name.trim();
    if (trimmed === "") {
      throw new InvalidConfigError("name", "a project name is required");
    }
    const clash = this.findByName(trimmed);
    if (clash !== undefined && clash.id !== id) {
      throw new DuplicateProjectError(trimmed);
    }
    return this.update(id, (project) => ({ ...project, name: trimmed }));
  }

  delete(id: string): void {
    this.require(id);
    const wasActive = this.getActiveId() === id;
    rmSync(join(this.projectsDir, id), { recursive: true, force: true });
    if (wasActive) {
      rmSync(this.activePath, { force: true });
    }
    logger.info({ id }, "Project deleted");
  }

  // ── Active Project ─────────────────────────────────────────────────────

  setActive(id: string): void {
    this.require(id);
    ensureDirectory(dirname(this.activePath));
    writeFileSync(this.activePath, id, "utf-8");
  }

  /** A stale reference to a deleted project is removed. */
  getActiveId(): string | undefined {
    if (!existsSync(this.activePath)) {
      return undefined;
    }
    const id = readFileSync(this.activePath, "utf-8").trim();
    if (id !== "" && existsSync(this.projectFilePath(id))) {
      return id;
    }
    logger.debug({ id }, "Clearing stale active project");
    rmSync(this.activePath, { force: true });
    return undefined;
  }

  // ── Goals & Contexts ───────────────────────────────────────────────────

  addGoal(id: string, text: string): IProjectItem {
    return this.addItem(id, "goals", text);
  }

  removeGoal(id: string, goalId: string): boolean {
    return this.removeItem(id, "goals", goalId);
  }

  addContext(id: string, text: string): IProjectItem {
    return this.addItem(id, "contexts", text);
  }

  removeContext(id: string, contextId: string): boolean {
    return this.removeItem(id, "contexts", contextId);
  }

  // ── Files ──────────────────────────────────────────────────────────────

  uploadFile(id: string, sourcePath: string): IProjectFile {
    this.require(id);
    const bytes = readFileSync(sourcePath);
    const filename = basename(sourcePath);
    const file: IProjectFile = {
      id: randomUUID(),
      filename,
      size: bytes.length,
      mimeType: guessMimeType(filename),
      uploadedAt: this.timestamp(),
    };

    const filesDir = join(this.projectsDir, id, "files");
    ensureDirectory(filesDir);
    writeFileSync(join(filesDir, file.id), bytes);

    this.update(id, (project) => ({ ...project, files: [...project.files, file] }));
    logger.info({ id, fileId: file.id, size: file.size }, "File uploaded");
    return file;
  }

  removeFile(id: string, fileId: string): boolean {
    const project = this.require(id);
    if (!project.files.some((file) => file.id === fileId)) {
      return false;
    }
    rmSync(join(this.projectsDir, id, "files", fileId), { force: true });
    this.update(id, (current) => ({
      ...current,
      files: current.files.filter((file) => file.id !== fileId),
    }));
    return true;
  }

  /** Goals and contexts in order, with the text of every stored file. */
  getContent(project: IProject): IProjectContent {
    const files: IProjectFileContent[] = [];
    for (const file of project.files) {
      const path = join(this.projectsDir, project.id, "files", file.id);
      if (!existsSync(path)) {
        logger.warn({ project: project.id, fileId: file.id }, "Project file missing on disk");
        continue;
      }
      files.push({ filename: file.filename, content: decodeFileContent(readFileSync(path)) });
    }

    return {
      goals: byOrder(project.goals).map((goal) => goal.text),
      contexts: byOrder(project.contexts).map((context) => context.text),
      files,
    };
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private initialize(id: string, name: string): IProject {
    const timestamp = this.timestamp();
    const project: IProject = {
      id,
      name,
      createdAt: timestamp,
      updatedAt: timestamp,
      files: [],
      goals: [],
      contexts: [],
    };
    ensureDirectory(join(this.projectsDir, id, "files"));
    this.save(project);
    logger.info({ id, name }, "Project created");
    return project;
  }

  private addItem(id: string, list: ItemList, text: string): IProjectItem {
    if (text.trim() === "") {
      throw new InvalidConfigError(list, "text must not be empty");
    }
    const project = this.require(id);
    const order = project[list].reduce((highest, existing) => Math.max(highest, existing.order + 1), 0);
    const item: IProjectItem = { id: randomUUID(), text, order };
    this.update(id, (current) => ({ ...current, [list]: [...current[list], item] }));
    return item;
  }

  private removeItem(id: string, list: ItemList, itemId: string): boolean {
    const project = this.require(id);
    if (!project[list].some((item) => item.id === itemId)) {
      return false;
    }
    this.update(id, (current) => ({
      ...current,
      [list]: current[list].filter((item) => item.id !== itemId),
    }));
    return true;
  }

  private update(id: string, change: (project: IProject) => IProject): IProject {
    const next: IProject = { ...change(this.require(id)), updatedAt: this.timestamp() };
    this.save(next);
    return next;
  }

  private save(project: IProject): void {
    const path = this.projectFilePath(project.id);
    ensureDirectory(dirname(path));
    writeFileSync(path, `${JSON.stringify(project, null, 2)}\n`, "utf-8");
  }

  private projectFilePath(id: string): string {
    return join(this.projectsDir, id, "project.json");
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function byOrder(items: readonly IProjectItem[]): IProjectItem[] {
  return [...items].sort((a, b) => a.order - b.order);
}
