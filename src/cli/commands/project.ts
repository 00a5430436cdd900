/**
 * `ola project`: manage projects whose goals, contexts and files are
 * folded into prompts, and run prompts against them.
 */

import { Command } from "commander";
import pc from "picocolors";
import { askChoice, askConfirm, askText } from "../interactive.js";
import { createOrchestrator, loadRuntime } from "../runtime.js";
import { loadHints } from "../../core/hints.js";
import { ProjectStore } from "../../storage/project-store.js";
import { reportCommandError } from "../../utils/output.js";
import { ProjectNotFoundError } from "../../types/errors.js";
import type { IProject } from "../../types/project.js";

interface IProjectOption {
  readonly project?: string | undefined;
}

function print(line = ""): void {
  process.stdout.write(`${line}\n`);
}

function formatTime(iso: string): string {
  return iso.replace("T", " ").replace(/\.\d+Z$/, "").replace(/Z$/, "");
}

/** Wrap an action so failures print and set the exit code. */
function guarded<A extends unknown[]>(action: (...args: A) => Promise<void> | void): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error: unknown) {
      reportCommandError(error);
    }
  };
}

/** The named project, or an interactive pick among all of them. */
async function pickProject(store: ProjectStore, name: string | undefined, purpose: string): Promise<IProject> {
  if (name !== undefined) {
    return store.resolve(name);
  }

  const projects = store.list();
  if (projects.length === 0) {
    throw new ProjectNotFoundError("(none)");
  }
  const activeId = store.getActiveId();
  const id = await askChoice(
    `Select project to ${purpose}`,
    projects.map((project) => ({
      name: project.id === activeId ? `${project.name} (active)` : project.name,
      value: project.id,
    })),
  );
  return store.require(id);
}

// ── Listing & Details ────────────────────────────────────────────────────

function listProjects(store: ProjectStore): void {
  const projects = store.list();
  if (projects.length === 0) {
    print("No projects found. Create one with 'ola project create --name <name>'");
    return;
  }

  const activeId = store.getActiveId();
  print(pc.bold("Projects:"));
  for (const project of projects) {
    const marker = project.id === activeId ? pc.green("*") : " ";
    print(
      `${marker} ${project.name} (${project.id}) - ${project.files.length} files, ` +
        `${project.goals.length} goals, ${project.contexts.length} contexts`,
    );
    print(pc.dim(`    Updated: ${formatTime(project.updatedAt)}`));
  }
  if (activeId !== undefined) {
    print(`\nActive project: ${activeId}`);
  }
}

function showProject(project: IProject): void {
  print(pc.bold("Project Details:"));
  print(`  Name: ${project.name}`);
  print(`  ID: ${project.id}`);
  print(`  Created: ${formatTime(project.createdAt)}`);
  print(`  Updated: ${formatTime(project.updatedAt)}`);

  print(`\nGoals (${project.goals.length}):`);
  for (const goal of project.goals) {
    print(`  ${goal.id} - ${goal.text}`);
  }
  print(`\nContexts (${project.contexts.length}):`);
  for (const context of project.contexts) {
    print(`  ${context.id} - ${context.text}`);
  }
  print(`\nFiles (${project.files.length}):`);
  for (const file of project.files) {
    print(`  ${file.id} - ${file.filename} (${file.size} bytes)`);
  }
}

// ── Command ──────────────────────────────────────────────────────────────

interface IRunFlags extends IProjectOption {
  readonly goals: string;
  readonly format: string;
  readonly warnings: string;
  readonly clipboard?: boolean | undefined;
  readonly thinking?: boolean | undefined;
}

async function runProjectPrompt(store: ProjectStore, flags: IRunFlags): Promise<void> {
  const project = store.resolve(flags.project);
  const runtime = loadRuntime();
  const { defaults } = runtime.settings;
  const { orchestrator, reporter } = createOrchestrator(runtime, { quiet: defaults.quiet });
  reporter.info(`Using project: ${project.name}`);
  reporter.info(`Using model: ${runtime.model}`);

  await orchestrator.run({
    input: {
      goals: flags.goals,
      returnFormat: flags.format,
      warnings: flags.warnings,
      project: store.getContent(project),
      hints: await loadHints(),
    },
    model: runtime.model,
    output: {
      streaming: true,
      hideThinking: flags.thinking === false || defaults.noThinking,
      stripThinking: false,
    },
    clipboard: flags.clipboard === true || defaults.clipboard,
  });
}

export function createProjectCommand(store: ProjectStore = new ProjectStore()): Command {
  const project = new Command("project")
    .description("Manage projects")
    .action(guarded(() => listProjects(store)));

  project
    .command("list")
    .alias("ls")
    .description("List all projects")
    .action(guarded(() => listProjects(store)));

  project
    .command("create")
    .description("Create a new project")
    .option("-n, --name <name>", "Project name")
    .action(
      guarded(async (flags: { name?: string | undefined }) => {
        const name = flags.name ?? (await askText("Project name"));
        const created = store.create(name);
        print(pc.green(`Created project '${created.name}' with ID: ${created.id}`));

        const makeActive =
          store.getActiveId() === undefined || (await askConfirm(`Set '${created.name}' as active project?`));
        if (makeActive) {
          store.setActive(created.id);
          print("   Set as active project");
        }
      }),
    );

  project
    .command("delete")
    .alias("rm")
    .description("Delete a project")
    .option("-p, --project <name>", "Project name")
    .option("-f, --force", "Delete without confirmation")
    .action(
      guarded(async (flags: IProjectOption & { force?: boolean | undefined }) => {
        const target = await pickProject(store, flags.project, "delete");
        const confirmed =
          flags.force === true ||
          (await askConfirm(`Are you sure you want to delete project '${target.name}'? This cannot be undone.`, false));
        if (!confirmed) {
          print("Deletion cancelled");
          return;
        }
        store.delete(target.id);
        print(pc.green(`Deleted project '${target.name}'`));
      }),
    );

  project
    .command("edit")
    .description("Rename a project")
    .option("-p, --project <name>", "Project name")
    .option("-n, --name <name>", "New project name")
    .action(
      guarded(async (flags: IProjectOption & { name?: string | undefined }) => {
        const target = await pickProject(store, flags.project, "edit");
        const name = flags.name ?? (await askText("New project name", target.name));
        if (name === target.name) {
          print(`No changes made to project '${target.name}'`);
          return;
        }
        store.rename(target.id, name);
        print(pc.green(`Updated project name from '${target.name}' to '${name}'`));
      }),
    );

  project
    .command("set")
    .description("Set the active project")
    .option("-p, --project <name>", "Project name")
    .action(
      guarded(async (flags: IProjectOption) => {
        const target = await pickProject(store, flags.project, "set as active");
        store.setActive(target.id);
        print(pc.green(`Set '${target.name}' as active project`));
      }),
    );

  project
    .command("show")
    .description("Show project details")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .action(guarded((flags: IProjectOption) => showProject(store.resolve(flags.project))));

  project
    .command("upload")
    .description("Upload a file to a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-f, --file <path>", "File to upload")
    .action(
      guarded((flags: IProjectOption & { file: string }) => {
        const target = store.resolve(flags.project);
        const file = store.uploadFile(target.id, flags.file);
        print(pc.green(`Uploaded file '${file.filename}' to project '${target.name}'`));
        print(`   File ID: ${file.id}`);
      }),
    );

  project
    .command("files")
    .description("List files in a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .action(
      guarded((flags: IProjectOption) => {
        const target = store.resolve(flags.project);
        if (target.files.length === 0) {
          print(`No files in project '${target.name}'`);
          return;
        }
        print(`Files in project '${target.name}':`);
        for (const file of target.files) {
          print(`  ${file.id} - ${file.filename} (${file.size} bytes, ${formatTime(file.uploadedAt)})`);
        }
      }),
    );

  project
    .command("add-goal")
    .description("Add a goal to a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-g, --goal <text>", "Goal text")
    .action(
      guarded((flags: IProjectOption & { goal: string }) => {
        const target = store.resolve(flags.project);
        const goal = store.addGoal(target.id, flags.goal);
        print(pc.green(`Added goal to project '${target.name}': ${goal.text}`));
        print(`   Goal ID: ${goal.id}`);
      }),
    );

  project
    .command("remove-goal")
    .description("Remove a goal from a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-g, --goal-id <id>", "Goal ID")
    .action(
      guarded((flags: IProjectOption & { goalId: string }) => {
        const target = store.resolve(flags.project);
        removeItem(store.removeGoal(target.id, flags.goalId), "Goal", flags.goalId, target.name);
      }),
    );

  project
    .command("add-context")
    .description("Add context to a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-c, --context <text>", "Context text")
    .action(
      guarded((flags: IProjectOption & { context: string }) => {
        const target = store.resolve(flags.project);
        const context = store.addContext(target.id, flags.context);
        print(pc.green(`Added context to project '${target.name}': ${context.text}`));
        print(`   Context ID: ${context.id}`);
      }),
    );

  project
    .command("remove-context")
    .description("Remove context from a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-c, --context-id <id>", "Context ID")
    .action(
      guarded((flags: IProjectOption & { contextId: string }) => {
        const target = store.resolve(flags.project);
        removeItem(store.removeContext(target.id, flags.contextId), "Context", flags.contextId, target.name);
      }),
    );

  project
    .command("remove-file")
    .description("Remove a file from a project")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-f, --file-id <id>", "File ID")
    .action(
      guarded((flags: IProjectOption & { fileId: string }) => {
        const target = store.resolve(flags.project);
        removeItem(store.removeFile(target.id, flags.fileId), "File", flags.fileId, target.name);
      }),
    );

  project
    .command("run")
    .description("Run a prompt with project goals, context and files")
    .option("-p, --project <name>", "Project name (defaults to the active project)")
    .requiredOption("-g, --goals <goals>", "What the response should achieve")
    .option("-f, --format <format>", "Return format", "text")
    .option("-w, --warnings <warnings>", "Warnings or constraints", "")
    .option("-c, --clipboard", "Copy the response to the clipboard")
    .option("-t, --no-thinking", "Hide <think> blocks from live output")
    .action(guarded((flags: IRunFlags) => runProjectPrompt(store, flags)));

  return project;
}

function removeItem(removed: boolean, kind: string, id: string, projectName: string): void {
  if (!removed) {
    process.stderr.write(pc.red(`${kind} '${id}' not found in project '${projectName}'\n`));
    process.exitCode = 1;
    return;
  }
  print(pc.green(`Removed ${kind.toLowerCase()} '${id}' from project '${projectName}'`));
}
