#!/usr/bin/env node

/**
 * ola: main CLI entry point.
 * Commander setup with subcommand routing; with no subcommand the root
 * command runs a structured prompt.
 */

import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { addPromptOptions } from "./flags.js";
import type { IPromptFlags } from "./flags.js";
import { createPromptCommand, runPrompt } from "./commands/prompt.js";
import { createNonThinkCommand } from "./commands/non-think.js";
import { createConfigureCommand } from "./commands/configure.js";
import { createModelsCommand } from "./commands/models.js";
import { createSettingsCommand } from "./commands/settings.js";
import { createProjectCommand } from "./commands/project.js";
import { logger } from "../utils/logger.js";
import { reportCommandError } from "../utils/output.js";

const VERSION = "0.2.0";

/** Exit code for command-line usage errors. */
const USAGE_EXIT_CODE = 2;

function createProgram(): Command {
  const program = addPromptOptions(
    new Command()
      .name("ola")
      .description("Send structured prompts to OpenAI, Anthropic, Ollama or Gemini from the terminal")
      .version(VERSION, "-v, --version")
      .enablePositionalOptions(),
  );

  program.addCommand(createPromptCommand());
  program.addCommand(createNonThinkCommand());
  program.addCommand(createConfigureCommand());
  program.addCommand(createModelsCommand());
  program.addCommand(createSettingsCommand());
  program.addCommand(createProjectCommand());

  // Default action (no subcommand): structured prompt
  program.action(async (flags: IPromptFlags) => {
    try {
      await runPrompt(flags);
    } catch (error: unknown) {
      reportCommandError(error);
    }
  });

  return program;
}

/** Route commander's own exits, at every level, through main. */
function overrideExits(command: Command): Command {
  command.exitOverride();
  for (const subcommand of command.commands) {
    overrideExits(subcommand);
  }
  return command;
}

async function main(): Promise<void> {
  const program = overrideExits(createProgram());

  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // help and version arrive here with exit code 0; commander already printed the message
      process.exitCode = error.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
      return;
    }
    reportCommandError(error);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, "Fatal error");
  process.stderr.write(
    pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
  );
  process.exit(1);
});
