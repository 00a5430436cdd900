/**
 * `ola non-think`: send a raw prompt without the goals/format/warnings
 * structure.
 */

import { Command } from "commander";
import { askText } from "../interactive.js";
import { createOrchestrator, loadRuntime } from "../runtime.js";
import { loadHints } from "../../core/hints.js";
import { readPipedInput } from "../../utils/stdin.js";
import { reportCommandError } from "../../utils/output.js";

interface INonThinkFlags {
  readonly prompt?: string | undefined;
  readonly clipboard?: boolean | undefined;
  readonly quiet?: boolean | undefined;
  readonly pipe?: boolean | undefined;
  readonly filterThinking?: boolean | undefined;
}

async function runNonThink(flags: INonThinkFlags): Promise<void> {
  const runtime = loadRuntime();
  const { defaults } = runtime.settings;

  const piped = flags.pipe === true ? await readPipedInput() : undefined;
  const prompt = flags.prompt ?? piped ?? (await askText("Enter your prompt:"));
  const context = flags.prompt !== undefined ? piped : undefined;

  const quiet = flags.quiet === true || defaults.quiet;
  const filter = flags.filterThinking === true;
  const { orchestrator, reporter } = createOrchestrator(runtime, { quiet });
  reporter.info(`Using model: ${runtime.model}`);

  await orchestrator.runRaw({
    prompt,
    context,
    hints: await loadHints(),
    model: runtime.model,
    output: { streaming: true, hideThinking: filter, stripThinking: filter },
    clipboard: flags.clipboard === true || defaults.clipboard,
  });
}

export function createNonThinkCommand(): Command {
  return new Command("non-think")
    .description("Send a raw prompt as typed")
    .option("-p, --prompt <text>", "Prompt text")
    .option("-c, --clipboard", "Copy the response to the clipboard")
    .option("-q, --quiet", "Suppress status messages")
    .option("-i, --pipe", "Read piped input from stdin")
    .option("-f, --filter-thinking", "Remove <think> blocks from the output")
    .action(async (flags: INonThinkFlags) => {
      try {
        await runNonThink(flags);
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });
}
