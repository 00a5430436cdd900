/**
 * Wires settings, the active provider and terminal sinks into an
 * orchestrator for one command run.
 */

import { Orchestrator } from "../core/orchestrator.js";
import { AutomaticFeedbackSource, InteractiveFeedbackSource } from "../core/feedback.js";
import { ProcessWaveLauncher } from "../core/recursion.js";
import type { IReporter } from "../core/types.js";
import { ProviderClient } from "../providers/registry.js";
import { ConfigStore } from "../storage/config-store.js";
import { SettingsStore } from "../storage/settings-store.js";
import { JsonlSessionLog } from "../storage/session-log.js";
import { SystemClipboard } from "../utils/clipboard.js";
import { createReporter } from "../utils/output.js";
import { resolveLogFilePath } from "../utils/pathResolver.js";
import type { ISettings } from "../types/config.js";

export interface IRuntime {
  readonly settings: ISettings;
  readonly client: ProviderClient;
  /** The provider's configured model, or the settings default. */
  readonly model: string;
}

export function loadRuntime(): IRuntime {
  const settings = new SettingsStore().load();
  const entry = new ConfigStore().getActiveProvider();
  const client = ProviderClient.fromEntry(entry);
  return { settings, client, model: entry.model ?? settings.defaultModel };
}

export interface IOrchestratorOptions {
  readonly quiet: boolean;
  /** Ask for feedback between rounds; otherwise feedback is automatic. */
  readonly interactiveFeedback?: boolean | undefined;
  readonly recursive?: boolean | undefined;
}

export function createOrchestrator(runtime: IRuntime, options: IOrchestratorOptions): {
  orchestrator: Orchestrator;
  reporter: IReporter;
} {
  const { settings } = runtime;
  const reporter = createReporter(options.quiet);

  const orchestrator = new Orchestrator({
    client: runtime.client,
    sinks: {
      out: process.stdout,
      side: process.stderr,
      animation: settings.behavior.thinkingAnimation,
    },
    template: settings.promptTemplate,
    reporter,
    sessionLog: settings.behavior.enableLogging
      ? new JsonlSessionLog(resolveLogFilePath(settings.behavior.logFile))
      : undefined,
    clipboard: new SystemClipboard(),
    feedback: options.interactiveFeedback === true ? new InteractiveFeedbackSource() : new AutomaticFeedbackSource(),
    launcher: options.recursive === true ? new ProcessWaveLauncher() : undefined,
  });

  return { orchestrator, reporter };
}
