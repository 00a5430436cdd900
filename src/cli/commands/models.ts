/**
 * `ola models`: list the models a provider offers.
 */

import { Command } from "commander";
import pc from "picocolors";
import { requireProviderName } from "../../auth/api-key-fallback.js";
import { identityFromEntry } from "../../providers/registry.js";
import { listModels } from "../../providers/models.js";
import { ConfigStore } from "../../storage/config-store.js";
import { reportCommandError } from "../../utils/output.js";
import type { IProviderEntry } from "../../types/config.js";

interface IModelsFlags {
  readonly provider?: string | undefined;
  readonly quiet?: boolean | undefined;
}

/** The configured entry for the provider, or a bare one with default settings. */
function entryFor(providerFlag: string | undefined): IProviderEntry {
  const store = new ConfigStore();
  if (providerFlag === undefined) {
    return store.getActiveProvider();
  }
  const provider = requireProviderName(providerFlag);
  return store.load().providers.find((entry) => entry.provider === provider) ?? { provider, apiKey: "" };
}

export function createModelsCommand(): Command {
  return new Command("models")
    .description("List available models")
    .option("-p, --provider <name>", "Provider to list (defaults to the active one)")
    .option("-q, --quiet", "Print model names only")
    .action(async (flags: IModelsFlags) => {
      try {
        const entry = entryFor(flags.provider);
        const models = await listModels(identityFromEntry(entry));

        if (flags.quiet === true) {
          for (const model of models) {
            process.stdout.write(`${model}\n`);
          }
          return;
        }

        process.stdout.write(pc.bold(`Models for ${entry.provider}:\n`));
        if (models.length === 0) {
          process.stdout.write(pc.dim("  (none found)\n"));
        }
        for (const model of models) {
          const marker = model === entry.model ? pc.green(" (configured)") : "";
          process.stdout.write(`  ${model}${marker}\n`);
        }
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });
}
