/**
 * `ola settings`: view and change ~/.ola/settings.yaml.
 */

import { Command, InvalidArgumentError } from "commander";
import pc from "picocolors";
import { SettingsStore, renderSettings } from "../../storage/settings-store.js";
import type { ISettingsUpdate } from "../../storage/settings-store.js";
import { reportCommandError } from "../../utils/output.js";

interface ISettingsFlags {
  readonly view?: boolean | undefined;
  readonly defaultModel?: string | undefined;
  readonly defaultFormat?: string | undefined;
  readonly logging?: boolean | undefined;
  readonly logFile?: string | undefined;
  readonly reset?: boolean | undefined;
}

export function parseBoolean(value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "on":
    case "yes":
    case "1":
      return true;
    case "false":
    case "off":
    case "no":
    case "0":
      return false;
    default:
      throw new InvalidArgumentError("Expected true or false.");
  }
}

export function createSettingsCommand(): Command {
  return new Command("settings")
    .description("View or change settings")
    .option("-v, --view", "Print the current settings")
    .option("-m, --default-model <model>", "Model used when the provider entry names none")
    .option("-f, --default-format <format>", "Default return format")
    .option("-l, --logging <enabled>", "Enable or disable the session log", parseBoolean)
    .option("--log-file <path>", "Session log file (relative paths live under ~/.ola)")
    .option("-r, --reset", "Restore the default settings")
    .action((flags: ISettingsFlags) => {
      try {
        const store = new SettingsStore();
        const update: ISettingsUpdate = {
          defaultModel: flags.defaultModel,
          defaultFormat: flags.defaultFormat,
          enableLogging: flags.logging,
          logFile: flags.logFile,
        };
        const changing = Object.values(update).some((value) => value !== undefined);
        const reset = flags.reset === true;

        if (reset) {
          store.reset();
          process.stdout.write("Settings reset to default values\n");
        }

        const settings = changing ? store.update(update) : store.load();
        if (update.defaultModel !== undefined) {
          process.stdout.write(`Default model set to: ${settings.defaultModel}\n`);
        }
        if (update.defaultFormat !== undefined) {
          process.stdout.write(`Default return format set to: ${settings.defaults.returnFormat}\n`);
        }
        if (update.enableLogging !== undefined) {
          process.stdout.write(`Logging is now ${settings.behavior.enableLogging ? "enabled" : "disabled"}\n`);
        }
        if (update.logFile !== undefined) {
          process.stdout.write(`Log file set to: ${settings.behavior.logFile}\n`);
        }
        if (reset || changing) {
          process.stdout.write(pc.green(`Settings saved to ${store.path}\n`));
        }

        if (flags.view === true || (!reset && !changing)) {
          process.stdout.write(`Current settings:\n${renderSettings(settings)}`);
        }
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });
}
