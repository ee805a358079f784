import inquirer from "inquirer";
import { Command } from "commander";
import { openConfigStore, type GlobalOptions } from "../lib/command-context";
import { CliError } from "../lib/errors";
import type { IdleSettings } from "../lib/types";
import { formatDuration } from "../lib/utils";

interface IdleOptions {
  checkEvery?: string;
  shutdownAfter?: string;
  show?: boolean;
}

const MINUTE_MS = 60_000;

export function registerIdleCommand(program: Command): void {
  program
    .command("idle")
    .description("Show or change when an unused workload is shut down")
    .option("--check-every <minutes>", "Minutes between player checks")
    .option("--shutdown-after <minutes>", "Minutes without players before the instance is stopped")
    .option("--show", "Print the current settings without changing them")
    .action(async (options: IdleOptions, command: Command) => {
      const store = await openConfigStore(command.optsWithGlobals<GlobalOptions>());
      const current = store.get().idle;

      if (options.show) {
        console.log(describeIdleSettings(current));
        return;
      }

      const next = await resolveIdleSettings(options, current);
      await store.update((config) => ({ ...config, idle: next }));
      console.log(`Updated ${store.path}: ${describeIdleSettings(next)}`);
      console.log("Restart `serve` for the change to take effect.");
    });
}

export function describeIdleSettings(settings: IdleSettings): string {
  return `players are checked every ${formatDuration(settings.checkIntervalMs)}, `
    + `and the instance stops after ${formatDuration(settings.shutdownAfterMs)} without any.`;
}

export function parseMinutes(raw: string, flag: string): number {
  const minutes = Number(raw);
  if (!Number.isFinite(minutes) || minutes < 1) {
    throw new CliError({
      kind: "validation",
      message: `${flag} expects a number of minutes (at least 1), got '${raw}'.`
    });
  }
  return Math.round(minutes * MINUTE_MS);
}

async function resolveIdleSettings(options: IdleOptions, current: IdleSettings): Promise<IdleSettings> {
  if (options.checkEvery !== undefined || options.shutdownAfter !== undefined) {
    return {
      checkIntervalMs: options.checkEvery !== undefined
        ? parseMinutes(options.checkEvery, "--check-every")
        : current.checkIntervalMs,
      shutdownAfterMs: options.shutdownAfter !== undefined
        ? parseMinutes(options.shutdownAfter, "--shutdown-after")
        : current.shutdownAfterMs
    };
  }

  if (!process.stdout.isTTY) {
    throw new CliError({
      kind: "validation",
      message: "Specify --check-every, --shutdown-after or --show in non-interactive mode."
    });
  }

  const validate = (input: string) => {
    const minutes = Number(input);
    return Number.isFinite(minutes) && minutes >= 1 ? true : "Enter a number of minutes (at least 1).";
  };
  const answers = await inquirer.prompt<{ checkEvery: string; shutdownAfter: string }>([
    {
      type: "input",
      name: "checkEvery",
      message: "Minutes between player checks:",
      default: String(current.checkIntervalMs / MINUTE_MS),
      validate
    },
    {
      type: "input",
      name: "shutdownAfter",
      message: "Minutes without players before shutting down:",
      default: String(current.shutdownAfterMs / MINUTE_MS),
      validate
    }
  ]);
  return {
    checkIntervalMs: parseMinutes(answers.checkEvery, "check interval"),
    shutdownAfterMs: parseMinutes(answers.shutdownAfter, "shutdown window")
  };
}
