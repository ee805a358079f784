import chalk from "chalk";
import { Command } from "commander";
import { resolveConfigPath, type GlobalOptions } from "../lib/command-context";
import { CLI_NAME } from "../lib/constants";
import { CliError } from "../lib/errors";
import { runPreflight } from "../lib/preflight";

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check the config, credentials and instance before serving")
    .action(async (_options: unknown, command: Command) => {
      const report = await runPreflight({ configPath: resolveConfigPath(command.optsWithGlobals<GlobalOptions>()) });
      const suggestedCommands = new Set<string>();

      for (const check of report.checks) {
        const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
        console.log(`${symbol} ${check.message}`);
        if (!check.ok && check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
        if (!check.ok && check.suggestedCommands && check.suggestedCommands.length > 0) {
          for (const suggested of check.suggestedCommands) {
            console.log(`  please run: ${chalk.bold(suggested)}`);
            suggestedCommands.add(suggested);
          }
        }
      }

      if (!report.ok) {
        if (suggestedCommands.size > 0) {
          console.log("");
          console.log(chalk.yellow(`Action required: run the command(s) above, then re-run \`${CLI_NAME} doctor\`.`));
        }
        throw new CliError({ kind: "validation", message: "Preflight failed." });
      }
    });
}
