import chalk from "chalk";
import ora from "ora";
import { Command } from "commander";
import { getCommandContext, type GlobalOptions } from "../lib/command-context";

interface ExecOptions {
  untilSuccess?: boolean;
}

export function registerExecCommand(program: Command): void {
  program
    .command("exec <command...>")
    .description("Run a shell command on the instance and print its output")
    .option("--until-success", "Re-send the command until it succeeds or the retry budget runs out")
    .action(async (commandParts: string[], options: ExecOptions, command: Command) => {
      const context = await getCommandContext(command.optsWithGlobals<GlobalOptions>());
      const commands = [commandParts.join(" ")];
      const spinner = ora(`Running on ${context.config.instance.id}...`).start();

      try {
        const result = options.untilSuccess
          ? await context.commands.runUntilCommandSucceeds(commands)
          : await context.commands.sendAndAwaitCompletion(commands);
        if (result.status === "Success") {
          spinner.succeed(`Finished with status ${result.status}.`);
        } else {
          spinner.warn(`Finished with status ${result.status}.`);
          process.exitCode = 1;
        }
        if (result.stdout) {
          console.log(result.stdout);
        }
        if (result.stderr) {
          console.error(chalk.yellow(result.stderr));
        }
      } catch (error) {
        spinner.fail("Command failed.");
        throw error;
      } finally {
        context.close();
      }
    });
}
