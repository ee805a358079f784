#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerDescribeCommand } from "./commands/describe";
import { registerDoctorCommand } from "./commands/doctor";
import { registerExecCommand } from "./commands/exec";
import { registerIdleCommand } from "./commands/idle";
import { registerServeCommand } from "./commands/serve";
import { registerWorkloadsCommand } from "./commands/workloads";
import { CLI_NAME, CONFIG_PATH_ENV } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Starts, stops and watches a game server instance from chat")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number")
  .option("-c, --config <path>", `config file (default: $${CONFIG_PATH_ENV} or ~/.caretaker/config.json)`)
  .option("--verbose", "log debug output");

registerServeCommand(program);
registerDoctorCommand(program);
registerDescribeCommand(program);
registerExecCommand(program);
registerWorkloadsCommand(program);
registerIdleCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
