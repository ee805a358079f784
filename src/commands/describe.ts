import chalk from "chalk";
import ora from "ora";
import { Command } from "commander";
import { getCommandContext, type GlobalOptions } from "../lib/command-context";
import type { InstanceDescriptor } from "../lib/types";

export function registerDescribeCommand(program: Command): void {
  program
    .command("describe")
    .description("Show the managed instance's current state and addresses")
    .action(async (_options: unknown, command: Command) => {
      const context = await getCommandContext(command.optsWithGlobals<GlobalOptions>());
      const spinner = ora(`Describing ${context.config.instance.id}...`).start();
      try {
        const descriptor = await context.instances.describe();
        spinner.stop();
        console.log(formatDescriptor(descriptor));
      } catch (error) {
        spinner.fail("Describe failed.");
        throw error;
      } finally {
        context.close();
      }
    });
}

export function formatDescriptor(descriptor: InstanceDescriptor): string {
  const state = descriptor.state === "running"
    ? chalk.green(descriptor.state)
    : descriptor.state === "stopped"
      ? chalk.red(descriptor.state)
      : chalk.yellow(descriptor.state);

  return [
    `Instance: ${descriptor.instanceId}`,
    `Image:    ${descriptor.imageId || "-"}`,
    `State:    ${state}`,
    `Launched: ${descriptor.launchTime ? descriptor.launchTime.toISOString() : "-"}`,
    `IP:       ${descriptor.publicAddress ?? "-"}`,
    `DNS:      ${descriptor.publicDnsName ?? "-"}`
  ].join("\n");
}
