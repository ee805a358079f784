import { Command } from "commander";
import { ChatCommandDispatcher } from "../bot/dispatcher";
import { DiscordNotifier, createDiscordClient, startDiscordBot } from "../bot/discord";
import { getCommandContext, type GlobalOptions } from "../lib/command-context";
import { DISCORD_TOKEN_ENV } from "../lib/constants";
import { CliError } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import { InstanceOrchestrator } from "../lib/orchestrator";
import { workloadNames } from "../lib/workloads";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Connect the chat bot and manage the instance until interrupted")
    .action(async (_options: unknown, command: Command) => {
      const token = process.env[DISCORD_TOKEN_ENV]?.trim();
      if (!token) {
        throw new CliError({
          kind: "validation",
          message: `${DISCORD_TOKEN_ENV} is not set.`,
          hint: "Export the bot token before running serve."
        });
      }

      const context = await getCommandContext(command.optsWithGlobals<GlobalOptions>());
      const { config } = context;
      const logger = createLogger("serve");
      const client = createDiscordClient();
      const notifier = new DiscordNotifier(client, config.chat);

      const orchestrator = new InstanceOrchestrator({
        instances: context.instances,
        commands: context.commands,
        workloads: config.workloads,
        idle: config.idle,
        notifier,
        logger: createLogger("orchestrator")
      });
      const dispatcher = new ChatCommandDispatcher({
        orchestrator,
        settings: {
          prefix: config.chat.prefix,
          commandChannel: config.chat.commandChannel,
          adminRole: config.chat.adminRole,
          userRole: config.chat.userRole,
          timezone: config.chat.timezone
        },
        workloadNames: workloadNames(config.workloads),
        notifier,
        logger: createLogger("chat")
      });

      try {
        await startDiscordBot({ client, token, dispatcher, colors: config.chat.colors, logger });
        logger.info(`Managing ${config.instance.id} in ${config.instance.region}`, {
          workloads: workloadNames(config.workloads)
        });
        await waitForShutdownSignal(logger);
      } finally {
        orchestrator.dispose();
        await client.destroy();
        context.close();
      }
    });
}

function waitForShutdownSignal(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}, shutting down`);
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      resolve();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
}
