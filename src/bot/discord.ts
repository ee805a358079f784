import {
  ActivityType,
  ChannelType,
  Client,
  EmbedBuilder,
  Events,
  GatewayIntentBits,
  type Message,
  type TextChannel
} from "discord.js";
import type { CaretakerConfig } from "../lib/config";
import type { Logger } from "../lib/logger";
import type { OrchestratorNotifier } from "../lib/notifier";
import { errorMessage } from "../lib/utils";
import type { ChatCommandDispatcher, ChatRequest } from "./dispatcher";
import { formatErrorReport, type ChatReply } from "./messages";

export type ChatSettings = CaretakerConfig["chat"];
export type ReplyColors = ChatSettings["colors"];

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.MessageContent
    ]
  });
}

export function toEmbed(reply: ChatReply, colors: ReplyColors): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(colors[reply.tone ?? "default"]);
  if (reply.title) {
    embed.setTitle(reply.title);
  }
  if (reply.description) {
    embed.setDescription(reply.description);
  }
  if (reply.fields && reply.fields.length > 0) {
    embed.addFields(reply.fields.map((field) => ({ name: field.name, value: field.value, inline: true })));
  }
  return embed;
}

export function toChatRequest(message: Message, colors: ReplyColors): ChatRequest {
  return {
    content: message.content,
    inGuild: message.inGuild(),
    channelName: message.inGuild() ? message.channel.name : undefined,
    authorRoles: message.member ? message.member.roles.cache.map((role) => role.name) : [],
    reply: async (reply) => {
      const sent = await message.reply({ embeds: [toEmbed(reply, colors)], allowedMentions: { repliedUser: false } });
      return {
        delete: async () => {
          await sent.delete();
        }
      };
    }
  };
}

/**
 * Delivers orchestrator notifications over Discord: operator warnings and
 * error reports go to the owner by direct message, announcements go to the
 * command channel, and the active workload is shown as the bot's activity.
 */
export class DiscordNotifier implements OrchestratorNotifier {
  constructor(
    private readonly client: Client,
    private readonly settings: ChatSettings
  ) {}

  async warnOperator(message: string): Promise<void> {
    await this.sendToOwner({ title: ":warning: Warning", description: message, tone: "warning" });
  }

  async reportError(message: string, error: unknown): Promise<void> {
    await this.sendToOwner({ title: ":x: Error", description: formatErrorReport(message, error), tone: "error" });
  }

  async announce(message: string): Promise<void> {
    const channel = this.findCommandChannel();
    if (!channel) {
      throw new Error(`Text channel #${this.settings.commandChannel} was not found`);
    }
    await channel.send({ content: "@here", embeds: [toEmbed({ description: message }, this.settings.colors)] });
  }

  async activeWorkloadChanged(workload: string | undefined): Promise<void> {
    this.client.user?.setPresence({
      activities: workload === undefined ? [] : [{ name: workload, type: ActivityType.Playing }]
    });
  }

  private async sendToOwner(reply: ChatReply): Promise<void> {
    const owner = await this.client.users.fetch(this.settings.ownerId);
    await owner.send({ embeds: [toEmbed(reply, this.settings.colors)] });
  }

  private findCommandChannel(): TextChannel | undefined {
    for (const channel of this.client.channels.cache.values()) {
      if (channel.type === ChannelType.GuildText && channel.name === this.settings.commandChannel) {
        return channel;
      }
    }
    return undefined;
  }
}

export interface DiscordBotOptions {
  client: Client;
  token: string;
  dispatcher: ChatCommandDispatcher;
  colors: ReplyColors;
  logger: Logger;
}

export async function startDiscordBot(options: DiscordBotOptions): Promise<void> {
  const { client, dispatcher, logger } = options;

  client.once(Events.ClientReady, (ready) => {
    logger.info(`Logged in as ${ready.user.tag}`);
  });
  client.on(Events.Error, (error) => {
    logger.error(`Discord client error: ${error.message}`, { error });
  });
  client.on(Events.MessageCreate, (message) => {
    if (message.author.bot) {
      return;
    }
    void dispatcher.handle(toChatRequest(message, options.colors)).catch((error: unknown) => {
      logger.error(`Failed to handle message: ${errorMessage(error)}`, { error, messageId: message.id });
    });
  });

  await client.login(options.token);
}
