import { PreconditionError } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import { guardNotifier, silentNotifier, type OrchestratorNotifier } from "../lib/notifier";
import type { InstanceOrchestrator, OperationOptions } from "../lib/orchestrator";
import { errorMessage } from "../lib/utils";
import {
  formatChangeResult,
  formatDetailedStatus,
  formatHelp,
  formatMaintenanceResult,
  formatProgress,
  formatSimpleStatus,
  formatStartResult,
  formatStopResult,
  type ChatReply
} from "./messages";

export type ServerSubcommand = "start" | "stop" | "change" | "status" | "disable" | "enable";

const SERVER_SUBCOMMANDS: readonly ServerSubcommand[] = ["start", "stop", "change", "status", "disable", "enable"];

export interface PostedMessage {
  delete(): Promise<void>;
}

/** A chat message, reduced to what command handling needs from the transport. */
export interface ChatRequest {
  content: string;
  inGuild: boolean;
  channelName?: string;
  authorRoles: readonly string[];
  reply(reply: ChatReply): Promise<PostedMessage>;
}

export interface DispatcherSettings {
  prefix: string;
  commandChannel: string;
  adminRole: string;
  userRole: string;
  timezone: string;
}

export interface ChatCommandDispatcherDeps {
  orchestrator: InstanceOrchestrator;
  settings: DispatcherSettings;
  workloadNames: string[];
  notifier?: OrchestratorNotifier;
  logger?: Logger;
}

export type ParsedCommand =
  | { kind: "help" }
  | { kind: "server"; subcommand: ServerSubcommand | undefined; argument: string };

export function parseCommand(content: string, prefix: string): ParsedCommand | null {
  if (!content.startsWith(prefix)) {
    return null;
  }
  const [name, subcommand, ...rest] = content.slice(prefix.length).trim().split(/\s+/);
  switch (name?.toLowerCase()) {
    case "help":
      return { kind: "help" };
    case "server": {
      const normalized = subcommand?.toLowerCase();
      const known = SERVER_SUBCOMMANDS.find((candidate) => candidate === normalized);
      if (normalized !== undefined && normalized !== "" && known === undefined) {
        return null;
      }
      return { kind: "server", subcommand: known, argument: rest.join(" ") };
    }
    default:
      return null;
  }
}

type Access = "members" | "admins";

interface SubcommandRule {
  access: Access;
  channel: "command-channel" | "anywhere";
  /** Admins are exempt from the channel restriction. */
  adminAnywhere: boolean;
}

const RULES: Record<ServerSubcommand, SubcommandRule> = {
  start: { access: "members", channel: "command-channel", adminAnywhere: false },
  stop: { access: "members", channel: "command-channel", adminAnywhere: false },
  change: { access: "members", channel: "command-channel", adminAnywhere: false },
  status: { access: "members", channel: "command-channel", adminAnywhere: true },
  disable: { access: "admins", channel: "anywhere", adminAnywhere: true },
  enable: { access: "admins", channel: "anywhere", adminAnywhere: true }
};

/**
 * Turns chat messages into orchestrator calls and orchestrator outcomes into
 * replies. Messages that are not commands, or that arrive outside the places
 * a command may be used, are ignored without a reply.
 */
export class ChatCommandDispatcher {
  private readonly orchestrator: InstanceOrchestrator;
  private readonly settings: DispatcherSettings;
  private readonly workloadNames: string[];
  private readonly notifier: OrchestratorNotifier;
  private readonly logger: Logger;

  constructor(deps: ChatCommandDispatcherDeps) {
    this.orchestrator = deps.orchestrator;
    this.settings = deps.settings;
    this.workloadNames = deps.workloadNames;
    this.logger = deps.logger ?? createLogger("chat");
    this.notifier = guardNotifier(deps.notifier ?? silentNotifier, this.logger);
  }

  /** Returns whether the message was handled as a command. */
  async handle(request: ChatRequest): Promise<boolean> {
    const parsed = parseCommand(request.content, this.settings.prefix);
    if (!parsed || !request.inGuild) {
      return false;
    }

    if (parsed.kind === "help") {
      await request.reply(formatHelp(this.settings.prefix, this.workloadNames));
      return true;
    }

    const { subcommand, argument } = parsed;
    if (subcommand === undefined) {
      await request.reply(formatHelp(this.settings.prefix, this.workloadNames));
      return true;
    }

    const usage = this.usage(subcommand);
    const isAdmin = request.authorRoles.includes(this.settings.adminRole);
    const isMember = isAdmin || request.authorRoles.includes(this.settings.userRole);
    const rule = RULES[subcommand];

    if (rule.access === "admins" ? !isAdmin : !isMember) {
      const roles = rule.access === "admins"
        ? this.settings.adminRole
        : `${this.settings.adminRole}, ${this.settings.userRole}`;
      await request.reply({
        description: `You must have one of the following roles to run \`${usage}\`: ${roles}`,
        tone: "error"
      });
      return true;
    }

    const channelExempt = rule.channel === "anywhere" || (rule.adminAnywhere && isAdmin);
    if (!channelExempt && request.channelName !== this.settings.commandChannel) {
      this.logger.debug(`Ignoring ${usage} outside #${this.settings.commandChannel}`, { channel: request.channelName });
      return false;
    }

    if ((subcommand === "start" || subcommand === "change") && argument === "") {
      const example = this.workloadNames[0] ?? "<workload>";
      await request.reply({
        description: `The workload to ${subcommand === "start" ? "start" : "switch to"} is missing. `
          + `Example: \`${usage} ${example}\``,
        tone: "error"
      });
      return true;
    }

    this.logger.info(`Running ${usage}`, { argument: argument || undefined });
    try {
      await this.run(subcommand, argument, isAdmin, request);
    } catch (error) {
      await request.reply(await this.describeFailure(subcommand, error));
    }
    return true;
  }

  private async run(subcommand: ServerSubcommand, argument: string, isAdmin: boolean, request: ChatRequest): Promise<void> {
    switch (subcommand) {
      case "start": {
        const result = await this.withProgress(request, (options) => this.orchestrator.start(argument, options));
        await request.reply({ description: formatStartResult(result), tone: result.reachable ? "default" : "warning" });
        return;
      }
      case "stop": {
        const result = await this.withProgress(request, (options) => this.orchestrator.stop(options));
        await request.reply(formatStopResult(result));
        return;
      }
      case "change": {
        const result = await this.withProgress(request, (options) => this.orchestrator.change(argument, options));
        await request.reply({ description: formatChangeResult(result), tone: result.reachable ? "default" : "warning" });
        return;
      }
      case "status": {
        const report = await this.orchestrator.status({ privileged: isAdmin, detailed: isAdmin });
        await request.reply(isAdmin
          ? formatDetailedStatus(report, this.settings.timezone)
          : { description: formatSimpleStatus(report) });
        return;
      }
      case "disable":
      case "enable": {
        const enabled = subcommand === "disable";
        const result = this.orchestrator.setMaintenance(enabled);
        await request.reply({ description: formatMaintenanceResult(enabled, result.changed) });
        return;
      }
    }
  }

  private async withProgress<T>(request: ChatRequest, task: (options: OperationOptions) => Promise<T>): Promise<T> {
    const posted: PostedMessage[] = [];
    try {
      return await task({
        onProgress: async (phase) => {
          try {
            posted.push(await request.reply({ description: formatProgress(phase) }));
          } catch (error) {
            this.logger.warn(`Could not post progress message: ${errorMessage(error)}`);
          }
        }
      });
    } finally {
      for (const message of posted) {
        await message.delete().catch((error: unknown) => {
          this.logger.warn(`Could not remove progress message: ${errorMessage(error)}`);
        });
      }
    }
  }

  private async describeFailure(subcommand: ServerSubcommand, error: unknown): Promise<ChatReply> {
    const usage = this.usage(subcommand);
    if (error instanceof PreconditionError) {
      return { description: this.describePrecondition(subcommand, error), tone: "error" };
    }

    this.logger.error(`Unhandled error in ${usage}: ${errorMessage(error)}`, { error });
    await this.notifier.reportError(`Unhandled error in \`${usage}\`: ${errorMessage(error)}`, error);
    return {
      description: `An unexpected error was encountered while trying to run \`${usage}\`. The owner has been notified.`,
      tone: "error"
    };
  }

  private describePrecondition(subcommand: ServerSubcommand, error: PreconditionError): string {
    switch (error.code) {
      case "unknown_workload": {
        const available = error.available && error.available.length > 0 ? error.available.join(", ") : "none";
        return `The workload _${error.workload ?? ""}_ isn't set up to run on the server. Available workloads: ${available}`;
      }
      case "already_in_target_state":
        return `The server is already ${error.state ?? (subcommand === "start" ? "running" : "stopped")}.`;
      case "invalid_state":
        return `The server is currently ${error.state ?? "busy"}, so \`${this.usage(subcommand)}\` can't run right now. Try again in a minute.`;
      case "instance_not_running":
        return "The workload cannot be changed unless the server is running.";
      case "workload_already_active":
        return `The server is already running _${error.workload ?? ""}_.`;
      case "maintenance_in_progress":
        return `Unable to run \`${this.usage(subcommand)}\` as the server is currently undergoing maintenance. Please try again later.`;
      case "operation_in_progress":
        return `The server is busy with another command (${error.operation ?? "unknown"}). Please try again in a moment.`;
    }
  }

  private usage(subcommand: ServerSubcommand): string {
    return `${this.settings.prefix}server ${subcommand}`;
  }
}
