export const INSTANCE_STATES = [
  "pending",
  "running",
  "shutting-down",
  "terminated",
  "stopping",
  "stopped"
] as const;

export type InstanceState = (typeof INSTANCE_STATES)[number];

export interface InstanceDescriptor {
  readonly instanceId: string;
  readonly state: InstanceState;
  readonly imageId: string;
  readonly launchTime?: Date;
  readonly publicAddress?: string;
  readonly publicDnsName?: string;
}

export const COMMAND_STATUSES = [
  "Pending",
  "InProgress",
  "Delayed",
  "Success",
  "Cancelled",
  "Failed",
  "TimedOut",
  "Cancelling"
] as const;

export type CommandStatus = (typeof COMMAND_STATUSES)[number];

export interface CommandInvocationResult {
  readonly commands: readonly string[];
  readonly status: CommandStatus;
  readonly stdout: string;
  readonly stderr: string;
}

export interface WorkloadCommands {
  start: string[];
  stop: string[];
  ping: string[];
  playerCount: string[];
}

export interface WorkloadConfig {
  port: number;
  description?: string;
  commands: WorkloadCommands;
}

export type WorkloadTable = Record<string, WorkloadConfig>;

export interface IdleSettings {
  checkIntervalMs: number;
  shutdownAfterMs: number;
}

export type Sleep = (ms: number) => Promise<void>;
