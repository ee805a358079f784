import { INSTANCE_NOT_READY_CODE, INVOCATION_MISSING_CODE, hasErrorCode } from "../aws/errors";
import {
  COMMAND_ATTEMPT_MAX,
  COMMAND_DELAY_MS,
  POLL_ATTEMPT_MAX,
  POLL_DELAY_MS,
  SEND_ATTEMPT_MAX,
  SEND_DELAY_MS
} from "./constants";
import { createLogger, type Logger } from "./logger";
import type { CommandInvocationResult, CommandStatus, Sleep } from "./types";
import { sleep } from "./utils";

export interface InvocationRecord {
  status: CommandStatus;
  stdout: string;
  stderr: string;
}

export interface RemoteCommandApi {
  sendCommand(instanceId: string, commands: string[]): Promise<string>;
  getInvocation(instanceId: string, commandId: string): Promise<InvocationRecord>;
}

export interface CommandRunner {
  sendAndAwaitCompletion(commands: string[]): Promise<CommandInvocationResult>;
  runUntilCommandSucceeds(commands: string[]): Promise<CommandInvocationResult>;
}

export interface RetryTuning {
  sendAttempts: number;
  sendDelayMs: number;
  pollAttempts: number;
  pollDelayMs: number;
  commandAttempts: number;
  commandDelayMs: number;
}

export const DEFAULT_RETRY_TUNING: RetryTuning = {
  sendAttempts: SEND_ATTEMPT_MAX,
  sendDelayMs: SEND_DELAY_MS,
  pollAttempts: POLL_ATTEMPT_MAX,
  pollDelayMs: POLL_DELAY_MS,
  commandAttempts: COMMAND_ATTEMPT_MAX,
  commandDelayMs: COMMAND_DELAY_MS
};

export interface RemoteCommandRunnerOptions {
  retry?: Partial<RetryTuning>;
  sleep?: Sleep;
  logger?: Logger;
}

export class RemoteCommandError extends Error {
  readonly commands: readonly string[];
  readonly attempts: number;

  constructor(message: string, commands: readonly string[], attempts: number) {
    super(message);
    this.name = "RemoteCommandError";
    this.commands = commands;
    this.attempts = attempts;
  }
}

export class SendExceededAttemptsError extends RemoteCommandError {
  readonly lastError: unknown;

  constructor(commands: readonly string[], attempts: number, lastError: unknown) {
    super(`Commands could not be sent to the instance after ${attempts} attempts`, commands, attempts);
    this.name = "SendExceededAttemptsError";
    this.lastError = lastError;
  }
}

export class CommandExceededWaitTimeError extends RemoteCommandError {
  constructor(commands: readonly string[], attempts: number) {
    super(`Command failed to finish executing within ${attempts} status queries`, commands, attempts);
    this.name = "CommandExceededWaitTimeError";
  }
}

export class CommandExceededAttemptsError extends RemoteCommandError {
  readonly lastResult: CommandInvocationResult;

  constructor(commands: readonly string[], attempts: number, lastResult: CommandInvocationResult) {
    super(`Command failed to execute successfully on the instance after ${attempts} attempts`, commands, attempts);
    this.name = "CommandExceededAttemptsError";
    this.lastResult = lastResult;
  }
}

const UNFINISHED_STATUSES: readonly CommandStatus[] = ["Pending", "InProgress", "Delayed"];

export function isFinishedStatus(status: CommandStatus): boolean {
  return !UNFINISHED_STATUSES.includes(status);
}

export class RemoteCommandRunner implements CommandRunner {
  private readonly api: RemoteCommandApi;
  private readonly instanceId: string;
  private readonly retry: RetryTuning;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(api: RemoteCommandApi, instanceId: string, options: RemoteCommandRunnerOptions = {}) {
    this.api = api;
    this.instanceId = instanceId;
    this.retry = { ...DEFAULT_RETRY_TUNING, ...options.retry };
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger("commands");
  }

  async sendAndAwaitCompletion(commands: string[]): Promise<CommandInvocationResult> {
    const commandId = await this.send(commands);
    const result = await this.awaitCompletion(commandId, commands);
    this.logger.info("Command invocation finished", {
      commandId,
      status: result.status,
      commands,
      stdout: result.stdout
    });
    return result;
  }

  async runUntilCommandSucceeds(commands: string[]): Promise<CommandInvocationResult> {
    for (let attempt = 1; ; attempt += 1) {
      const result = await this.sendAndAwaitCompletion(commands);
      if (result.status === "Success") {
        return result;
      }
      if (attempt >= this.retry.commandAttempts) {
        throw new CommandExceededAttemptsError(commands, attempt, result);
      }
      this.logger.debug("Command did not succeed, retrying", { status: result.status, attempt, commands });
      await this.sleep(this.retry.commandDelayMs);
    }
  }

  private async send(commands: string[]): Promise<string> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.api.sendCommand(this.instanceId, commands);
      } catch (error) {
        // The agent on a freshly booted instance is not registered yet.
        if (!hasErrorCode(error, INSTANCE_NOT_READY_CODE)) {
          throw error;
        }
        if (attempt >= this.retry.sendAttempts) {
          throw new SendExceededAttemptsError(commands, attempt, error);
        }
        this.logger.debug("Instance not ready for commands, retrying send", { attempt });
      }
      await this.sleep(this.retry.sendDelayMs);
    }
  }

  private async awaitCompletion(commandId: string, commands: string[]): Promise<CommandInvocationResult> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        const record = await this.api.getInvocation(this.instanceId, commandId);
        if (isFinishedStatus(record.status)) {
          return toInvocationResult(commands, record);
        }
      } catch (error) {
        if (!hasErrorCode(error, INVOCATION_MISSING_CODE)) {
          throw error;
        }
      }
      if (attempt >= this.retry.pollAttempts) {
        throw new CommandExceededWaitTimeError(commands, attempt);
      }
      await this.sleep(this.retry.pollDelayMs);
    }
  }
}

export function toInvocationResult(commands: readonly string[], record: InvocationRecord): CommandInvocationResult {
  return Object.freeze({
    commands: Object.freeze([...commands]),
    status: record.status,
    stdout: record.stdout.trim(),
    stderr: record.stderr.trim()
  });
}
