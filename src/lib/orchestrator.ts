import {
  InvariantViolationError,
  PreconditionError,
  alreadyInTargetState,
  instanceNotRunning,
  invalidStateForOperation,
  maintenanceInProgress,
  workloadAlreadyActive
} from "./errors";
import { OperationGate } from "./gate";
import { IdleMonitor, type IdleCheckResult } from "./idle-monitor";
import type { InstanceControl } from "./instance-control";
import { createLogger, type Logger } from "./logger";
import { guardNotifier, silentNotifier, type OrchestratorNotifier } from "./notifier";
import { RemoteCommandError, type CommandRunner } from "./remote-command";
import type { InstanceDescriptor, IdleSettings, WorkloadConfig, WorkloadTable } from "./types";
import { errorMessage, formatDuration, parsePlayerCount } from "./utils";
import { requireWorkload } from "./workloads";

export type OperationPhase = "starting-instance" | "stopping-instance" | "changing-workload";

export interface OperationOptions {
  /** Called once preconditions pass and the operation is about to touch the instance. */
  onProgress?: (phase: OperationPhase) => Promise<void> | void;
}

export interface StatusOptions {
  /** Privileged callers may read status during maintenance. */
  privileged?: boolean;
  /** Also ping the active workload. */
  detailed?: boolean;
}

export interface StartResult {
  descriptor: InstanceDescriptor;
  workload: string;
  port: number;
  reachable: boolean;
}

export interface StopResult {
  descriptor: InstanceDescriptor;
  stoppedWorkload?: string;
  workloadStopped: boolean;
}

export interface ChangeResult {
  descriptor: InstanceDescriptor;
  previousWorkload?: string;
  workload: string;
  port: number;
  reachable: boolean;
}

export interface StatusReport {
  descriptor: InstanceDescriptor;
  workload?: string;
  port?: number;
  players?: number;
  ping?: string;
  maintenance: boolean;
}

export interface MaintenanceResult {
  maintenance: boolean;
  changed: boolean;
}

export interface InstanceOrchestratorDeps {
  instances: InstanceControl;
  commands: CommandRunner;
  workloads: WorkloadTable;
  idle: IdleSettings;
  notifier?: OrchestratorNotifier;
  logger?: Logger;
}

export const PING_FAILED_TEXT = "Connection failed";

export class InstanceOrchestrator {
  private readonly instances: InstanceControl;
  private readonly commands: CommandRunner;
  private readonly workloads: WorkloadTable;
  private readonly idle: IdleSettings;
  private readonly notifier: OrchestratorNotifier;
  private readonly logger: Logger;
  private readonly gate = new OperationGate();
  private readonly idleMonitor: IdleMonitor;

  private currentWorkload: string | undefined;
  private maintenanceMode = false;
  private streak = 0;

  constructor(deps: InstanceOrchestratorDeps) {
    this.instances = deps.instances;
    this.commands = deps.commands;
    this.workloads = deps.workloads;
    this.idle = deps.idle;
    this.logger = deps.logger ?? createLogger("orchestrator");
    this.notifier = guardNotifier(deps.notifier ?? silentNotifier, this.logger);
    this.idleMonitor = new IdleMonitor({
      intervalMs: deps.idle.checkIntervalMs,
      check: () => this.checkIdle(),
      onError: (error) => this.handleIdleError(error),
      logger: this.logger.child("idle")
    });
  }

  get activeWorkload(): string | undefined {
    return this.currentWorkload;
  }

  get maintenance(): boolean {
    return this.maintenanceMode;
  }

  get idleStreak(): number {
    return this.streak;
  }

  get idleMonitorRunning(): boolean {
    return this.idleMonitor.active;
  }

  get busy(): boolean {
    return this.gate.busy;
  }

  /** Number of consecutive empty idle checks that triggers a shutdown. */
  get idleThreshold(): number {
    return Math.max(1, Math.ceil(this.idle.shutdownAfterMs / this.idle.checkIntervalMs));
  }

  async start(workloadName: string, options: OperationOptions = {}): Promise<StartResult> {
    this.assertNotInMaintenance();
    const workload = requireWorkload(this.workloads, workloadName);

    return this.runOperation("start", async () => {
      const current = await this.instances.describe();
      if (current.state === "running") {
        if (this.currentWorkload === undefined) {
          await this.warnBareInstance();
        }
        throw alreadyInTargetState(current.state);
      }
      if (current.state !== "stopped") {
        throw invalidStateForOperation(current.state, "start the instance");
      }

      await options.onProgress?.("starting-instance");
      try {
        const descriptor = await this.instances.start();
        await this.runLifecycleCommands("start", workloadName, workload.commands.start);
        await this.setActiveWorkload(workloadName);
        this.streak = 0;

        const reachable = await this.probeReadiness(workloadName, workload);
        return { descriptor, workload: workloadName, port: workload.port, reachable };
      } finally {
        this.resumeIdleMonitor();
      }
    });
  }

  async stop(options: OperationOptions = {}): Promise<StopResult> {
    this.assertNotInMaintenance();

    return this.runOperation("stop", async () => {
      const current = await this.instances.describe();
      if (current.state === "stopped") {
        throw alreadyInTargetState(current.state);
      }
      if (current.state !== "running") {
        throw invalidStateForOperation(current.state, "stop the instance");
      }
      if (this.currentWorkload === undefined) {
        await this.warnBareInstance();
      }

      await options.onProgress?.("stopping-instance");
      this.idleMonitor.stop();
      try {
        return await this.shutDown();
      } finally {
        this.resumeIdleMonitor();
      }
    });
  }

  async change(workloadName: string, options: OperationOptions = {}): Promise<ChangeResult> {
    this.assertNotInMaintenance();
    const workload = requireWorkload(this.workloads, workloadName);
    if (workloadName === this.currentWorkload) {
      throw workloadAlreadyActive(workloadName);
    }

    return this.runOperation("change", async () => {
      const current = await this.instances.describe();
      if (current.state === "stopped") {
        throw instanceNotRunning(current.state);
      }
      if (current.state !== "running") {
        throw invalidStateForOperation(current.state, "change the workload");
      }

      const previousWorkload = this.currentWorkload;
      if (previousWorkload === undefined) {
        await this.warnBareInstance();
      }

      await options.onProgress?.("changing-workload");
      this.idleMonitor.stop();
      try {
        if (previousWorkload !== undefined) {
          const previous = requireWorkload(this.workloads, previousWorkload);
          await this.runLifecycleCommands("stop", previousWorkload, previous.commands.stop);
        }
        await this.runLifecycleCommands("start", workloadName, workload.commands.start);
        await this.setActiveWorkload(workloadName);
        this.streak = 0;

        const reachable = await this.probeReadiness(workloadName, workload);
        return { descriptor: current, previousWorkload, workload: workloadName, port: workload.port, reachable };
      } finally {
        this.resumeIdleMonitor();
      }
    });
  }

  async status(options: StatusOptions = {}): Promise<StatusReport> {
    if (!options.privileged) {
      this.assertNotInMaintenance();
    }

    return this.runOperation("status", async () => {
      const descriptor = await this.instances.describe();
      const workloadName = this.currentWorkload;
      const report: StatusReport = { descriptor, workload: workloadName, maintenance: this.maintenanceMode };

      if (workloadName === undefined || descriptor.state !== "running") {
        return report;
      }

      const workload = requireWorkload(this.workloads, workloadName);
      report.port = workload.port;
      report.players = await this.countPlayers(workloadName, workload);
      if (options.detailed) {
        report.ping = await this.pingWorkload(workload);
      }
      return report;
    });
  }

  setMaintenance(enabled: boolean): MaintenanceResult {
    if (this.maintenanceMode === enabled) {
      return { maintenance: enabled, changed: false };
    }
    this.maintenanceMode = enabled;
    this.logger.info(enabled ? "Maintenance mode enabled" : "Maintenance mode disabled");
    return { maintenance: enabled, changed: true };
  }

  /**
   * One idle-detection tick. Exposed for the monitor and for callers that want
   * to force a check.
   */
  async checkIdle(): Promise<IdleCheckResult> {
    if (this.maintenanceMode) {
      this.logger.debug("Skipping idle check during maintenance");
      return "continue";
    }
    if (this.currentWorkload === undefined) {
      return "stop";
    }
    if (this.gate.busy) {
      this.logger.debug("Skipping idle check while another operation runs", { operation: this.gate.currentOperation });
      return "continue";
    }

    return this.gate.run("idle-check", async () => {
      const workloadName = this.currentWorkload;
      if (workloadName === undefined) {
        return "stop";
      }

      const descriptor = await this.instances.describe();
      if (descriptor.state !== "running") {
        throw new InvariantViolationError(
          `Idle monitor found the instance ${descriptor.state} while '${workloadName}' is recorded as active`
        );
      }

      const workload = requireWorkload(this.workloads, workloadName);
      const players = await this.countPlayers(workloadName, workload);
      if (players > 0) {
        this.streak = 0;
        return "continue";
      }

      this.streak += 1;
      const threshold = this.idleThreshold;
      this.logger.info("No players observed", { workload: workloadName, streak: this.streak, threshold });

      if (this.streak >= threshold) {
        await this.notifier.announce(
          `No one has played ${workloadName} for ${formatDuration(this.streak * this.idle.checkIntervalMs)}, so the server is shutting down.`
        );
        await this.shutDown();
        return "stop";
      }
      if (this.streak === 1) {
        const remainingMs = (threshold - this.streak) * this.idle.checkIntervalMs;
        await this.notifier.announce(
          `The server is running, but it looks like no one is playing ${workloadName}. It will shut down in about ${formatDuration(remainingMs)} unless someone joins.`
        );
      }
      return "continue";
    });
  }

  dispose(): void {
    this.idleMonitor.stop();
  }

  private async runOperation<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await this.gate.run(operation, task);
    } catch (error) {
      if (error instanceof PreconditionError) {
        this.logger.info(`Refused ${operation}: ${error.message}`, { code: error.code });
      } else {
        this.logger.error(`Unexpected failure during ${operation}: ${errorMessage(error)}`, {
          error,
          workload: this.currentWorkload,
          ...(error instanceof RemoteCommandError ? { commands: error.commands, attempts: error.attempts } : {})
        });
      }
      throw error;
    }
  }

  /** Keeps idle shutdown armed whenever a workload is on record, including after a failed operation. */
  private resumeIdleMonitor(): void {
    if (this.currentWorkload !== undefined) {
      this.idleMonitor.start();
    }
  }

  private async shutDown(): Promise<StopResult> {
    const workloadName = this.currentWorkload;
    let workloadStopped = true;

    if (workloadName !== undefined) {
      try {
        const workload = requireWorkload(this.workloads, workloadName);
        workloadStopped = await this.runLifecycleCommands("stop", workloadName, workload.commands.stop);
      } catch (error) {
        // The instance is going down regardless; losing the stop commands is survivable.
        workloadStopped = false;
        this.logger.error(`Stop commands for '${workloadName}' failed: ${errorMessage(error)}`, { error });
      }
    }

    const descriptor = await this.instances.stop();
    await this.setActiveWorkload(undefined);
    this.streak = 0;
    return { descriptor, stoppedWorkload: workloadName, workloadStopped };
  }

  private async runLifecycleCommands(kind: "start" | "stop", workloadName: string, commands: string[]): Promise<boolean> {
    const result = await this.commands.sendAndAwaitCompletion(commands);
    if (result.status !== "Success") {
      this.logger.warn(`The ${kind} commands for '${workloadName}' finished with status ${result.status}`, {
        commands,
        stdout: result.stdout,
        stderr: result.stderr
      });
      return false;
    }
    return true;
  }

  private async probeReadiness(workloadName: string, workload: WorkloadConfig): Promise<boolean> {
    try {
      await this.commands.runUntilCommandSucceeds(workload.commands.ping);
      return true;
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        this.logger.warn(`'${workloadName}' did not respond to its ping commands: ${error.message}`, {
          commands: error.commands,
          attempts: error.attempts
        });
        return false;
      }
      throw error;
    }
  }

  private async countPlayers(workloadName: string, workload: WorkloadConfig): Promise<number> {
    try {
      const result = await this.commands.sendAndAwaitCompletion(workload.commands.playerCount);
      return result.status === "Success" ? parsePlayerCount(result.stdout) : 0;
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        this.logger.warn(`Player count query for '${workloadName}' failed; counting zero players`, {
          commands: error.commands
        });
        return 0;
      }
      throw error;
    }
  }

  private async pingWorkload(workload: WorkloadConfig): Promise<string> {
    try {
      const result = await this.commands.sendAndAwaitCompletion(workload.commands.ping);
      return result.status === "Success" ? result.stdout : PING_FAILED_TEXT;
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        return PING_FAILED_TEXT;
      }
      throw error;
    }
  }

  private async handleIdleError(error: unknown): Promise<IdleCheckResult> {
    if (error instanceof InvariantViolationError) {
      this.logger.error(error.message);
      await this.notifier.warnOperator(error.message);
      return "stop";
    }
    this.logger.error(`Idle check failed: ${errorMessage(error)}`, { error, workload: this.currentWorkload });
    await this.notifier.reportError("Unhandled error in the idle monitor", error);
    return "continue";
  }

  private async setActiveWorkload(workloadName: string | undefined): Promise<void> {
    this.currentWorkload = workloadName;
    await this.notifier.activeWorkloadChanged(workloadName);
  }

  private async warnBareInstance(): Promise<void> {
    const message = "Instance is running, but no workload is recorded as active on it";
    this.logger.warn(message);
    await this.notifier.warnOperator(message);
  }

  private assertNotInMaintenance(): void {
    if (this.maintenanceMode) {
      throw maintenanceInProgress();
    }
  }
}
