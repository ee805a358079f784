import { STATE_WAIT_INTERVAL_MS, STATE_WAIT_TIMEOUT_MS } from "./constants";
import { createLogger, type Logger } from "./logger";
import type { InstanceDescriptor, InstanceState, Sleep } from "./types";
import { sleep } from "./utils";

export interface InstanceControlApi {
  describeInstance(instanceId: string): Promise<InstanceDescriptor | undefined>;
  startInstance(instanceId: string): Promise<void>;
  stopInstance(instanceId: string): Promise<void>;
}

export interface InstanceControl {
  describe(): Promise<InstanceDescriptor>;
  start(): Promise<InstanceDescriptor>;
  stop(): Promise<InstanceDescriptor>;
}

export interface StateWaitOptions {
  intervalMs?: number;
  timeoutMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export class InstanceApiError extends Error {
  readonly instanceId: string;

  constructor(instanceId: string, message: string) {
    super(message);
    this.name = "InstanceApiError";
    this.instanceId = instanceId;
  }
}

export class NoDescriptionFoundError extends InstanceApiError {
  constructor(instanceId: string) {
    super(instanceId, `Expected a description for instance ${instanceId}, but none was found`);
    this.name = "NoDescriptionFoundError";
  }
}

export class InstanceStateTimeoutError extends InstanceApiError {
  readonly target: InstanceState;
  readonly lastState: InstanceState;
  readonly attempts: number;

  constructor(instanceId: string, target: InstanceState, lastState: InstanceState, attempts: number) {
    super(instanceId, `Instance ${instanceId} did not become ${target} after ${attempts} checks (last state: ${lastState})`);
    this.name = "InstanceStateTimeoutError";
    this.target = target;
    this.lastState = lastState;
    this.attempts = attempts;
  }
}

export class UnexpectedInstanceStateError extends InstanceApiError {
  readonly target: InstanceState;
  readonly state: InstanceState;

  constructor(instanceId: string, target: InstanceState, state: InstanceState) {
    super(instanceId, `Instance ${instanceId} entered ${state} while waiting for ${target}`);
    this.name = "UnexpectedInstanceStateError";
    this.target = target;
    this.state = state;
  }
}

const WAIT_FAILURE_STATES: Partial<Record<InstanceState, InstanceState[]>> = {
  running: ["shutting-down", "terminated", "stopping"],
  stopped: ["pending", "shutting-down", "terminated"]
};

export class InstanceControlClient implements InstanceControl {
  private readonly api: InstanceControlApi;
  private readonly instanceId: string;
  private readonly intervalMs: number;
  private readonly maxChecks: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(api: InstanceControlApi, instanceId: string, options: StateWaitOptions = {}) {
    this.api = api;
    this.instanceId = instanceId;
    this.intervalMs = options.intervalMs ?? STATE_WAIT_INTERVAL_MS;
    const timeoutMs = options.timeoutMs ?? STATE_WAIT_TIMEOUT_MS;
    this.maxChecks = Math.max(1, Math.ceil(timeoutMs / this.intervalMs));
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger("instance");
  }

  async describe(): Promise<InstanceDescriptor> {
    const descriptor = await this.api.describeInstance(this.instanceId);
    if (!descriptor) {
      throw new NoDescriptionFoundError(this.instanceId);
    }
    this.logger.info("Instance described", {
      instanceId: descriptor.instanceId,
      imageId: descriptor.imageId,
      state: descriptor.state
    });
    return descriptor;
  }

  async start(): Promise<InstanceDescriptor> {
    await this.api.startInstance(this.instanceId);
    this.logger.info("Start requested", { instanceId: this.instanceId });
    return this.waitForState("running");
  }

  async stop(): Promise<InstanceDescriptor> {
    await this.api.stopInstance(this.instanceId);
    this.logger.info("Stop requested", { instanceId: this.instanceId });
    return this.waitForState("stopped");
  }

  /**
   * Polls the instance until it reports `target`, giving up after the configured
   * timeout or as soon as it enters a state the target cannot follow from.
   */
  async waitForState(target: InstanceState): Promise<InstanceDescriptor> {
    const failureStates = WAIT_FAILURE_STATES[target] ?? [];
    let lastState: InstanceState | undefined;

    for (let check = 1; check <= this.maxChecks; check += 1) {
      await this.sleep(this.intervalMs);
      const descriptor = await this.describe();
      lastState = descriptor.state;

      if (descriptor.state === target) {
        return descriptor;
      }
      if (failureStates.includes(descriptor.state)) {
        throw new UnexpectedInstanceStateError(this.instanceId, target, descriptor.state);
      }
      this.logger.debug("Waiting for instance state", { target, state: descriptor.state, check });
    }

    throw new InstanceStateTimeoutError(this.instanceId, target, lastState ?? "pending", this.maxChecks);
  }
}
