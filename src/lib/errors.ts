import { InstanceApiError } from "./instance-control";
import { RemoteCommandError } from "./remote-command";
import type { InstanceState } from "./types";

export type CliErrorKind = "validation" | "not_found" | "dependency" | "runtime";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

export type PreconditionCode =
  | "already_in_target_state"
  | "invalid_state"
  | "workload_already_active"
  | "unknown_workload"
  | "instance_not_running"
  | "maintenance_in_progress"
  | "operation_in_progress";

interface PreconditionErrorOptions {
  code: PreconditionCode;
  message: string;
  state?: InstanceState;
  workload?: string;
  available?: string[];
  operation?: string;
}

/**
 * An expected, user-facing refusal to run an operation. Never logged as an error.
 */
export class PreconditionError extends Error {
  readonly code: PreconditionCode;
  readonly state?: InstanceState;
  readonly workload?: string;
  readonly available?: string[];
  readonly operation?: string;

  constructor(options: PreconditionErrorOptions) {
    super(options.message);
    this.name = "PreconditionError";
    this.code = options.code;
    this.state = options.state;
    this.workload = options.workload;
    this.available = options.available;
    this.operation = options.operation;
  }
}

export function alreadyInTargetState(state: InstanceState): PreconditionError {
  return new PreconditionError({
    code: "already_in_target_state",
    message: `The instance is already ${state}.`,
    state
  });
}

export function invalidStateForOperation(state: InstanceState, operation: string): PreconditionError {
  return new PreconditionError({
    code: "invalid_state",
    message: `Cannot ${operation} while the instance is ${state}.`,
    state,
    operation
  });
}

export function instanceNotRunning(state: InstanceState): PreconditionError {
  return new PreconditionError({
    code: "instance_not_running",
    message: "The instance is not running.",
    state
  });
}

export function workloadAlreadyActive(workload: string): PreconditionError {
  return new PreconditionError({
    code: "workload_already_active",
    message: `Workload '${workload}' is already active.`,
    workload
  });
}

export function maintenanceInProgress(): PreconditionError {
  return new PreconditionError({
    code: "maintenance_in_progress",
    message: "The instance is undergoing maintenance."
  });
}

export function operationInProgress(operation: string): PreconditionError {
  return new PreconditionError({
    code: "operation_in_progress",
    message: `Another operation (${operation}) is in progress. Try again later.`,
    operation
  });
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export function isPreconditionError(error: unknown, code?: PreconditionCode): error is PreconditionError {
  return error instanceof PreconditionError && (code === undefined || error.code === code);
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof PreconditionError) {
    return new CliError({
      kind: error.code === "unknown_workload" ? "not_found" : "validation",
      message: error.message,
      hint: error.available && error.available.length > 0
        ? `Configured workloads: ${error.available.join(", ")}`
        : undefined
    });
  }

  if (error instanceof RemoteCommandError) {
    return new CliError({
      kind: "dependency",
      message: error.message,
      detail: `commands:\n${error.commands.map((command) => `  ${command}`).join("\n")}`
    });
  }

  if (error instanceof InstanceApiError) {
    return new CliError({
      kind: "dependency",
      message: error.message,
      hint: "Check the instance id and region in the config file."
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}
