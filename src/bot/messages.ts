import type { ChangeResult, OperationPhase, StartResult, StatusReport, StopResult } from "../lib/orchestrator";
import type { InstanceDescriptor, InstanceState } from "../lib/types";

export type ReplyTone = "default" | "warning" | "error";

export interface ChatField {
  name: string;
  value: string;
}

export interface ChatReply {
  title?: string;
  description?: string;
  fields?: ChatField[];
  tone?: ReplyTone;
}

// Discord rejects embed descriptions longer than this.
export const EMBED_DESCRIPTION_LIMIT = 4096;

const STATE_CIRCLES: Partial<Record<InstanceState, string>> = {
  running: "green",
  stopped: "red",
  pending: "yellow",
  stopping: "orange"
};

export function connectAddress(descriptor: InstanceDescriptor, port: number): string {
  const host = descriptor.publicAddress ?? descriptor.publicDnsName ?? "unknown-address";
  return `${host}:${port}`;
}

export function formatProgress(phase: OperationPhase): string {
  switch (phase) {
    case "starting-instance":
      return "Starting the server...";
    case "stopping-instance":
      return "Stopping the server...";
    case "changing-workload":
      return "Changing the workload running on the server...";
  }
}

export function formatStartResult(result: StartResult): string {
  const address = connectAddress(result.descriptor, result.port);
  if (result.reachable) {
    return `The server is now running ${result.workload}. Connect to \`${address}\` to join the fun!`;
  }
  return `The server is now running, but ${result.workload} was unable to be reached, so something may have gone wrong. `
    + `Try connecting to \`${address}\` and contact an admin if you're unable to connect.`;
}

export function formatChangeResult(result: ChangeResult): string {
  const address = connectAddress(result.descriptor, result.port);
  if (result.reachable) {
    return `The server has switched to ${result.workload}. Connect to \`${address}\` to join the fun!`;
  }
  return `The server has switched to ${result.workload}, but it was unable to be reached, so something may have gone wrong. `
    + `Try connecting to \`${address}\` and contact an admin if you're unable to connect.`;
}

export function formatStopResult(result: StopResult): ChatReply {
  if (result.workloadStopped) {
    return { description: "The server has been stopped. Thanks for playing!" };
  }
  return {
    description: `The server has been stopped, but ${result.stoppedWorkload ?? "the workload"} did not shut down cleanly. Thanks for playing!`,
    tone: "warning"
  };
}

export function formatSimpleStatus(report: StatusReport): string {
  const { descriptor } = report;
  if (descriptor.state !== "running" || report.workload === undefined || report.port === undefined) {
    return `The server is currently ${descriptor.state}.`;
  }

  const players = report.players ?? 0;
  const verb = players === 1 ? "is" : "are";
  const noun = players === 1 ? "person" : "people";
  return `The server is currently running ${report.workload} and there ${verb} ${players} ${noun} playing. `
    + `Connect to \`${connectAddress(descriptor, report.port)}\` to join the fun!`;
}

export function formatDetailedStatus(report: StatusReport, timezone: string): ChatReply {
  const { descriptor } = report;
  const fields: ChatField[] = [
    { name: "State", value: `:${STATE_CIRCLES[descriptor.state] ?? "black"}_circle: ${capitalize(descriptor.state)}` }
  ];

  if (descriptor.state === "running") {
    fields.push({
      name: "Current workload",
      value: report.workload === undefined ? ":warning: None" : report.workload
    });
    if (report.workload !== undefined) {
      fields.push({ name: "Workload ping", value: report.ping ?? "-" });
      fields.push({ name: "Current players", value: String(report.players ?? 0) });
    }
    fields.push({ name: "IP address", value: `\`${descriptor.publicAddress ?? "-"}\`` });
    fields.push({ name: "DNS name", value: `\`${descriptor.publicDnsName ?? "-"}\`` });
  }

  fields.push({ name: "Last launch time", value: formatLaunchTime(descriptor.launchTime, timezone) });
  if (report.maintenance) {
    fields.push({ name: "Maintenance", value: ":construction: Server commands are disabled" });
  }

  return { title: `Status of ${descriptor.imageId || descriptor.instanceId}`, fields };
}

export function formatMaintenanceResult(enabled: boolean, changed: boolean): string {
  if (enabled) {
    return changed
      ? "Server commands have been temporarily disabled to allow for server maintenance."
      : "Server commands are already disabled for maintenance.";
  }
  return changed
    ? "Server maintenance has finished and the server is ready for games again!"
    : "Server commands aren't currently disabled for maintenance.";
}

export function formatHelp(prefix: string, workloads: string[]): ChatReply {
  const example = workloads[0] ?? "<workload>";
  return {
    title: "Server commands",
    fields: [
      { name: `${prefix}server start <workload>`, value: `Start the server running a workload, e.g. \`${prefix}server start ${example}\`.` },
      { name: `${prefix}server stop`, value: "Stop the workload and the server." },
      { name: `${prefix}server change <workload>`, value: "Switch the running server to another workload." },
      { name: `${prefix}server status`, value: "Show whether the server is running and who is playing." },
      { name: `${prefix}server disable / enable`, value: "Admins only: pause or resume server commands for maintenance." },
      { name: "Workloads", value: workloads.length > 0 ? workloads.join(", ") : "None configured" }
    ]
  };
}

export function formatErrorReport(message: string, error: unknown): string {
  const trace = error instanceof Error ? error.stack ?? `${error.name}: ${error.message}` : String(error);
  const full = `${message}\n\`\`\`\n${trace}\n\`\`\``;
  if (full.length <= EMBED_DESCRIPTION_LIMIT) {
    return full;
  }
  const room = EMBED_DESCRIPTION_LIMIT - message.length - "\n```\n...\n```".length;
  return `${message}\n\`\`\`\n${trace.slice(0, Math.max(0, room))}...\n\`\`\``;
}

export function formatLaunchTime(launchTime: Date | undefined, timezone: string): string {
  if (!launchTime) {
    return "Unknown";
  }
  try {
    return launchTime.toLocaleString("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "short",
      day: "numeric",
      hour: "2-digit",
      minute: "2-digit",
      timeZoneName: "short"
    });
  } catch {
    // Unknown zone names throw a RangeError; fall back to UTC.
    return launchTime.toISOString();
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
