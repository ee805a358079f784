import { PreconditionError } from "./errors";
import type { WorkloadConfig, WorkloadTable } from "./types";

export function workloadNames(table: WorkloadTable): string[] {
  return Object.keys(table).sort((a, b) => a.localeCompare(b));
}

export function formatUnknownWorkloadMessage(name: string, available: string[]): string {
  if (available.length === 0) {
    return `Workload '${name}' is not configured. No workloads are configured yet.`;
  }
  return `Workload '${name}' is not configured. Available workloads: ${available.join(", ")}`;
}

export function requireWorkload(table: WorkloadTable, name: string): WorkloadConfig {
  const workload = Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
  if (!workload) {
    const available = workloadNames(table);
    throw new PreconditionError({
      code: "unknown_workload",
      message: formatUnknownWorkloadMessage(name, available),
      workload: name,
      available
    });
  }
  return workload;
}

export function validateWorkloadName(name: string): string | null {
  if (!name.trim()) {
    return "Workload name is required.";
  }
  if (!/^[a-zA-Z0-9][a-zA-Z0-9 _-]*$/.test(name)) {
    return "Workload names must start with a letter or number and contain only letters, numbers, spaces, hyphens, and underscores.";
  }
  return null;
}
