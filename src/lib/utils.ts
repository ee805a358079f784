import os from "node:os";
import path from "node:path";
import { INSTANCE_STATES, COMMAND_STATUSES, type CommandStatus, type InstanceState } from "./types";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isInstanceState(value: unknown): value is InstanceState {
  return typeof value === "string" && INSTANCE_STATES.some((state) => state === value);
}

export function isCommandStatus(value: unknown): value is CommandStatus {
  return typeof value === "string" && COMMAND_STATUSES.some((status) => status === value);
}

export function parsePlayerCount(output: string): number {
  const trimmed = output.trim();
  if (!/^\d+$/.test(trimmed)) {
    return 0;
  }
  return Number.parseInt(trimmed, 10);
}

export function formatDuration(ms: number): string {
  const totalMinutes = Math.max(0, Math.round(ms / 60_000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  if (hours > 0 && minutes > 0) {
    return `${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h`;
  }
  return `${minutes}m`;
}

export function normalizeInputPath(inputPath: string): string {
  const trimmed = inputPath.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
