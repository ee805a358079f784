import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_COLOR: Record<Exclude<LogLevel, "silent">, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

let activeLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) {
      return;
    }
    const line = formatLogLine(new Date(), scope, level, message, meta);
    if (level === "error" || level === "warn") {
      console.error(LEVEL_COLOR[level](line));
    } else {
      console.log(LEVEL_COLOR[level](line));
    }
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`)
  };
}

export function formatLogLine(at: Date, scope: string, level: LogLevel, message: string, meta?: LogMeta): string {
  const base = `${at.toISOString()} [${scope}:${level.toUpperCase()}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(meta, serializeMetaValue)}`;
}

function serializeMetaValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}
