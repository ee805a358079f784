import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  COMMAND_ATTEMPT_MAX,
  COMMAND_DELAY_MS,
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  CONFIG_PATH_ENV,
  DEFAULT_REGION,
  IDLE_CHECK_INTERVAL_MS,
  IDLE_SHUTDOWN_AFTER_MS,
  POLL_ATTEMPT_MAX,
  POLL_DELAY_MS,
  SEND_ATTEMPT_MAX,
  SEND_DELAY_MS,
  STATE_WAIT_INTERVAL_MS,
  STATE_WAIT_TIMEOUT_MS
} from "./constants";
import { CliError } from "./errors";
import { LOG_LEVELS } from "./logger";
import { normalizeInputPath } from "./utils";
import { validateWorkloadName } from "./workloads";

const commandListSchema = z.array(z.string().min(1)).min(1);

const workloadSchema = z.object({
  port: z.number().int().min(1).max(65535),
  description: z.string().optional(),
  commands: z.object({
    start: commandListSchema,
    stop: commandListSchema,
    ping: commandListSchema,
    playerCount: commandListSchema
  })
});

const colorSchema = z
  .union([z.number().int().min(0).max(0xffffff), z.string().regex(/^(0x|#)[0-9a-fA-F]{6}$/)])
  .transform((value) => (typeof value === "number" ? value : Number.parseInt(value.replace(/^(0x|#)/, ""), 16)));

export const configSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS).default("info"),
    instance: z.object({
      id: z.string().regex(/^i-[0-9a-f]{8,17}$/, "Expected an EC2 instance id such as i-0123456789abcdef0"),
      region: z.string().min(1).default(DEFAULT_REGION)
    }),
    retry: z
      .object({
        sendAttempts: z.number().int().min(1).default(SEND_ATTEMPT_MAX),
        sendDelayMs: z.number().int().min(0).default(SEND_DELAY_MS),
        pollAttempts: z.number().int().min(1).default(POLL_ATTEMPT_MAX),
        pollDelayMs: z.number().int().min(0).default(POLL_DELAY_MS),
        commandAttempts: z.number().int().min(1).default(COMMAND_ATTEMPT_MAX),
        commandDelayMs: z.number().int().min(0).default(COMMAND_DELAY_MS)
      })
      .default({}),
    stateWait: z
      .object({
        intervalMs: z.number().int().min(1).default(STATE_WAIT_INTERVAL_MS),
        timeoutMs: z.number().int().min(1).default(STATE_WAIT_TIMEOUT_MS)
      })
      .default({}),
    idle: z
      .object({
        checkIntervalMs: z.number().int().min(1_000).default(IDLE_CHECK_INTERVAL_MS),
        shutdownAfterMs: z.number().int().min(1_000).default(IDLE_SHUTDOWN_AFTER_MS)
      })
      .default({}),
    chat: z.object({
      prefix: z.string().min(1).default("!"),
      commandChannel: z.string().min(1),
      adminRole: z.string().min(1),
      userRole: z.string().min(1),
      ownerId: z.string().regex(/^\d+$/, "Expected a numeric user id"),
      timezone: z.string().min(1).default("UTC"),
      colors: z
        .object({
          default: colorSchema.default(0xf28c28),
          warning: colorSchema.default(0xffcc00),
          error: colorSchema.default(0xd62828)
        })
        .default({})
    }),
    workloads: z.record(z.string(), workloadSchema)
  })
  .superRefine((config, ctx) => {
    for (const name of Object.keys(config.workloads)) {
      const problem = validateWorkloadName(name);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["workloads", name], message: problem });
      }
    }
  });

export type CaretakerConfig = z.output<typeof configSchema>;
export type CaretakerConfigInput = z.input<typeof configSchema>;

export function defaultConfigPath(): string {
  const fromEnv = process.env[CONFIG_PATH_ENV];
  if (fromEnv && fromEnv.trim()) {
    return normalizeInputPath(fromEnv);
  }
  return path.join(os.homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function parseConfig(raw: unknown, source = "config"): CaretakerConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new CliError({
      kind: "validation",
      message: `Invalid configuration in ${source}`,
      detail: issues.join("\n")
    });
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<CaretakerConfig> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(configPath, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      throw new CliError({
        kind: "not_found",
        message: `Config file not found: ${configPath}`,
        hint: "Copy config/caretaker.example.json there, or pass --config <path>."
      });
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CliError({
      kind: "validation",
      message: `Config file is not valid JSON: ${configPath}`,
      detail: error instanceof Error ? error.message : String(error)
    });
  }
  return parseConfig(parsed, configPath);
}

/**
 * Holds the loaded configuration. Changes go through `update`, which validates
 * the result and writes it back to the file it was loaded from.
 */
export class ConfigStore {
  readonly path: string;
  private current: CaretakerConfig;

  private constructor(configPath: string, config: CaretakerConfig) {
    this.path = configPath;
    this.current = config;
  }

  static async open(configPath: string): Promise<ConfigStore> {
    return new ConfigStore(configPath, await loadConfig(configPath));
  }

  get(): CaretakerConfig {
    return this.current;
  }

  async update(mutate: (config: CaretakerConfig) => CaretakerConfig): Promise<CaretakerConfig> {
    const next = parseConfig(mutate(structuredClone(this.current)), this.path);
    await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
    await fs.promises.writeFile(this.path, `${JSON.stringify(next, null, 2)}\n`, "utf8");
    this.current = next;
    return next;
  }
}
