import { Ec2InstanceApi, type AwsCredentials } from "../aws/ec2";
import { readAwsCredentials } from "./command-context";
import { ConfigStore, type CaretakerConfig } from "./config";
import { DISCORD_TOKEN_ENV, MIN_NODE_MAJOR } from "./constants";
import { InstanceControlClient } from "./instance-control";
import { createLogger } from "./logger";
import type { InstanceDescriptor } from "./types";
import { errorMessage } from "./utils";
import { workloadNames } from "./workloads";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export type InstanceProbe = (config: CaretakerConfig, credentials: AwsCredentials | undefined) => Promise<InstanceDescriptor>;

export interface PreflightOptions {
  configPath: string;
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
  probeInstance?: InstanceProbe;
}

export async function runPreflight(options: PreflightOptions): Promise<PreflightReport> {
  const env = options.env ?? process.env;
  const checks: PreflightCheck[] = [];

  const nodeVersion = options.nodeVersion ?? process.versions.node;
  const nodeMajor = Number(nodeVersion.split(".")[0] ?? "0");
  const nodeOk = Number.isFinite(nodeMajor) && nodeMajor >= MIN_NODE_MAJOR;
  checks.push({
    key: "node",
    ok: nodeOk,
    message: `Node.js v${nodeVersion}`,
    fix: nodeOk ? undefined : `Install Node.js ${MIN_NODE_MAJOR} or newer.`
  });

  const token = env[DISCORD_TOKEN_ENV]?.trim();
  checks.push({
    key: "discord-token",
    ok: Boolean(token),
    message: token ? `${DISCORD_TOKEN_ENV} is set` : `${DISCORD_TOKEN_ENV} is not set`,
    fix: token ? undefined : "Export the bot token from the Discord developer portal.",
    suggestedCommands: token ? undefined : [`export ${DISCORD_TOKEN_ENV}=<token>`]
  });

  let config: CaretakerConfig;
  try {
    config = (await ConfigStore.open(options.configPath)).get();
    checks.push({ key: "config", ok: true, message: `Config loaded from ${options.configPath}` });
  } catch (error) {
    checks.push({
      key: "config",
      ok: false,
      message: errorMessage(error),
      fix: "Create the config file from config/caretaker.example.json."
    });
    return { checks, ok: false };
  }

  const names = workloadNames(config.workloads);
  checks.push({
    key: "workloads",
    ok: names.length > 0,
    message: names.length > 0 ? `Workloads: ${names.join(", ")}` : "No workloads are configured",
    fix: names.length > 0 ? undefined : "Add at least one entry under `workloads` in the config file."
  });

  let credentials: AwsCredentials | undefined;
  try {
    credentials = readAwsCredentials(env);
    checks.push({
      key: "aws-credentials",
      ok: true,
      message: credentials ? "Using AWS credentials from the environment" : "Using the default AWS credential chain"
    });
  } catch (error) {
    checks.push({ key: "aws-credentials", ok: false, message: errorMessage(error) });
    return { checks, ok: false };
  }

  const probe = options.probeInstance ?? describeWithSdk;
  try {
    const descriptor = await probe(config, credentials);
    checks.push({
      key: "instance",
      ok: true,
      message: `Instance ${descriptor.instanceId} is ${descriptor.state}`
    });
  } catch (error) {
    checks.push({
      key: "instance",
      ok: false,
      message: errorMessage(error),
      fix: "Check the instance id, the region and the credentials' ec2:DescribeInstances permission."
    });
  }

  return { checks, ok: checks.every((check) => check.ok) };
}

async function describeWithSdk(config: CaretakerConfig, credentials: AwsCredentials | undefined): Promise<InstanceDescriptor> {
  const api = new Ec2InstanceApi(config.instance.region, credentials);
  try {
    const client = new InstanceControlClient(api, config.instance.id, { logger: createLogger("doctor") });
    return await client.describe();
  } finally {
    api.destroy();
  }
}
