import { Ec2InstanceApi, type AwsCredentials } from "../aws/ec2";
import { SsmCommandApi } from "../aws/ssm";
import { ConfigStore, defaultConfigPath, type CaretakerConfig } from "./config";
import { AWS_ACCESS_KEY_ENV, AWS_SECRET_KEY_ENV } from "./constants";
import { CliError } from "./errors";
import { InstanceControlClient } from "./instance-control";
import { createLogger, getLogLevel, setLogLevel } from "./logger";
import { RemoteCommandRunner } from "./remote-command";
import { normalizeInputPath } from "./utils";

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export interface CommandContext {
  store: ConfigStore;
  config: CaretakerConfig;
  instances: InstanceControlClient;
  commands: RemoteCommandRunner;
  /** Releases the SDK clients' sockets. */
  close(): void;
}

export function resolveConfigPath(options: GlobalOptions): string {
  return options.config ? normalizeInputPath(options.config) : defaultConfigPath();
}

export async function openConfigStore(options: GlobalOptions): Promise<ConfigStore> {
  const store = await ConfigStore.open(resolveConfigPath(options));
  setLogLevel(options.verbose ? "debug" : store.get().logLevel);
  return store;
}

export function readAwsCredentials(env: NodeJS.ProcessEnv = process.env): AwsCredentials | undefined {
  const accessKeyId = env[AWS_ACCESS_KEY_ENV]?.trim();
  const secretAccessKey = env[AWS_SECRET_KEY_ENV]?.trim();
  if (!accessKeyId && !secretAccessKey) {
    return undefined;
  }
  if (!accessKeyId || !secretAccessKey) {
    throw new CliError({
      kind: "validation",
      message: `Set both ${AWS_ACCESS_KEY_ENV} and ${AWS_SECRET_KEY_ENV}, or neither.`,
      hint: "Without them the default AWS credential chain is used."
    });
  }
  return { accessKeyId, secretAccessKey };
}

export async function getCommandContext(options: GlobalOptions): Promise<CommandContext> {
  const store = await openConfigStore(options);
  const config = store.get();
  const credentials = readAwsCredentials();

  const ec2 = new Ec2InstanceApi(config.instance.region, credentials);
  const ssm = new SsmCommandApi(config.instance.region, credentials);
  const instances = new InstanceControlClient(ec2, config.instance.id, {
    intervalMs: config.stateWait.intervalMs,
    timeoutMs: config.stateWait.timeoutMs,
    logger: createLogger("instance")
  });
  const commands = new RemoteCommandRunner(ssm, config.instance.id, {
    retry: config.retry,
    logger: createLogger("commands")
  });

  createLogger("context").debug("Command context ready", {
    configPath: store.path,
    instanceId: config.instance.id,
    region: config.instance.region,
    logLevel: getLogLevel()
  });

  return {
    store,
    config,
    instances,
    commands,
    close: () => {
      ec2.destroy();
      ssm.destroy();
    }
  };
}
