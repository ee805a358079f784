import {
  GetCommandInvocationCommand,
  SendCommandCommand,
  SSMClient,
  type GetCommandInvocationCommandOutput
} from "@aws-sdk/client-ssm";
import { DEFAULT_REGION, RUN_SHELL_DOCUMENT } from "../lib/constants";
import type { InvocationRecord, RemoteCommandApi } from "../lib/remote-command";
import type { CommandStatus } from "../lib/types";
import { isCommandStatus } from "../lib/utils";
import type { AwsCredentials } from "./ec2";

export class SsmCommandApi implements RemoteCommandApi {
  private client: SSMClient;

  constructor(region: string = DEFAULT_REGION, credentials?: AwsCredentials) {
    this.client = new SSMClient({
      region,
      credentials: credentials
        ? {
            accessKeyId: credentials.accessKeyId,
            secretAccessKey: credentials.secretAccessKey
          }
        : undefined
    });
  }

  async sendCommand(instanceId: string, commands: string[]): Promise<string> {
    const output = await this.client.send(
      new SendCommandCommand({
        DocumentName: RUN_SHELL_DOCUMENT,
        InstanceIds: [instanceId],
        Parameters: { commands }
      })
    );
    const commandId = output.Command?.CommandId;
    if (!commandId) {
      throw new Error(`SendCommand for instance ${instanceId} returned no command id`);
    }
    return commandId;
  }

  async getInvocation(instanceId: string, commandId: string): Promise<InvocationRecord> {
    const output = await this.client.send(
      new GetCommandInvocationCommand({
        CommandId: commandId,
        InstanceId: instanceId
      })
    );
    return parseInvocationOutput(output);
  }

  destroy(): void {
    this.client.destroy();
  }
}

export function parseCommandStatus(raw: unknown): CommandStatus {
  if (!isCommandStatus(raw)) {
    throw new Error(`Unrecognized command invocation status: ${String(raw)}`);
  }
  return raw;
}

export function parseInvocationOutput(
  output: Pick<GetCommandInvocationCommandOutput, "Status" | "StandardOutputContent" | "StandardErrorContent">
): InvocationRecord {
  return {
    status: parseCommandStatus(output.Status),
    stdout: output.StandardOutputContent ?? "",
    stderr: output.StandardErrorContent ?? ""
  };
}
