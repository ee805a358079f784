import {
  DescribeInstancesCommand,
  EC2Client,
  StartInstancesCommand,
  StopInstancesCommand,
  type DescribeInstancesCommandOutput
} from "@aws-sdk/client-ec2";
import { DEFAULT_REGION } from "../lib/constants";
import type { InstanceControlApi } from "../lib/instance-control";
import type { InstanceDescriptor } from "../lib/types";
import { isInstanceState } from "../lib/utils";

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export class Ec2InstanceApi implements InstanceControlApi {
  private client: EC2Client;

  constructor(region: string = DEFAULT_REGION, credentials?: AwsCredentials) {
    this.client = new EC2Client({
      region,
      credentials: credentials
        ? {
            accessKeyId: credentials.accessKeyId,
            secretAccessKey: credentials.secretAccessKey
          }
        : undefined
    });
  }

  async describeInstance(instanceId: string): Promise<InstanceDescriptor | undefined> {
    const output = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
    return parseDescribeInstancesOutput(output, instanceId);
  }

  async startInstance(instanceId: string): Promise<void> {
    await this.client.send(new StartInstancesCommand({ InstanceIds: [instanceId] }));
  }

  async stopInstance(instanceId: string): Promise<void> {
    await this.client.send(new StopInstancesCommand({ InstanceIds: [instanceId] }));
  }

  destroy(): void {
    this.client.destroy();
  }
}

/**
 * Reads the first instance of the first reservation. Returns undefined when the
 * response holds no instance at all.
 */
export function parseDescribeInstancesOutput(
  output: Pick<DescribeInstancesCommandOutput, "Reservations">,
  instanceId: string
): InstanceDescriptor | undefined {
  const instance = output.Reservations?.[0]?.Instances?.[0];
  if (!instance) {
    return undefined;
  }

  const stateName = instance.State?.Name;
  if (!isInstanceState(stateName)) {
    throw new Error(`Instance ${instanceId} reported an unrecognized state: ${String(stateName)}`);
  }

  return Object.freeze({
    instanceId: instance.InstanceId ?? instanceId,
    state: stateName,
    imageId: instance.ImageId ?? "",
    launchTime: instance.LaunchTime,
    publicAddress: instance.PublicIpAddress || undefined,
    publicDnsName: instance.PublicDnsName || undefined
  });
}
