/**
 * AWS Compute Manager: credential keypairs and instances.
 */

import {
  type EC2Client,
  type RunInstancesCommandInput,
  type _InstanceType,
  CreateKeyPairCommand,
  DeleteKeyPairCommand,
  DescribeInstancesCommand,
  RunInstancesCommand,
  TerminateInstancesCommand,
} from "@aws-sdk/client-ec2";
import type { IAwsComputeManager, IOwnershipLedger } from "./interfaces";
import type {
  AwsLogCallback,
  CredentialKeypair,
  InstanceAddresses,
  LaunchSpec,
  LaunchedInstance,
  NetworkInterfaceAddress,
  TerminatedInstance,
} from "../types";
import { requireField } from "../../utils/provider-utils";

const ROOT_DEVICE_NAME = "/dev/sda1";

/**
 * RunInstances input for one instance. Sends either a subnet + security group
 * attachment or explicit per-index interfaces, never both.
 */
export function buildRunInstancesInput(
  spec: LaunchSpec,
  tags: RunInstancesCommandInput["TagSpecifications"],
): RunInstancesCommandInput {
  const input: RunInstancesCommandInput = {
    ImageId: spec.imageId,
    // EC2 rejects unknown types itself; the SDK's enum lags newly launched families
    InstanceType: spec.instanceType as _InstanceType,
    MinCount: 1,
    MaxCount: 1,
    KeyName: spec.keyName,
    UserData: spec.userData,
    Placement: {
      GroupName: spec.placementGroupName,
      AvailabilityZone: spec.availabilityZone,
    },
    BlockDeviceMappings: [
      {
        DeviceName: ROOT_DEVICE_NAME,
        Ebs: {
          VolumeSize: spec.volumeSizeGb,
          VolumeType: "gp2",
          DeleteOnTermination: true,
        },
      },
    ],
    TagSpecifications: tags,
  };

  const attachment = spec.attachment;
  if (attachment.kind === "subnet") {
    input.SubnetId = attachment.subnetId;
    input.SecurityGroupIds = attachment.securityGroupIds;
  } else {
    // Multiple interfaces rule out an auto-assigned public IP
    input.NetworkInterfaces = Array.from({ length: attachment.count }, (_, i) => ({
      DeviceIndex: i,
      Groups: [attachment.securityGroupId],
      SubnetId: attachment.subnetId,
      AssociatePublicIpAddress: false,
      DeleteOnTermination: true,
      Description: `${i}`,
    }));
  }

  return input;
}

export class AwsComputeManager implements IAwsComputeManager {
  constructor(
    private readonly ec2: EC2Client,
    private readonly ledger: IOwnershipLedger,
    private readonly log: AwsLogCallback,
  ) {}

  // ── Keypairs ─────────────────────────────────────────────────────────

  async createKeyPair(name: string): Promise<CredentialKeypair> {
    const result = await this.ec2.send(
      new CreateKeyPairCommand({
        KeyName: name,
        KeyType: "ed25519",
        KeyFormat: "pem",
        TagSpecifications: [this.ledger.tagSpecification("key-pair", name)],
      }),
    );
    const keypair = {
      keyPairId: requireField(result.KeyPairId, "key pair ID"),
      keyName: result.KeyName ?? name,
      privateKeyText: requireField(result.KeyMaterial, "key material"),
    };
    this.log(`Key pair: ${keypair.keyName} (${keypair.keyPairId})`);
    return keypair;
  }

  async deleteKeyPair(keyPairId: string): Promise<void> {
    await this.ec2.send(new DeleteKeyPairCommand({ KeyPairId: keyPairId }));
    this.log(`Key pair deleted: ${keyPairId}`);
  }

  // ── Instances ────────────────────────────────────────────────────────

  async runInstance(spec: LaunchSpec): Promise<LaunchedInstance> {
    const result = await this.ec2.send(
      new RunInstancesCommand(
        buildRunInstancesInput(spec, [this.ledger.tagSpecification("instance", spec.name)]),
      ),
    );

    const instance = requireField(result.Instances?.[0], "launched instance");
    const launched: LaunchedInstance = {
      instanceId: requireField(instance.InstanceId, "instance ID"),
      networkInterfaces: (instance.NetworkInterfaces ?? []).flatMap((ni) =>
        ni.NetworkInterfaceId && ni.Attachment?.DeviceIndex !== undefined
          ? [{ networkInterfaceId: ni.NetworkInterfaceId, deviceIndex: ni.Attachment.DeviceIndex }]
          : [],
      ),
    };
    this.log(`Instance launched: ${launched.instanceId} (${spec.instanceType}, ${spec.imageId})`);
    return launched;
  }

  async describeInstance(instanceId: string): Promise<InstanceAddresses | null> {
    const result = await this.ec2.send(
      new DescribeInstancesCommand({ InstanceIds: [instanceId] }),
    );
    const instance = result.Reservations?.[0]?.Instances?.[0];
    if (!instance) return null;

    const networkInterfaces: NetworkInterfaceAddress[] = (instance.NetworkInterfaces ?? [])
      .flatMap((ni) =>
        ni.PrivateIpAddress && ni.Attachment?.DeviceIndex !== undefined
          ? [{ deviceIndex: ni.Attachment.DeviceIndex, privateIp: ni.PrivateIpAddress }]
          : [],
      )
      .sort((a, b) => a.deviceIndex - b.deviceIndex);

    return {
      state: instance.State?.Name ?? "unknown",
      privateIp: instance.PrivateIpAddress,
      publicIp: instance.PublicIpAddress,
      networkInterfaces,
    };
  }

  async terminateInstances(instanceIds: string[]): Promise<TerminatedInstance[]> {
    if (instanceIds.length === 0) return [];
    const result = await this.ec2.send(
      new TerminateInstancesCommand({ InstanceIds: instanceIds }),
    );
    return (result.TerminatingInstances ?? []).flatMap((change) =>
      change.InstanceId
        ? [
            {
              instanceId: change.InstanceId,
              previousState: change.PreviousState?.Name ?? "unknown",
              currentState: change.CurrentState?.Name ?? "unknown",
            },
          ]
        : [],
    );
  }
}
