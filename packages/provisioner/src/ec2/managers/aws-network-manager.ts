/**
 * AWS Network Manager: security group, spread placement group, subnet
 * lookup and elastic addresses for one fleet.
 *
 * Everything created here is tagged through the ownership ledger so teardown
 * can find it again from any process.
 */

import {
  type EC2Client,
  AllocateAddressCommand,
  AssociateAddressCommand,
  AuthorizeSecurityGroupIngressCommand,
  CreatePlacementGroupCommand,
  CreateSecurityGroupCommand,
  DeletePlacementGroupCommand,
  DeleteSecurityGroupCommand,
  DescribePlacementGroupsCommand,
  DescribeSubnetsCommand,
  ReleaseAddressCommand,
} from "@aws-sdk/client-ec2";
import { AWS_AVAILABILITY_ZONE, SSH_PORT } from "@scratchfleet/core";
import type { IAwsNetworkManager, IOwnershipLedger } from "./interfaces";
import type { AwsLogCallback, ElasticAddress, PlacementGroupRef, SubnetInfo } from "../types";
import { ProviderError, ProviderErrorType, requireField } from "../../utils/provider-utils";

export class AwsNetworkManager implements IAwsNetworkManager {
  constructor(
    private readonly ec2: EC2Client,
    private readonly ledger: IOwnershipLedger,
    private readonly log: AwsLogCallback,
  ) {}

  // ── Security Group ───────────────────────────────────────────────────

  async createSecurityGroup(name: string, vpcId?: string): Promise<string> {
    const sg = await this.ec2.send(
      new CreateSecurityGroupCommand({
        GroupName: name,
        Description: "scratchfleet ephemeral instances",
        VpcId: vpcId,
        TagSpecifications: [this.ledger.tagSpecification("security-group", name)],
      }),
    );
    const groupId = requireField(sg.GroupId, "security group ID");

    // Outbound-all is the default egress rule of every new group
    await Promise.all([
      this.ec2.send(
        new AuthorizeSecurityGroupIngressCommand({
          GroupId: groupId,
          IpPermissions: [{ IpProtocol: "-1", UserIdGroupPairs: [{ GroupId: groupId }] }],
          TagSpecifications: [this.ledger.tagSpecification("security-group-rule", `${name} members`)],
        }),
      ),
      this.ec2.send(
        new AuthorizeSecurityGroupIngressCommand({
          GroupId: groupId,
          IpPermissions: [
            {
              IpProtocol: "tcp",
              FromPort: SSH_PORT,
              ToPort: SSH_PORT,
              IpRanges: [{ CidrIp: "0.0.0.0/0", Description: "SSH" }],
            },
          ],
          TagSpecifications: [this.ledger.tagSpecification("security-group-rule", `${name} ssh`)],
        }),
      ),
    ]);

    this.log(`Security group: ${groupId}`);
    return groupId;
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    await this.ec2.send(new DeleteSecurityGroupCommand({ GroupId: groupId }));
    this.log(`Security group deleted: ${groupId}`);
  }

  // ── Placement Group ──────────────────────────────────────────────────

  async createPlacementGroup(name: string): Promise<PlacementGroupRef> {
    const result = await this.ec2.send(
      new CreatePlacementGroupCommand({
        GroupName: name,
        Strategy: "spread",
        TagSpecifications: [this.ledger.tagSpecification("placement-group", name)],
      }),
    );
    const group = requireField(result.PlacementGroup, "placement group");
    const ref = {
      groupId: requireField(group.GroupId, "placement group ID"),
      groupName: group.GroupName ?? name,
    };
    this.log(`Placement group: ${ref.groupName} (${ref.groupId})`);
    return ref;
  }

  async describePlacementGroups(groupIds: string[]): Promise<PlacementGroupRef[]> {
    if (groupIds.length === 0) return [];
    const result = await this.ec2.send(new DescribePlacementGroupsCommand({ GroupIds: groupIds }));
    return (result.PlacementGroups ?? []).flatMap((g) =>
      g.GroupId && g.GroupName ? [{ groupId: g.GroupId, groupName: g.GroupName }] : [],
    );
  }

  async deletePlacementGroup(groupName: string): Promise<void> {
    await this.ec2.send(new DeletePlacementGroupCommand({ GroupName: groupName }));
    this.log(`Placement group deleted: ${groupName}`);
  }

  // ── Subnet ───────────────────────────────────────────────────────────

  async resolveSubnet(subnetId?: string): Promise<SubnetInfo> {
    const result = await this.ec2.send(
      new DescribeSubnetsCommand(
        subnetId
          ? { SubnetIds: [subnetId] }
          : {
              Filters: [
                { Name: "default-for-az", Values: ["true"] },
                { Name: "availability-zone", Values: [AWS_AVAILABILITY_ZONE] },
              ],
            },
      ),
    );

    const subnet = result.Subnets?.[0];
    if (!subnet?.SubnetId) {
      throw new ProviderError(
        subnetId
          ? `Subnet ${subnetId} not found`
          : `No default subnet in ${AWS_AVAILABILITY_ZONE}`,
        ProviderErrorType.NOT_FOUND,
        undefined,
        subnetId ? undefined : [`Run 'aws ec2 create-default-subnet --availability-zone ${AWS_AVAILABILITY_ZONE}'`],
      );
    }

    const info: SubnetInfo = {
      subnetId: subnet.SubnetId,
      availabilityZone: subnet.AvailabilityZone ?? AWS_AVAILABILITY_ZONE,
      mapPublicIpOnLaunch: subnet.MapPublicIpOnLaunch ?? false,
    };
    this.log(`Subnet: ${info.subnetId} (${info.availabilityZone})`);
    return info;
  }

  // ── Elastic Addresses ────────────────────────────────────────────────

  async allocateAddress(): Promise<ElasticAddress> {
    const result = await this.ec2.send(
      new AllocateAddressCommand({
        Domain: "vpc",
        TagSpecifications: [this.ledger.tagSpecification("elastic-ip", "scratchfleet address")],
      }),
    );
    const address = {
      allocationId: requireField(result.AllocationId, "allocation ID"),
      publicIp: requireField(result.PublicIp, "public IP"),
    };
    this.log(`Elastic IP: ${address.publicIp} (${address.allocationId})`);
    return address;
  }

  async associateAddress(allocationId: string, networkInterfaceId: string): Promise<void> {
    await this.ec2.send(
      new AssociateAddressCommand({
        AllocationId: allocationId,
        NetworkInterfaceId: networkInterfaceId,
      }),
    );
    this.log(`Elastic IP ${allocationId} associated with ${networkInterfaceId}`);
  }

  async releaseAddress(allocationId: string): Promise<void> {
    await this.ec2.send(new ReleaseAddressCommand({ AllocationId: allocationId }));
    this.log(`Elastic IP released: ${allocationId}`);
  }
}
