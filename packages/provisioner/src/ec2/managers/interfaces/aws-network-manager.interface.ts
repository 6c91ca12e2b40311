import type { ElasticAddress, PlacementGroupRef, SubnetInfo } from "../../types";

/**
 * Manages the networking side of a fleet: security group, spread placement
 * group, subnet lookup and elastic addresses.
 */
export interface IAwsNetworkManager {
  /**
   * Create a security group allowing all traffic between its members and
   * SSH from anywhere. Returns the group ID.
   */
  createSecurityGroup(name: string, vpcId?: string): Promise<string>;

  deleteSecurityGroup(groupId: string): Promise<void>;

  /** Create a placement group with the spread strategy */
  createPlacementGroup(name: string): Promise<PlacementGroupRef>;

  /** Look up names for placement group IDs (deletion addresses by name only) */
  describePlacementGroups(groupIds: string[]): Promise<PlacementGroupRef[]>;

  deletePlacementGroup(groupName: string): Promise<void>;

  /**
   * Look up `subnetId`, or the default subnet of the fleet's zone when omitted.
   * Throws a NOT_FOUND ProviderError when there is none.
   */
  resolveSubnet(subnetId?: string): Promise<SubnetInfo>;

  allocateAddress(): Promise<ElasticAddress>;

  associateAddress(allocationId: string, networkInterfaceId: string): Promise<void>;

  releaseAddress(allocationId: string): Promise<void>;
}
