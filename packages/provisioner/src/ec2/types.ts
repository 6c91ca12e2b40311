/**
 * Shared types for the EC2 provisioner.
 */

import type { CleanupScope } from "@scratchfleet/core";

/** Log callback used by the AWS managers */
export type AwsLogCallback = (line: string) => void;

/** Log callback for orchestrator, teardown and remote output */
export type LogCallback = (line: string, stream: "stdout" | "stderr") => void;

/** Resource kinds that are discovered and reclaimed by ownership tags */
export type OwnedResourceKind =
  | "key-pair"
  | "security-group"
  | "placement-group"
  | "elastic-ip"
  | "instance";

export const OWNED_RESOURCE_KINDS: readonly OwnedResourceKind[] = [
  "key-pair",
  "security-group",
  "placement-group",
  "elastic-ip",
  "instance",
];

/** Security group rules are tagged but go away with their group */
export type TaggedResourceType = OwnedResourceKind | "security-group-rule";

/** Who owns what this process creates, and what it may reclaim */
export interface OwnershipContext {
  principal: string;
  scope: CleanupScope;
}

export interface ResourceRecord {
  kind: OwnedResourceKind;
  id: string;
}

export interface CredentialKeypair {
  keyPairId: string;
  keyName: string;
  /** OpenSSH private key returned once by CreateKeyPair */
  privateKeyText: string;
}

export interface PlacementGroupRef {
  groupId: string;
  groupName: string;
}

export interface SubnetInfo {
  subnetId: string;
  availabilityZone: string;
  /** Whether instances launched here receive a public IP automatically */
  mapPublicIpOnLaunch: boolean;
}

export interface ElasticAddress {
  allocationId: string;
  publicIp: string;
}

export interface NetworkInterfaceAddress {
  deviceIndex: number;
  privateIp: string;
}

/** Exactly one of these is sent per RunInstances call */
export type NetworkAttachment =
  | { kind: "subnet"; subnetId: string; securityGroupIds: string[] }
  | { kind: "interfaces"; subnetId: string; securityGroupId: string; count: number };

export interface LaunchSpec {
  /** Name tag of the instance */
  name: string;
  imageId: string;
  instanceType: string;
  volumeSizeGb: number;
  placementGroupName: string;
  availabilityZone: string;
  keyName: string;
  /** Base64-encoded boot script */
  userData: string;
  attachment: NetworkAttachment;
}

export interface LaunchedInstance {
  instanceId: string;
  networkInterfaces: { networkInterfaceId: string; deviceIndex: number }[];
}

export interface InstanceAddresses {
  state: string;
  privateIp?: string;
  publicIp?: string;
  networkInterfaces: NetworkInterfaceAddress[];
}

export interface TerminatedInstance {
  instanceId: string;
  previousState: string;
  currentState: string;
}
