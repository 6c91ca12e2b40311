// Orchestrator
export { Ec2Fleet, reclaimScope, ADDRESS_ASSOCIATION_TRANSIENT_CODES, INSTANCE_READINESS_TRANSIENT_CODES } from "./ec2/ec2-fleet";
export type { Ec2FleetOptions } from "./ec2/ec2-fleet";
export { Ec2Instance } from "./ec2/ec2-instance";
export type { Ec2InstanceInit } from "./ec2/ec2-instance";

// Teardown
export { TeardownEngine, KeypairDeletionError, describeScope } from "./ec2/teardown";
export type { TeardownDeps } from "./ec2/teardown";

// Managers
export { Ec2ManagerFactory } from "./ec2/ec2-manager-factory";
export type { Ec2Managers, Ec2ManagerFactoryConfig } from "./ec2/ec2-manager-factory";
export { OwnershipLedger, intersectOwned } from "./ec2/managers/ownership-ledger";
export { AwsNetworkManager } from "./ec2/managers/aws-network-manager";
export { AwsComputeManager, buildRunInstancesInput } from "./ec2/managers/aws-compute-manager";
export type { IOwnershipLedger, IAwsNetworkManager, IAwsComputeManager } from "./ec2/managers/interfaces";
export { cpuArchitecture, resolveImageReference } from "./ec2/image-reference";
export type { CpuArchitecture } from "./ec2/image-reference";
export * from "./ec2/types";

// SSH transport
export {
  generateHostIdentity,
  buildBootScript,
  encodeUserData,
  knownHostsLine,
  parseKnownHostsLine,
  HostIdentityError,
  MAX_USER_DATA_BYTES,
} from "./base/host-key-bootstrap";
export type { HostIdentity, KnownHostsEntry } from "./base/host-key-bootstrap";
export { SshSession, RemoteCommandError } from "./remote/ssh-session";
export type { SshSessionOptions } from "./remote/ssh-session";
export { execFileRunner } from "./remote/command-runner";
export type { CommandResult, CommandRunner } from "./remote/command-runner";

// Polling and errors
export { pollUntil, transientCodes, realClock, PollTimeoutError } from "./base/poll";
export type { PollClock, PollOptions, PollState } from "./base/poll";
export {
  ProviderError,
  ProviderErrorType,
  parseCloudError,
  errorCode,
  errorMessage,
} from "./utils/provider-utils";
