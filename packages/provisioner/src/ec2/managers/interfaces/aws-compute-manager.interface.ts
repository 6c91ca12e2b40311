import type {
  CredentialKeypair,
  InstanceAddresses,
  LaunchSpec,
  LaunchedInstance,
  TerminatedInstance,
} from "../../types";

/**
 * Manages credential keypairs and instances.
 */
export interface IAwsComputeManager {
  /** Create an ed25519 keypair; the private half is only available here */
  createKeyPair(name: string): Promise<CredentialKeypair>;

  deleteKeyPair(keyPairId: string): Promise<void>;

  /** Launch exactly one instance */
  runInstance(spec: LaunchSpec): Promise<LaunchedInstance>;

  /**
   * Current addresses of an instance. Returns null while the describe call
   * succeeds but does not list the instance yet.
   */
  describeInstance(instanceId: string): Promise<InstanceAddresses | null>;

  /** Terminate all given instances in one call */
  terminateInstances(instanceIds: string[]): Promise<TerminatedInstance[]>;
}
