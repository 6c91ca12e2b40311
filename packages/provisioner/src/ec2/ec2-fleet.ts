/**
 * Provisioning Orchestrator
 *
 * `Ec2Fleet.build()` reclaims whatever a previous run left in the configured
 * scope, then creates the per-fleet resources every instance shares: key
 * pair, security group, spread placement group, subnet and host identity.
 * `provision()` launches one reachable instance into that fleet.
 *
 * Nothing is rolled back on failure. Every resource is tagged on creation,
 * so `reclaim()` (or the next `build()`) removes half-built fleets.
 */

import type { EC2Client, EC2ClientConfig } from "@aws-sdk/client-ec2";
import { v4 as uuidv4 } from "uuid";
import { STSService } from "@scratchfleet/adapters-aws";
import {
  ADDRESS_ASSOCIATION_INTERVAL_MS,
  ADDRESS_ASSOCIATION_TIMEOUT_MS,
  AWS_REGION,
  INSTANCE_READINESS_INTERVAL_MS,
  SSH_REACHABILITY_INTERVAL_MS,
  type CleanupScope,
  type FleetConfig,
  type FleetConfigInput,
  type InstanceDefinitionInput,
  validateFleetConfig,
  validateInstanceDefinition,
} from "@scratchfleet/core";
import {
  type HostIdentity,
  buildBootScript,
  encodeUserData,
  generateHostIdentity,
} from "../base/host-key-bootstrap";
import { type PollClock, pollUntil, realClock, transientCodes } from "../base/poll";
import { type CommandRunner, execFileRunner } from "../remote/command-runner";
import { ProviderError, ProviderErrorType, requireField, resourceName } from "../utils/provider-utils";
import { Ec2Instance } from "./ec2-instance";
import { Ec2ManagerFactory, type Ec2ManagerFactoryConfig, type Ec2Managers } from "./ec2-manager-factory";
import { resolveImageReference } from "./image-reference";
import { TeardownEngine } from "./teardown";
import type {
  CredentialKeypair,
  ElasticAddress,
  InstanceAddresses,
  LaunchSpec,
  LaunchedInstance,
  LogCallback,
  PlacementGroupRef,
  ResourceRecord,
  SubnetInfo,
} from "./types";

/** Primary interface not attachable yet right after launch */
export const ADDRESS_ASSOCIATION_TRANSIENT_CODES = [
  "IncorrectInstanceState",
  "InvalidNetworkInterfaceID.NotFound",
  "InvalidInstanceID.NotFound",
] as const;

/** Describe lags RunInstances */
export const INSTANCE_READINESS_TRANSIENT_CODES = ["InvalidInstanceID.NotFound"] as const;

export interface Ec2FleetOptions {
  /** Skip the STS lookup */
  principal?: string;
  stsService?: Pick<STSService, "getPrincipalName">;
  ec2Client?: EC2Client;
  credentials?: EC2ClientConfig["credentials"];
  createManagers?: (config: Ec2ManagerFactoryConfig) => Ec2Managers;
  commandRunner?: CommandRunner;
  clock?: PollClock;
  /** Random part of resource names */
  randomSuffix?: () => string;
  log?: LogCallback;
}

interface FleetResources {
  keypair: CredentialKeypair;
  securityGroupId: string;
  placementGroup: PlacementGroupRef;
  subnet: SubnetInfo;
  hostIdentity: HostIdentity;
}

interface FleetRuntime {
  log: LogCallback;
  clock: PollClock;
  runner: CommandRunner;
  randomSuffix: () => string;
}

type ReadyAddresses = InstanceAddresses & { privateIp: string };

const noopLog: LogCallback = () => undefined;

async function resolvePrincipal(options: Ec2FleetOptions): Promise<string> {
  if (options.principal) return options.principal;
  const sts = options.stsService ?? new STSService({ region: AWS_REGION });
  return sts.getPrincipalName();
}

function createFleetManagers(principal: string, scope: CleanupScope, options: Ec2FleetOptions): Ec2Managers {
  const create = options.createManagers ?? Ec2ManagerFactory.createManagers;
  return create({
    ownership: { principal, scope },
    log: (line) => (options.log ?? noopLog)(line, "stdout"),
    client: options.ec2Client,
    credentials: options.credentials,
  });
}

/**
 * Reclaim everything owned within `scope` without building a fleet.
 */
export async function reclaimScope(
  scope: CleanupScope,
  options: Ec2FleetOptions = {},
): Promise<ResourceRecord[]> {
  const principal = await resolvePrincipal(options);
  const managers = createFleetManagers(principal, scope, options);
  return new TeardownEngine({ ...managers, log: options.log ?? noopLog }).reclaim(scope);
}

export class Ec2Fleet {
  private constructor(
    readonly config: FleetConfig,
    readonly principal: string,
    private readonly managers: Ec2Managers,
    private readonly resources: FleetResources,
    private readonly runtime: FleetRuntime,
  ) {}

  static async build(input: FleetConfigInput, options: Ec2FleetOptions = {}): Promise<Ec2Fleet> {
    const config = validateFleetConfig(input);
    const runtime: FleetRuntime = {
      log: options.log ?? noopLog,
      clock: options.clock ?? realClock,
      runner: options.commandRunner ?? execFileRunner,
      randomSuffix: options.randomSuffix ?? uuidv4,
    };
    const { log } = runtime;

    const principal = await resolvePrincipal(options);
    const managers = createFleetManagers(principal, config.cleanup, options);
    const { networkManager, computeManager } = managers;

    // [1/3] Crash recovery: nothing of an earlier run in this scope survives
    log("[1/3] Reclaiming resources left in scope...", "stdout");
    await new TeardownEngine({ ...managers, log }).reclaim(config.cleanup);

    // [2/3] Independent setup calls, issued together
    log("[2/3] Creating key pair, security group and placement group...", "stdout");
    const name = () => resourceName(principal, runtime.randomSuffix());
    const [keypair, securityGroupId, placementGroup, subnet] = await Promise.all([
      computeManager.createKeyPair(name()),
      config.securityGroupId
        ? Promise.resolve(config.securityGroupId)
        : networkManager.createSecurityGroup(name(), config.vpcId),
      networkManager.createPlacementGroup(name()),
      networkManager.resolveSubnet(config.subnetId),
    ]);

    // [3/3] Host identity injected into every instance of the fleet
    log("[3/3] Generating host identity...", "stdout");
    const hostIdentity = generateHostIdentity();

    log(`Fleet ready for ${principal} in ${subnet.availabilityZone}`, "stdout");
    return new Ec2Fleet(config, principal, managers, {
      keypair,
      securityGroupId,
      placementGroup,
      subnet,
      hostIdentity,
    }, runtime);
  }

  get securityGroupId(): string {
    return this.resources.securityGroupId;
  }

  get placementGroupName(): string {
    return this.resources.placementGroup.groupName;
  }

  get subnet(): SubnetInfo {
    return this.resources.subnet;
  }

  get hostPublicKey(): string {
    return this.resources.hostIdentity.publicKeyText;
  }

  /**
   * Launch one instance and wait until it accepts SSH with the pinned host key.
   */
  async provision(input: InstanceDefinitionInput): Promise<Ec2Instance> {
    const definition = validateInstanceDefinition(input);
    const { log } = this.runtime;
    const { keypair, placementGroup, subnet, securityGroupId, hostIdentity } = this.resources;
    const multiInterface = definition.networkInterfaceCount > 1;

    // A single interface can only get a public IP from the subnet
    if (this.config.usePublicAddresses && !multiInterface && !subnet.mapPublicIpOnLaunch) {
      throw new ProviderError(
        `Subnet ${subnet.subnetId} does not assign public IPs on launch`,
        ProviderErrorType.UNKNOWN,
        undefined,
        ["Connect over private addresses, or use a subnet with MapPublicIpOnLaunch"],
      );
    }

    // Addresses are capped per account: only when an interface can't get one otherwise
    let address: ElasticAddress | undefined;
    if (this.config.usePublicAddresses && multiInterface) {
      log("Allocating elastic IP...", "stdout");
      address = await this.managers.networkManager.allocateAddress();
    }

    const spec: LaunchSpec = {
      name: resourceName(this.principal, this.runtime.randomSuffix()),
      imageId: definition.ami ?? resolveImageReference(definition.os, definition.instanceType),
      instanceType: definition.instanceType,
      volumeSizeGb: definition.volumeSizeGb,
      placementGroupName: placementGroup.groupName,
      availabilityZone: subnet.availabilityZone,
      keyName: keypair.keyName,
      userData: encodeUserData(buildBootScript(hostIdentity.publicKeyText, hostIdentity.privateKeyText)),
      attachment: multiInterface
        ? {
            kind: "interfaces",
            subnetId: subnet.subnetId,
            securityGroupId,
            count: definition.networkInterfaceCount,
          }
        : { kind: "subnet", subnetId: subnet.subnetId, securityGroupIds: [securityGroupId] },
    };

    log(`Launching ${definition.instanceType}...`, "stdout");
    const launched = await this.managers.computeManager.runInstance(spec);

    if (address) {
      await this.associateAddress(address, launched);
    }

    const awaitPublicIp =
      this.config.usePublicAddresses ||
      (this.config.awaitAutoAssignedPublicIp && !multiInterface && subnet.mapPublicIpOnLaunch);
    const addresses = await this.awaitAddresses(launched.instanceId, awaitPublicIp);

    const connectIp = this.config.usePublicAddresses
      ? requireField(addresses.publicIp, "public IP")
      : addresses.privateIp;

    const instance = new Ec2Instance({
      instanceId: launched.instanceId,
      connectIp,
      publicIp: addresses.publicIp,
      privateIp: addresses.privateIp,
      networkInterfaces: addresses.networkInterfaces,
      clientPrivateKey: keypair.privateKeyText,
      hostPublicKeyText: hostIdentity.publicKeyText,
      runner: this.runtime.runner,
      clock: this.runtime.clock,
      log,
    });

    log(`Waiting for SSH on ${connectIp}...`, "stdout");
    await instance.ssh().waitUntilReachable(SSH_REACHABILITY_INTERVAL_MS, this.config.sshReachabilityTimeoutMs);
    return instance;
  }

  /** Tear down everything in this fleet's scope */
  async reclaim(): Promise<ResourceRecord[]> {
    return new TeardownEngine({ ...this.managers, log: this.runtime.log }).reclaim(this.config.cleanup);
  }

  // ── Polling ──────────────────────────────────────────────────────────

  private async associateAddress(address: ElasticAddress, launched: LaunchedInstance): Promise<void> {
    const primary = requireField(
      launched.networkInterfaces.find((ni) => ni.deviceIndex === 0),
      `primary network interface of ${launched.instanceId}`,
    );

    await pollUntil(
      async () => {
        await this.managers.networkManager.associateAddress(address.allocationId, primary.networkInterfaceId);
        return true;
      },
      {
        description: `association of ${address.publicIp} with ${primary.networkInterfaceId}`,
        intervalMs: ADDRESS_ASSOCIATION_INTERVAL_MS,
        deadlineMs: ADDRESS_ASSOCIATION_TIMEOUT_MS,
        isTransient: transientCodes(ADDRESS_ASSOCIATION_TRANSIENT_CODES),
        clock: this.runtime.clock,
      },
    );
  }

  /** Unbounded: boot time has no upper limit worth enforcing here */
  private async awaitAddresses(instanceId: string, awaitPublicIp: boolean): Promise<ReadyAddresses> {
    this.runtime.log(`Waiting for addresses of ${instanceId}...`, "stdout");
    return pollUntil<ReadyAddresses>(
      async () => {
        const current = await this.managers.computeManager.describeInstance(instanceId);
        if (!current?.privateIp) return undefined;
        if (awaitPublicIp && !current.publicIp) return undefined;
        return { ...current, privateIp: current.privateIp };
      },
      {
        description: `addresses of ${instanceId}`,
        intervalMs: INSTANCE_READINESS_INTERVAL_MS,
        initialDelay: true,
        isTransient: transientCodes(INSTANCE_READINESS_TRANSIENT_CODES),
        clock: this.runtime.clock,
      },
    );
  }
}
