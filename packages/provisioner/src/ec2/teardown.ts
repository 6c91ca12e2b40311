/**
 * Teardown Engine
 *
 * Reclaims everything an ownership scope owns, in a fixed order:
 *   1. release elastic addresses
 *   2. terminate instances (one batched call)
 *   3. delete security groups, placement groups and key pairs concurrently
 *
 * Nothing before the key pair phase aborts the run: failed lookups and
 * deletions are logged on stderr and the next step still runs. Whatever a
 * failed or crashed run left behind is discovered again on the next call.
 */

import type { CleanupScope } from "@scratchfleet/core";
import type { IAwsComputeManager, IAwsNetworkManager, IOwnershipLedger } from "./managers/interfaces";
import type { LogCallback, OwnedResourceKind, PlacementGroupRef, ResourceRecord } from "./types";
import {
  ProviderError,
  errorCode,
  errorMessage,
  parseCloudError,
  toError,
} from "../utils/provider-utils";

/** Once one key pair deletion is refused, the rest will be too */
const KEYPAIR_AUTHORIZATION_CODE = "UnauthorizedOperation";

export class KeypairDeletionError extends ProviderError {
  constructor(
    readonly keyPairId: string,
    cause: unknown,
  ) {
    const classified = parseCloudError(cause);
    super(
      `Failed to delete key pair ${keyPairId}: ${errorMessage(cause)}`,
      classified.type,
      toError(cause),
      classified.suggestions,
    );
    this.name = "KeypairDeletionError";
  }
}

export interface TeardownDeps {
  ledger: IOwnershipLedger;
  networkManager: IAwsNetworkManager;
  computeManager: IAwsComputeManager;
  log: LogCallback;
}

export function describeScope(principal: string, scope: CleanupScope): string {
  return scope.kind === "app" ? `${principal} (app ${scope.appTag})` : `${principal} (all apps)`;
}

export class TeardownEngine {
  constructor(private readonly deps: TeardownDeps) {}

  /**
   * Delete every resource owned within `scope`. Returns the records that
   * were deleted (or, for instances, set terminating).
   */
  async reclaim(scope: CleanupScope): Promise<ResourceRecord[]> {
    this.deps.log(`Reclaiming resources owned by ${describeScope(this.deps.ledger.principal, scope)}`, "stdout");

    const reclaimed: ResourceRecord[] = [];
    reclaimed.push(...(await this.releaseAddresses(scope)));
    reclaimed.push(...(await this.terminateInstances(scope)));

    const results = await Promise.allSettled([
      this.deleteSecurityGroups(scope),
      this.deletePlacementGroups(scope),
      this.deleteKeyPairs(scope),
    ]);

    let failure: unknown;
    for (const result of results) {
      if (result.status === "fulfilled") {
        reclaimed.push(...result.value);
      } else if (failure === undefined) {
        failure = result.reason;
      }
    }
    if (failure !== undefined) throw failure;

    this.deps.log(`Reclaimed ${reclaimed.length} resource(s)`, "stdout");
    return reclaimed;
  }

  // ── Ordered steps ────────────────────────────────────────────────────

  private async releaseAddresses(scope: CleanupScope): Promise<ResourceRecord[]> {
    const allocationIds = await this.discoverOrLog(scope, "elastic-ip");
    const released: ResourceRecord[] = [];

    for (const allocationId of allocationIds) {
      try {
        await this.deps.networkManager.releaseAddress(allocationId);
        released.push({ kind: "elastic-ip", id: allocationId });
      } catch (err: unknown) {
        this.deps.log(`Failed to release elastic IP ${allocationId}: ${errorMessage(err)}`, "stderr");
      }
    }
    return released;
  }

  private async terminateInstances(scope: CleanupScope): Promise<ResourceRecord[]> {
    const instanceIds = await this.discoverOrLog(scope, "instance");
    if (instanceIds.length === 0) return [];

    try {
      const changes = await this.deps.computeManager.terminateInstances(instanceIds);
      for (const change of changes) {
        this.deps.log(`${change.instanceId}: ${change.previousState} -> ${change.currentState}`, "stdout");
      }
      return changes.map((change) => ({ kind: "instance" as const, id: change.instanceId }));
    } catch (err: unknown) {
      this.deps.log(`Failed to terminate ${instanceIds.join(", ")}: ${errorMessage(err)}`, "stderr");
      return [];
    }
  }

  private async deleteSecurityGroups(scope: CleanupScope): Promise<ResourceRecord[]> {
    const groupIds = await this.deps.ledger.discover(scope, "security-group");
    return this.deleteEach(
      "security-group",
      groupIds,
      (id) => id,
      (id) => this.deps.networkManager.deleteSecurityGroup(id),
    );
  }

  private async deletePlacementGroups(scope: CleanupScope): Promise<ResourceRecord[]> {
    const groupIds = await this.deps.ledger.discover(scope, "placement-group");
    if (groupIds.length === 0) return [];

    const groups = await this.resolvePlacementGroups(groupIds);
    return this.deleteEach(
      "placement-group",
      groups,
      (group) => group.groupId,
      (group) => this.deps.networkManager.deletePlacementGroup(group.groupName),
    );
  }

  private async deleteKeyPairs(scope: CleanupScope): Promise<ResourceRecord[]> {
    const keyPairIds = await this.deps.ledger.discover(scope, "key-pair");
    const deleted: ResourceRecord[] = [];

    for (const [index, keyPairId] of keyPairIds.entries()) {
      try {
        await this.deps.computeManager.deleteKeyPair(keyPairId);
        deleted.push({ kind: "key-pair", id: keyPairId });
      } catch (err: unknown) {
        if (errorCode(err) === KEYPAIR_AUTHORIZATION_CODE) {
          const remaining = keyPairIds.length - index;
          this.deps.log(
            `Not authorized to delete key pairs; skipping ${remaining} key pair(s): ${errorMessage(err)}`,
            "stderr",
          );
          break;
        }
        throw new KeypairDeletionError(keyPairId, err);
      }
    }
    return deleted;
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private async discoverOrLog(scope: CleanupScope, kind: OwnedResourceKind): Promise<string[]> {
    try {
      return await this.deps.ledger.discover(scope, kind);
    } catch (err: unknown) {
      this.deps.log(`Failed to discover ${kind} resources: ${errorMessage(err)}`, "stderr");
      return [];
    }
  }

  /**
   * The batched describe fails as a whole when any ID is already gone (for
   * instance deleted by a concurrent reclaim); fall back to one ID at a time.
   */
  private async resolvePlacementGroups(groupIds: string[]): Promise<PlacementGroupRef[]> {
    try {
      return await this.deps.networkManager.describePlacementGroups(groupIds);
    } catch (err: unknown) {
      this.deps.log(`Failed to describe placement groups ${groupIds.join(", ")}: ${errorMessage(err)}`, "stderr");
    }

    const resolved: PlacementGroupRef[] = [];
    for (const groupId of groupIds) {
      try {
        resolved.push(...(await this.deps.networkManager.describePlacementGroups([groupId])));
      } catch (err: unknown) {
        this.deps.log(`Failed to describe placement-group ${groupId}: ${errorMessage(err)}`, "stderr");
      }
    }
    return resolved;
  }

  /** Per-resource delete; failures are logged and skipped */
  private async deleteEach<T>(
    kind: OwnedResourceKind,
    items: T[],
    idOf: (item: T) => string,
    remove: (item: T) => Promise<void>,
  ): Promise<ResourceRecord[]> {
    const deleted: ResourceRecord[] = [];
    for (const item of items) {
      const id = idOf(item);
      try {
        await remove(item);
        deleted.push({ kind, id });
      } catch (err: unknown) {
        this.deps.log(`Failed to delete ${kind} ${id}: ${errorMessage(err)}`, "stderr");
      }
    }
    return deleted;
  }
}
