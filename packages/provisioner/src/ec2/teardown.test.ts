import type { CleanupScope } from "@scratchfleet/core";
import { KeypairDeletionError, TeardownEngine, describeScope } from "./teardown";
import type { IAwsComputeManager, IAwsNetworkManager, IOwnershipLedger } from "./managers/interfaces";
import type { OwnedResourceKind } from "./types";
import { ProviderErrorType } from "../utils/provider-utils";

function awsError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

function createMockLedger(owned: Partial<Record<OwnedResourceKind, string[]>>): jest.Mocked<IOwnershipLedger> {
  return {
    principal: "alice",
    tagsFor: jest.fn().mockReturnValue([]),
    tagSpecification: jest.fn().mockReturnValue({}),
    discover: jest.fn((_scope: CleanupScope, kind: OwnedResourceKind) => Promise.resolve(owned[kind] ?? [])),
  };
}

function createMockNetworkManager(): jest.Mocked<IAwsNetworkManager> {
  return {
    createSecurityGroup: jest.fn(),
    deleteSecurityGroup: jest.fn().mockResolvedValue(undefined),
    createPlacementGroup: jest.fn(),
    describePlacementGroups: jest.fn().mockResolvedValue([]),
    deletePlacementGroup: jest.fn().mockResolvedValue(undefined),
    resolveSubnet: jest.fn(),
    allocateAddress: jest.fn(),
    associateAddress: jest.fn(),
    releaseAddress: jest.fn().mockResolvedValue(undefined),
  };
}

function createMockComputeManager(): jest.Mocked<IAwsComputeManager> {
  return {
    createKeyPair: jest.fn(),
    deleteKeyPair: jest.fn().mockResolvedValue(undefined),
    runInstance: jest.fn(),
    describeInstance: jest.fn(),
    terminateInstances: jest.fn().mockResolvedValue([]),
  };
}

describe("TeardownEngine", () => {
  let network: jest.Mocked<IAwsNetworkManager>;
  let compute: jest.Mocked<IAwsComputeManager>;
  let log: jest.Mock;

  beforeEach(() => {
    network = createMockNetworkManager();
    compute = createMockComputeManager();
    log = jest.fn();
  });

  function engine(owned: Partial<Record<OwnedResourceKind, string[]>>): TeardownEngine {
    return new TeardownEngine({
      ledger: createMockLedger(owned),
      networkManager: network,
      computeManager: compute,
      log,
    });
  }

  function stderrLines(): string[] {
    return log.mock.calls.filter((c) => c[1] === "stderr").map((c) => c[0]);
  }

  // ── Ordering ─────────────────────────────────────────────────────────

  it("releases addresses, then terminates instances, then deletes the rest", async () => {
    const calls: string[] = [];
    network.releaseAddress.mockImplementation(async (id) => {
      calls.push(`release ${id}`);
    });
    compute.terminateInstances.mockImplementation(async (ids) => {
      calls.push(`terminate ${ids.join(",")}`);
      return [];
    });
    network.deleteSecurityGroup.mockImplementation(async (id) => {
      calls.push(`delete ${id}`);
    });
    compute.deleteKeyPair.mockImplementation(async (id) => {
      calls.push(`delete ${id}`);
    });

    await engine({
      "elastic-ip": ["eipalloc-1", "eipalloc-2"],
      instance: ["i-1", "i-2"],
      "security-group": ["sg-1"],
      "key-pair": ["key-1"],
    }).reclaim({ kind: "all" });

    expect(calls.slice(0, 3)).toEqual(["release eipalloc-1", "release eipalloc-2", "terminate i-1,i-2"]);
    expect(calls.slice(3).sort()).toEqual(["delete key-1", "delete sg-1"]);
  });

  it("returns every reclaimed record", async () => {
    compute.terminateInstances.mockResolvedValue([
      { instanceId: "i-1", previousState: "running", currentState: "shutting-down" },
    ]);
    network.describePlacementGroups.mockResolvedValue([{ groupId: "pg-1", groupName: "scratchfleet-alice-pg" }]);

    const reclaimed = await engine({
      instance: ["i-1"],
      "placement-group": ["pg-1"],
      "key-pair": ["key-1"],
    }).reclaim({ kind: "app", appTag: "net-bench" });

    expect(reclaimed).toEqual([
      { kind: "instance", id: "i-1" },
      { kind: "placement-group", id: "pg-1" },
      { kind: "key-pair", id: "key-1" },
    ]);
    expect(log).toHaveBeenCalledWith("i-1: running -> shutting-down", "stdout");
  });

  it("makes no provider calls when nothing is owned", async () => {
    await expect(engine({}).reclaim({ kind: "all" })).resolves.toEqual([]);

    expect(compute.terminateInstances).not.toHaveBeenCalled();
    expect(network.describePlacementGroups).not.toHaveBeenCalled();
    expect(network.releaseAddress).not.toHaveBeenCalled();
  });

  it("deletes placement groups by name and reports their IDs", async () => {
    network.describePlacementGroups.mockResolvedValue([
      { groupId: "pg-a", groupName: "pg-name-a" },
      { groupId: "pg-b", groupName: "pg-name-b" },
    ]);

    const reclaimed = await engine({ "placement-group": ["pg-a", "pg-b"] }).reclaim({ kind: "all" });

    expect(network.describePlacementGroups).toHaveBeenCalledWith(["pg-a", "pg-b"]);
    expect(network.deletePlacementGroup.mock.calls).toEqual([["pg-name-a"], ["pg-name-b"]]);
    expect(reclaimed).toEqual([
      { kind: "placement-group", id: "pg-a" },
      { kind: "placement-group", id: "pg-b" },
    ]);
  });

  // ── Failure policy ───────────────────────────────────────────────────

  it("keeps going when an address release fails", async () => {
    network.releaseAddress.mockRejectedValueOnce(awsError("AuthFailure", "denied"));

    await engine({ "elastic-ip": ["eipalloc-1", "eipalloc-2"], instance: ["i-1"] }).reclaim({ kind: "all" });

    expect(network.releaseAddress).toHaveBeenCalledTimes(2);
    expect(compute.terminateInstances).toHaveBeenCalledWith(["i-1"]);
    expect(stderrLines()).toEqual(["Failed to release elastic IP eipalloc-1: denied"]);
  });

  it("keeps going when termination fails", async () => {
    compute.terminateInstances.mockRejectedValue(awsError("InternalError", "boom"));

    await engine({ instance: ["i-1", "i-2"], "security-group": ["sg-1"] }).reclaim({ kind: "all" });

    expect(network.deleteSecurityGroup).toHaveBeenCalledWith("sg-1");
    expect(stderrLines()).toEqual(["Failed to terminate i-1, i-2: boom"]);
  });

  it("resolves placement groups one at a time when one of them is already gone", async () => {
    network.describePlacementGroups.mockImplementation(async (ids) => {
      if (ids.includes("pg-gone")) {
        throw awsError("InvalidPlacementGroup.Unknown", "The Placement Group 'pg-gone' is unknown");
      }
      return ids.map((id) => ({ groupId: id, groupName: `name-${id}` }));
    });

    const reclaimed = await engine({
      "placement-group": ["pg-gone", "pg-2"],
      "security-group": ["sg-1"],
    }).reclaim({ kind: "all" });

    expect(network.deletePlacementGroup.mock.calls).toEqual([["name-pg-2"]]);
    expect(reclaimed).toEqual([
      { kind: "security-group", id: "sg-1" },
      { kind: "placement-group", id: "pg-2" },
    ]);
    expect(stderrLines()).toEqual([
      "Failed to describe placement groups pg-gone, pg-2: The Placement Group 'pg-gone' is unknown",
      "Failed to describe placement-group pg-gone: The Placement Group 'pg-gone' is unknown",
    ]);
  });

  it("still terminates instances when address discovery fails", async () => {
    const owned: Partial<Record<OwnedResourceKind, string[]>> = { instance: ["i-1"], "security-group": ["sg-1"] };
    const ledger = createMockLedger(owned);
    ledger.discover.mockImplementation(async (_scope, kind) => {
      if (kind === "elastic-ip") throw awsError("RequestLimitExceeded", "Request limit exceeded.");
      return owned[kind] ?? [];
    });

    await new TeardownEngine({ ledger, networkManager: network, computeManager: compute, log }).reclaim({
      kind: "all",
    });

    expect(network.releaseAddress).not.toHaveBeenCalled();
    expect(compute.terminateInstances).toHaveBeenCalledWith(["i-1"]);
    expect(network.deleteSecurityGroup).toHaveBeenCalledWith("sg-1");
    expect(stderrLines()).toEqual(["Failed to discover elastic-ip resources: Request limit exceeded."]);
  });

  it("still deletes groups when instance discovery fails", async () => {
    const ledger = createMockLedger({});
    ledger.discover.mockImplementation(async (_scope, kind) => {
      if (kind === "instance") throw awsError("RequestLimitExceeded", "Request limit exceeded.");
      return kind === "security-group" ? ["sg-1"] : [];
    });

    const reclaimed = await new TeardownEngine({
      ledger,
      networkManager: network,
      computeManager: compute,
      log,
    }).reclaim({ kind: "all" });

    expect(compute.terminateInstances).not.toHaveBeenCalled();
    expect(reclaimed).toEqual([{ kind: "security-group", id: "sg-1" }]);
    expect(stderrLines()).toEqual(["Failed to discover instance resources: Request limit exceeded."]);
  });

  it("does not let one stuck security group block the others", async () => {
    network.deleteSecurityGroup.mockRejectedValueOnce(awsError("DependencyViolation", "in use"));

    const reclaimed = await engine({ "security-group": ["sg-1", "sg-2", "sg-3"] }).reclaim({ kind: "all" });

    expect(network.deleteSecurityGroup).toHaveBeenCalledTimes(3);
    expect(reclaimed).toEqual([
      { kind: "security-group", id: "sg-2" },
      { kind: "security-group", id: "sg-3" },
    ]);
    expect(stderrLines()).toEqual(["Failed to delete security-group sg-1: in use"]);
  });

  it("stops deleting key pairs after an authorization failure", async () => {
    compute.deleteKeyPair.mockRejectedValueOnce(awsError("UnauthorizedOperation", "not allowed"));

    await engine({ "key-pair": ["key-1", "key-2", "key-3"], "security-group": ["sg-1"] }).reclaim({
      kind: "all",
    });

    expect(compute.deleteKeyPair).toHaveBeenCalledTimes(1);
    expect(network.deleteSecurityGroup).toHaveBeenCalledWith("sg-1");
    expect(stderrLines()).toEqual([
      "Not authorized to delete key pairs; skipping 3 key pair(s): not allowed",
    ]);
  });

  it("surfaces other key pair failures after the group deletions finish", async () => {
    compute.deleteKeyPair.mockRejectedValueOnce(awsError("InvalidKeyPair.NotFound", "gone"));

    const error = await engine({ "key-pair": ["key-1", "key-2"], "security-group": ["sg-1"] })
      .reclaim({ kind: "all" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(KeypairDeletionError);
    expect(error).toMatchObject({
      keyPairId: "key-1",
      type: ProviderErrorType.NOT_FOUND,
      message: "Failed to delete key pair key-1: gone",
    });
    expect(compute.deleteKeyPair).toHaveBeenCalledTimes(1);
    expect(network.deleteSecurityGroup).toHaveBeenCalledWith("sg-1");
  });
});

describe("describeScope", () => {
  it("names the app tag when the scope has one", () => {
    expect(describeScope("alice", { kind: "app", appTag: "net-bench" })).toBe("alice (app net-bench)");
    expect(describeScope("alice", { kind: "all" })).toBe("alice (all apps)");
  });
});
