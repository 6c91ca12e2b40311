/**
 * Build → provision → reclaim against an in-process EC2 account.
 */

import type { CleanupScope } from "@scratchfleet/core";
import { FakeClock } from "../../__testing__/fake-clock";
import { FakeCommandRunner } from "../../__testing__/fake-command-runner";
import { FakeEc2 } from "../../__testing__/fake-ec2";
import { PollTimeoutError } from "../../base/poll";
import { parseKnownHostsLine } from "../../base/host-key-bootstrap";
import { Ec2Fleet, reclaimScope, type Ec2FleetOptions } from "../ec2-fleet";
import { OwnershipLedger } from "../managers/ownership-ledger";
import { OWNED_RESOURCE_KINDS, type OwnedResourceKind } from "../types";

const SCOPE: CleanupScope = { kind: "app", appTag: "net-bench" };

const ownerTags = (principal: string, appTag: string) => [
  { Key: "scratchfleet:owner", Value: principal },
  { Key: "scratchfleet:app", Value: appTag },
];

describe("fleet lifecycle", () => {
  let fake: FakeEc2;
  let runner: FakeCommandRunner;
  let clock: FakeClock;

  function options(): Ec2FleetOptions {
    let suffix = 0;
    return {
      principal: "alice",
      ec2Client: fake.client,
      commandRunner: runner.run,
      clock,
      randomSuffix: () => `run${++suffix}`,
    };
  }

  async function discoverAll(scope: CleanupScope): Promise<Record<OwnedResourceKind, string[]>> {
    const ledger = new OwnershipLedger(fake.client, { principal: "alice", scope });
    const entries = await Promise.all(
      OWNED_RESOURCE_KINDS.map(async (kind) => [kind, await ledger.discover(scope, kind)] as const),
    );
    return {
      "key-pair": [],
      "security-group": [],
      "placement-group": [],
      "elastic-ip": [],
      instance: [],
      ...Object.fromEntries(entries),
    };
  }

  beforeEach(() => {
    fake = new FakeEc2({ describeNotFoundCalls: 1 });
    runner = new FakeCommandRunner();
    clock = new FakeClock();
  });

  // ── Single interface ─────────────────────────────────────────────────

  describe("with one network interface", () => {
    it("provisions a reachable machine that runs commands", async () => {
      runner.respond((cmd, args) =>
        cmd === "ssh" && args[args.length - 1] === "uname -s"
          ? { stdout: "Linux\n", stderr: "", exitCode: 0 }
          : undefined,
      );
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      const instance = await fleet.provision({ instanceType: "t3.micro" });
      const result = await instance.ssh().shell("uname -s");

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("Linux\n");
      expect(instance.connectIp).toBe(fake.instances.get(instance.instanceId)?.publicIp);
    });

    it("sends one security group attachment, 8GB gp2 root and no elastic IP", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      await fleet.provision({ instanceType: "t3.micro" });

      expect(fake.launches).toHaveLength(1);
      const [launch] = fake.launches;
      expect(launch.SecurityGroupIds).toEqual([fleet.securityGroupId]);
      expect(launch.SubnetId).toBe(fake.subnetId);
      expect(launch.NetworkInterfaces).toBeUndefined();
      expect(launch.BlockDeviceMappings?.[0]?.Ebs?.VolumeSize).toBe(8);
      expect(launch.ImageId).toBe(
        "resolve:ssm:/aws/service/canonical/ubuntu/server/22.04/stable/current/amd64/hvm/ebs-gp2/ami-id",
      );
      expect(launch.Placement).toEqual({ GroupName: fleet.placementGroupName, AvailabilityZone: "us-east-1c" });
      expect(fake.addresses.size).toBe(0);
    });

    it("injects the host key the pinned known_hosts line expects", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      const instance = await fleet.provision({ instanceType: "t3.micro" });

      const script = Buffer.from(fake.launches[0].UserData ?? "", "base64").toString("utf8");
      expect(script.split("\n")).toContain(fleet.hostPublicKey);
      const entry = parseKnownHostsLine(instance.knownHostsLine);
      expect(entry.address).toBe(instance.connectIp);
      expect(runner.calls[0].knownHosts).toBe(instance.knownHostsLine);
    });
  });

  // ── Multiple interfaces ──────────────────────────────────────────────

  describe("with two network interfaces", () => {
    it("allocates one elastic IP and sends per-index interface specs", async () => {
      fake = new FakeEc2({ associateFailures: 2 });
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      const instance = await fleet.provision({ instanceType: "c5n.large", networkInterfaceCount: 2 });

      expect(fake.addresses.size).toBe(1);
      const [address] = [...fake.addresses.values()];
      expect(instance.connectIp).toBe(address.publicIp);

      const [launch] = fake.launches;
      expect(launch.SecurityGroupIds).toBeUndefined();
      expect(launch.SubnetId).toBeUndefined();
      expect(launch.NetworkInterfaces?.map((ni) => ni.DeviceIndex)).toEqual([0, 1]);
      expect(instance.networkInterfaces.map((ni) => ni.deviceIndex)).toEqual([0, 1]);
      // two rejected attempts, two 2s backoffs
      expect(clock.sleeps.filter((ms) => ms === 2_000)).toHaveLength(2);
    });

    it("gives up associating after 120 seconds", async () => {
      fake = new FakeEc2({ associateFailures: Number.MAX_SAFE_INTEGER });
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      const error = await fleet
        .provision({ instanceType: "c5n.large", networkInterfaceCount: 2 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PollTimeoutError);
      expect(error).toMatchObject({ elapsedMs: 120_000, attempts: 61 });

      await fleet.reclaim();
      expect(fake.addresses.size).toBe(0);
      expect([...fake.instances.values()].map((i) => i.state)).toEqual(["terminated"]);
    });

    it("allocates no address when connecting privately", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE, usePublicAddresses: false }, options());

      const instance = await fleet.provision({ instanceType: "c5n.large", networkInterfaceCount: 2 });

      expect(fake.addresses.size).toBe(0);
      expect(instance.publicIp).toBeUndefined();
      expect(instance.connectIp).toBe(instance.privateIp);
    });
  });

  // ── Addressing ───────────────────────────────────────────────────────

  describe("addressing", () => {
    it("connects to the private address in private mode", async () => {
      fake = new FakeEc2({ mapPublicIpOnLaunch: false });
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE, usePublicAddresses: false }, options());

      const instance = await fleet.provision({ instanceType: "t3.micro" });

      expect(instance.connectIp).toBe(instance.privateIp);
      expect(instance.publicIp).toBeUndefined();
    });

    it("refuses public mode on a subnet that assigns no public IPs", async () => {
      fake = new FakeEc2({ mapPublicIpOnLaunch: false });
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      await expect(fleet.provision({ instanceType: "t3.micro" })).rejects.toThrow(
        "Subnet subnet-0fa1 does not assign public IPs on launch",
      );
      expect(fake.launches).toHaveLength(0);
    });

    it("reuses a caller-supplied security group", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE, securityGroupId: "sg-0123abcd" }, options());

      await fleet.provision({ instanceType: "t3.micro" });

      expect(fake.securityGroups.size).toBe(0);
      expect(fake.launches[0].SecurityGroupIds).toEqual(["sg-0123abcd"]);
    });
  });

  // ── SSH reachability ─────────────────────────────────────────────────

  describe("SSH reachability", () => {
    function refuseFirstProbes(count: number): () => number {
      let probes = 0;
      runner.respond((cmd, args) => {
        if (cmd !== "ssh" || args[args.length - 1] !== "true") return undefined;
        probes += 1;
        return probes <= count ? { stdout: "", stderr: "Connection refused", exitCode: 255 } : undefined;
      });
      return () => probes;
    }

    it("waits past two minutes for a slow-booting instance", async () => {
      const probes = refuseFirstProbes(130);
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      const instance = await fleet.provision({ instanceType: "c5n.metal" });

      expect(probes()).toBe(131);
      expect(instance.connectIp).toBe(fake.instances.get(instance.instanceId)?.publicIp);
    });

    it("gives up at the configured bound", async () => {
      refuseFirstProbes(Number.MAX_SAFE_INTEGER);
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE, sshReachabilityTimeoutMs: 5_000 }, options());

      const error = await fleet.provision({ instanceType: "t3.micro" }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PollTimeoutError);
      expect(error).toMatchObject({ elapsedMs: 5_000, attempts: 6 });
    });
  });

  // ── Ownership ────────────────────────────────────────────────────────

  describe("ownership", () => {
    beforeEach(() => {
      fake.seed("security-group", "sg-bob", ownerTags("bob", "net-bench"));
      fake.seed("security-group", "sg-alice-other", ownerTags("alice", "other-app"));
    });

    it("discovers exactly what the fleet created", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());
      const instance = await fleet.provision({ instanceType: "t3.micro" });

      const owned = await discoverAll(SCOPE);

      expect(owned).toEqual({
        "key-pair": [...fake.keyPairs.keys()],
        "security-group": [fleet.securityGroupId],
        "placement-group": [...fake.placementGroups.keys()],
        "elastic-ip": [],
        instance: [instance.instanceId],
      });
      expect(fake.keyPairs.size).toBe(1);
      expect(fake.placementGroups.size).toBe(1);
    });

    it("reclaims idempotently and leaves only terminated instances tagged", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());
      const instance = await fleet.provision({ instanceType: "c5n.large", networkInterfaceCount: 2 });

      await fleet.reclaim();
      // EC2 keeps terminated instances (and their tags) around for a while
      await expect(fleet.reclaim()).resolves.toEqual([{ kind: "instance", id: instance.instanceId }]);

      expect(await discoverAll(SCOPE)).toEqual({
        "key-pair": [],
        "security-group": [],
        "placement-group": [],
        "elastic-ip": [],
        instance: [instance.instanceId],
      });
      expect(fake.instances.get(instance.instanceId)?.state).toBe("terminated");
      expect(fake.tags.has("sg-bob")).toBe(true);
      expect(fake.tags.has("sg-alice-other")).toBe(true);
    });

    it("clears leftovers of the same scope before building", async () => {
      fake.seed("security-group", "sg-leftover", ownerTags("alice", "net-bench"));

      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());

      expect(fake.tags.has("sg-leftover")).toBe(false);
      expect(await discoverAll(SCOPE)).toMatchObject({ "security-group": [fleet.securityGroupId] });
    });

    it("reclaims every app of the principal without building a fleet", async () => {
      const fleet = await Ec2Fleet.build({ cleanup: SCOPE }, options());
      await fleet.provision({ instanceType: "t3.micro" });

      await reclaimScope({ kind: "all" }, options());

      expect(fake.tags.has("sg-alice-other")).toBe(false);
      expect(fake.tags.has("sg-bob")).toBe(true);
      expect(fake.keyPairs.size).toBe(0);
      expect(fake.placementGroups.size).toBe(0);
    });
  });
});
