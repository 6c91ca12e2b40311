import { writeFile } from "fs/promises";
import * as path from "path";
import { SSH_LOGIN_USER } from "@scratchfleet/core";
import { knownHostsLine } from "../base/host-key-bootstrap";
import type { PollClock } from "../base/poll";
import type { CommandRunner } from "../remote/command-runner";
import { SshSession, ensureTrailingNewline } from "../remote/ssh-session";
import type { LogCallback, NetworkInterfaceAddress } from "./types";

export interface Ec2InstanceInit {
  instanceId: string;
  /** Address commands are run against: public or private per fleet config */
  connectIp: string;
  publicIp?: string;
  privateIp: string;
  networkInterfaces: NetworkInterfaceAddress[];
  clientPrivateKey: string;
  hostPublicKeyText: string;
  runner?: CommandRunner;
  clock?: PollClock;
  log?: LogCallback;
}

/**
 * Handle to one provisioned, reachable machine.
 */
export class Ec2Instance {
  readonly instanceId: string;
  readonly connectIp: string;
  readonly publicIp?: string;
  readonly privateIp: string;
  /** Sorted by device index */
  readonly networkInterfaces: readonly NetworkInterfaceAddress[];

  constructor(private readonly init: Ec2InstanceInit) {
    this.instanceId = init.instanceId;
    this.connectIp = init.connectIp;
    this.publicIp = init.publicIp;
    this.privateIp = init.privateIp;
    this.networkInterfaces = [...init.networkInterfaces].sort((a, b) => a.deviceIndex - b.deviceIndex);
  }

  get knownHostsLine(): string {
    return knownHostsLine(this.connectIp, this.init.hostPublicKeyText);
  }

  ssh(): SshSession {
    return new SshSession({
      address: this.connectIp,
      clientPrivateKey: this.init.clientPrivateKey,
      knownHostsLine: this.knownHostsLine,
      runner: this.init.runner,
      clock: this.init.clock,
      log: this.init.log,
    });
  }

  /**
   * Write the client key and pinned known_hosts file into `dir` and return
   * the ssh command line that uses them.
   */
  async sshInstructions(dir: string): Promise<string> {
    const keyPath = path.join(dir, "key");
    const knownHostsPath = path.join(dir, "known_hosts");
    await writeFile(keyPath, ensureTrailingNewline(this.init.clientPrivateKey), { mode: 0o600 });
    await writeFile(knownHostsPath, this.knownHostsLine, { mode: 0o644 });

    return `ssh -i ${keyPath} ${SSH_LOGIN_USER}@${this.connectIp} -o "UserKnownHostsFile ${knownHostsPath}"`;
  }
}
