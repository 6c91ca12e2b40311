/**
 * Remote Execution Facade
 *
 * Shell, scp and rsync against one machine, always authenticated with the
 * pinned host key. Every call writes the client key and a known_hosts file
 * holding only the pinned line into a fresh temporary directory that is
 * removed when the call ends.
 */

import { writeFile } from "fs/promises";
import * as path from "path";
import { withDir } from "tmp-promise";
import {
  SSH_CONNECT_TIMEOUT_SECONDS,
  SSH_LOGIN_USER,
  SSH_REACHABILITY_INTERVAL_MS,
} from "@scratchfleet/core";
import { type PollClock, pollUntil } from "../base/poll";
import { type CommandResult, type CommandRunner, execFileRunner } from "./command-runner";
import type { LogCallback } from "../ec2/types";

export class RemoteCommandError extends Error {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;

  constructor(
    readonly description: string,
    result: CommandResult,
  ) {
    const detail = result.stderr.trim();
    super(`${description} exited with status ${result.exitCode}${detail ? `: ${detail}` : ""}`);
    this.name = "RemoteCommandError";
    this.stdout = result.stdout;
    this.stderr = result.stderr;
    this.exitCode = result.exitCode;
  }
}

export interface SshSessionOptions {
  address: string;
  /** OpenSSH private key of the client credential */
  clientPrivateKey: string;
  /** Pinned known_hosts line for `address` */
  knownHostsLine: string;
  user?: string;
  runner?: CommandRunner;
  log?: LogCallback;
  clock?: PollClock;
}

interface CallCredentials {
  keyPath: string;
  knownHostsPath: string;
}

const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

function shellQuote(word: string): string {
  return SAFE_SHELL_WORD.test(word) ? word : `'${word.replace(/'/g, `'\\''`)}'`;
}

export class SshSession {
  readonly address: string;
  readonly user: string;
  private readonly runner: CommandRunner;

  constructor(private readonly options: SshSessionOptions) {
    this.address = options.address;
    this.user = options.user ?? SSH_LOGIN_USER;
    this.runner = options.runner ?? execFileRunner;
  }

  get target(): string {
    return `${this.user}@${this.address}`;
  }

  // ── Shell ────────────────────────────────────────────────────────────

  /** Run `command` remotely; a non-zero exit is returned, not thrown */
  async shell(command: string): Promise<CommandResult> {
    return this.withCredentials((creds) =>
      this.runner("ssh", [...this.sshOptions(creds), this.target, command]),
    );
  }

  async shellChecked(command: string): Promise<CommandResult> {
    const result = await this.shell(command);
    return this.check(`ssh ${this.target} ${command}`, result);
  }

  // ── File transfer ────────────────────────────────────────────────────

  async pushFile(localPath: string, remotePath: string): Promise<void> {
    await this.scp(localPath, `${this.target}:${remotePath}`);
  }

  async pullFile(remotePath: string, localPath: string): Promise<void> {
    await this.scp(`${this.target}:${remotePath}`, localPath);
  }

  /** Mirror a local directory tree onto the machine, deleting extra remote files */
  async pushRsync(localDir: string, remoteDir: string): Promise<void> {
    await this.rsync(localDir, `${this.target}:${remoteDir}`);
  }

  async pullRsync(remoteDir: string, localDir: string): Promise<void> {
    await this.rsync(`${this.target}:${remoteDir}`, localDir);
  }

  // ── Reachability ─────────────────────────────────────────────────────

  /**
   * Wait until sshd accepts the pinned key and runs a trivial command.
   * Unbounded unless `deadlineMs` is given; a host key mismatch keeps failing.
   */
  async waitUntilReachable(
    intervalMs = SSH_REACHABILITY_INTERVAL_MS,
    deadlineMs?: number,
  ): Promise<void> {
    await pollUntil(
      async () => ((await this.shell("true")).exitCode === 0 ? true : undefined),
      {
        description: `SSH on ${this.address}`,
        intervalMs,
        deadlineMs,
        clock: this.options.clock,
      },
    );
    this.options.log?.(`SSH reachable: ${this.target}`, "stdout");
  }

  // ── Internals ────────────────────────────────────────────────────────

  private async scp(source: string, destination: string): Promise<void> {
    await this.withCredentials(async (creds) => {
      const result = await this.runner("scp", [...this.sshOptions(creds), "-q", source, destination]);
      this.check(`scp ${source} ${destination}`, result);
    });
  }

  private async rsync(source: string, destination: string): Promise<void> {
    await this.withCredentials(async (creds) => {
      const remoteShell = ["ssh", ...this.sshOptions(creds)].map(shellQuote).join(" ");
      const result = await this.runner("rsync", ["--delete", "-ra", "-e", remoteShell, source, destination]);
      this.check(`rsync ${source} ${destination}`, result);
    });
  }

  private check(description: string, result: CommandResult): CommandResult {
    if (result.exitCode !== 0) throw new RemoteCommandError(description, result);
    return result;
  }

  private sshOptions(creds: CallCredentials): string[] {
    return [
      "-i", creds.keyPath,
      "-o", `UserKnownHostsFile=${creds.knownHostsPath}`,
      "-o", "StrictHostKeyChecking=yes",
      "-o", "IdentitiesOnly=yes",
      "-o", "BatchMode=yes",
      "-o", `ConnectTimeout=${SSH_CONNECT_TIMEOUT_SECONDS}`,
    ];
  }

  private async withCredentials<T>(fn: (creds: CallCredentials) => Promise<T>): Promise<T> {
    return withDir(
      async ({ path: dir }) => {
        const creds = {
          keyPath: path.join(dir, "key"),
          knownHostsPath: path.join(dir, "known_hosts"),
        };
        await writeFile(creds.keyPath, ensureTrailingNewline(this.options.clientPrivateKey), { mode: 0o400 });
        await writeFile(creds.knownHostsPath, ensureTrailingNewline(this.options.knownHostsLine), { mode: 0o600 });
        return fn(creds);
      },
      { prefix: "scratchfleet-", unsafeCleanup: true },
    );
  }
}

/** OpenSSH refuses private keys without a final newline */
export function ensureTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}
