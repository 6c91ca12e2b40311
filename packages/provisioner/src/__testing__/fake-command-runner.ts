import { readFileSync, statSync } from "fs";
import type { CommandResult, CommandRunner } from "../remote/command-runner";

export interface RecordedCommand {
  cmd: string;
  args: string[];
  keyPath?: string;
  /** Credential files as they were on disk while the command ran */
  privateKey?: string;
  privateKeyMode?: number;
  knownHosts?: string;
}

type Responder = (cmd: string, args: string[]) => CommandResult | undefined;

/**
 * Records ssh/scp/rsync invocations instead of running them.
 * Responders are consulted newest first; unanswered commands succeed silently.
 */
export class FakeCommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly responders: Responder[] = [];

  respond(responder: Responder): this {
    this.responders.unshift(responder);
    return this;
  }

  readonly run: CommandRunner = async (cmd, args) => {
    const recorded: RecordedCommand = { cmd, args, ...readCredentials(args) };
    this.calls.push(recorded);

    for (const responder of this.responders) {
      const result = responder(cmd, args);
      if (result) return result;
    }
    return { stdout: "", stderr: "", exitCode: 0 };
  };
}

function readCredentials(args: string[]): Partial<RecordedCommand> {
  // rsync carries the ssh options inside its -e argument
  const words = args.flatMap((arg) => (arg.startsWith("ssh ") ? arg.split(" ") : [arg]));
  const keyPath = words[words.indexOf("-i") + 1];
  const knownHostsPath = words
    .find((word) => word.startsWith("UserKnownHostsFile="))
    ?.slice("UserKnownHostsFile=".length);
  if (!words.includes("-i") || !keyPath || !knownHostsPath) return {};

  return {
    keyPath,
    privateKey: readFileSync(keyPath, "utf8"),
    privateKeyMode: statSync(keyPath).mode & 0o777,
    knownHosts: readFileSync(knownHostsPath, "utf8"),
  };
}
