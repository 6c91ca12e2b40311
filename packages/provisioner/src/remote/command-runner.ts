import { execFile } from "child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a local executable. Resolves with its exit status whenever it ran;
 * rejects only when it could not be started or was killed by a signal.
 */
export type CommandRunner = (cmd: string, args: string[]) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Executes a command using child_process.execFile and captures its output.
 */
export const execFileRunner: CommandRunner = (cmd, args) =>
  new Promise((resolve, reject) => {
    execFile(cmd, args, { maxBuffer: MAX_OUTPUT_BYTES }, (error, stdout, stderr) => {
      const code = error?.code;
      if (error && typeof code !== "number") {
        reject(new Error(`Command failed to run: ${cmd}: ${error.message}`));
        return;
      }
      resolve({ stdout, stderr, exitCode: typeof code === "number" ? code : 0 });
    });
  });
