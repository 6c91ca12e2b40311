import chalk from "chalk";
import ora from "ora";
import { STSService } from "@scratchfleet/adapters-aws";
import { describeScope, reclaimScope } from "@scratchfleet/provisioner";
import { AWS_REGION } from "@scratchfleet/core";
import { scopeFromOptions, type CleanupOptions } from "../options";
import { spinnerLog } from "../spinner-log";

export async function cleanup(options: CleanupOptions): Promise<void> {
  const scope = scopeFromOptions(options);
  const principal = await new STSService({ region: AWS_REGION }).getPrincipalName();

  const spinner = ora(`Reclaiming resources owned by ${describeScope(principal, scope)}...`).start();

  try {
    const reclaimed = await reclaimScope(scope, { principal, log: spinnerLog(spinner) });
    spinner.succeed(`Reclaimed ${reclaimed.length} resource(s)`);

    for (const record of reclaimed) {
      console.log(chalk.gray(`  ${record.kind.padEnd(16)} ${record.id}`));
    }
  } catch (error) {
    spinner.fail("Cleanup did not complete");
    throw error;
  }
}
