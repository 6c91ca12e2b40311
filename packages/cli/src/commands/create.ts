import chalk from "chalk";
import ora from "ora";
import fs from "fs-extra";
import path from "path";
import { DEFAULT_CLI_APP_TAG } from "@scratchfleet/core";
import { Ec2Fleet } from "@scratchfleet/provisioner";
import { definitionFromOptions, fleetConfigFromOptions, type CreateOptions } from "../options";
import { spinnerLog } from "../spinner-log";

export async function create(options: CreateOptions): Promise<void> {
  console.log(chalk.blue.bold("Creating a scratch instance\n"));

  const spinner = ora("Preparing fleet...").start();
  const log = spinnerLog(spinner);

  try {
    const fleet = await Ec2Fleet.build(fleetConfigFromOptions(options), { log });
    spinner.text = `Launching ${options.instanceType}...`;

    const instance = await fleet.provision(definitionFromOptions(options));
    spinner.succeed(`Instance ${instance.instanceId} reachable at ${instance.connectIp}`);

    const release = await instance.ssh().shellChecked("lsb_release -a");
    console.log();
    console.log(release.stdout.trimEnd());
    console.log();

    const sshDir = path.resolve(options.sshDir);
    await fs.ensureDir(sshDir);
    const instructions = await instance.sshInstructions(sshDir);

    console.log(chalk.white("Connect with:"));
    console.log(chalk.cyan(`  ${instructions}`));
    console.log();
    console.log(chalk.gray(
      `Reclaim with: scratchfleet cleanup --app-tag ${options.appTag ?? DEFAULT_CLI_APP_TAG}`,
    ));
  } catch (error) {
    if (spinner.isSpinning) spinner.fail("Instance creation failed");
    throw error;
  }
}
