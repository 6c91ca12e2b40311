#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import {
  DEFAULT_CLI_APP_TAG,
  DEFAULT_NETWORK_INTERFACE_COUNT,
  DEFAULT_VOLUME_SIZE_GB,
  SCRATCHFLEET_VERSION,
  SUPPORTED_OS,
} from "@scratchfleet/core";
import { ProviderError, errorMessage } from "@scratchfleet/provisioner";
import { create } from "./commands/create";
import { cleanup } from "./commands/cleanup";

const program = new Command();

program
  .name("scratchfleet")
  .description("Throwaway EC2 machines with pinned SSH host keys")
  .version(SCRATCHFLEET_VERSION);

program
  .command("create")
  .description("Launch one instance, print its release info and how to ssh into it")
  .requiredOption("-t, --instance-type <type>", "EC2 instance type, e.g. t3.micro")
  .option("--volume-size <gb>", "Root volume size in GB", String(DEFAULT_VOLUME_SIZE_GB))
  .option("--interfaces <count>", "Number of network interfaces", String(DEFAULT_NETWORK_INTERFACE_COUNT))
  .option("--os <os>", `Operating system (${SUPPORTED_OS.join(", ")})`)
  .option("--ami <image>", "Image ID or resolve:ssm: reference, overrides --os")
  .option("--private", "Connect over private addresses (run from inside the VPC)")
  .option("--app-tag <tag>", "Application tag scoping ownership", DEFAULT_CLI_APP_TAG)
  .option("--vpc-id <id>", "VPC for the security group")
  .option("--subnet-id <id>", "Subnet to launch into (default subnet of the zone otherwise)")
  .option("--security-group-id <id>", "Reuse an existing security group")
  .option("--ssh-dir <dir>", "Where to write the client key and known_hosts", ".scratchfleet")
  .action(create);

program
  .command("cleanup")
  .description("Reclaim every resource you own, per application tag or all of them")
  .option("--app-tag <tag>", `Application tag (default ${DEFAULT_CLI_APP_TAG})`)
  .option("--all", "Reclaim resources of every application tag")
  .action(cleanup);

program.exitOverride();

function reportError(error: unknown): void {
  console.error(chalk.red("Error:"), errorMessage(error));
  if (error instanceof ProviderError) {
    for (const suggestion of error.suggestions ?? []) {
      console.error(chalk.yellow(`  - ${suggestion}`));
    }
  }
}

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError && error.exitCode === 0) return;
  // Commander has already printed its own usage errors
  if (!(error instanceof CommanderError)) reportError(error);
  process.exit(1);
});
