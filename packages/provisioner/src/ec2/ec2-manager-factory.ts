/**
 * Factory that wires the EC2 client into the ledger and managers.
 *
 * Single entry point: `Ec2ManagerFactory.createManagers(config)`.
 */

import { EC2Client, type EC2ClientConfig } from "@aws-sdk/client-ec2";
import { AWS_REGION } from "@scratchfleet/core";
import { OwnershipLedger } from "./managers/ownership-ledger";
import { AwsNetworkManager } from "./managers/aws-network-manager";
import { AwsComputeManager } from "./managers/aws-compute-manager";
import type { IAwsComputeManager, IAwsNetworkManager, IOwnershipLedger } from "./managers/interfaces";
import type { AwsLogCallback, OwnershipContext } from "./types";

/** All managers returned by the factory, typed to interfaces */
export interface Ec2Managers {
  ledger: IOwnershipLedger;
  networkManager: IAwsNetworkManager;
  computeManager: IAwsComputeManager;
}

export interface Ec2ManagerFactoryConfig {
  ownership: OwnershipContext;
  log: AwsLogCallback;
  /** Preconfigured client; otherwise one is created for the fixed region */
  client?: EC2Client;
  credentials?: EC2ClientConfig["credentials"];
}

export class Ec2ManagerFactory {
  static createManagers(config: Ec2ManagerFactoryConfig): Ec2Managers {
    const { ownership, log } = config;
    const ec2Client =
      config.client ?? new EC2Client({ region: AWS_REGION, credentials: config.credentials });

    const ledger = new OwnershipLedger(ec2Client, ownership);
    return {
      ledger,
      networkManager: new AwsNetworkManager(ec2Client, ledger, log),
      computeManager: new AwsComputeManager(ec2Client, ledger, log),
    };
  }
}
