export type { IOwnershipLedger } from "./ownership-ledger.interface";
export type { IAwsNetworkManager } from "./aws-network-manager.interface";
export type { IAwsComputeManager } from "./aws-compute-manager.interface";
