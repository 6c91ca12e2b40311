import {
  DEFAULT_CLI_APP_TAG,
  InstanceOs,
  SUPPORTED_OS,
  type CleanupScope,
  type FleetConfigInput,
  type InstanceDefinitionInput,
} from "@scratchfleet/core";

export interface CreateOptions {
  instanceType: string;
  volumeSize?: string;
  interfaces?: string;
  os?: string;
  ami?: string;
  private?: boolean;
  appTag?: string;
  vpcId?: string;
  subnetId?: string;
  securityGroupId?: string;
  sshDir: string;
}

export interface CleanupOptions {
  appTag?: string;
  all?: boolean;
}

/**
 * Commander hands every value over as a string; numbers are converted here and
 * range-checked by the core schemas.
 */
function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function toOs(value: string | undefined): InstanceOs | undefined {
  if (value === undefined) return undefined;
  const parsed = InstanceOs.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unsupported OS "${value}", expected one of ${SUPPORTED_OS.join(", ")}`);
  }
  return parsed.data;
}

export function definitionFromOptions(options: CreateOptions): InstanceDefinitionInput {
  return {
    instanceType: options.instanceType,
    volumeSizeGb: toNumber(options.volumeSize),
    networkInterfaceCount: toNumber(options.interfaces),
    os: toOs(options.os),
    ami: options.ami,
  };
}

export function fleetConfigFromOptions(options: CreateOptions): FleetConfigInput {
  return {
    cleanup: { kind: "app", appTag: options.appTag ?? DEFAULT_CLI_APP_TAG },
    usePublicAddresses: options.private !== true,
    vpcId: options.vpcId,
    subnetId: options.subnetId,
    securityGroupId: options.securityGroupId,
  };
}

export function scopeFromOptions(options: CleanupOptions): CleanupScope {
  if (options.all && options.appTag !== undefined) {
    throw new Error("Use either --app-tag or --all, not both");
  }
  if (options.all) return { kind: "all" };
  return { kind: "app", appTag: options.appTag ?? DEFAULT_CLI_APP_TAG };
}
