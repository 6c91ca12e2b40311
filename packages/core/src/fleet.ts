import { z } from "zod";
import { SUPPORTED_OS } from "./constants/defaults";

// Ownership scope: what cleanup reclaims and what a fresh fleet clears first
export const CleanupScopeSchema = z.discriminatedUnion("kind", [
  // Every resource tagged with the caller's principal
  z.object({ kind: z.literal("all") }),
  // Only resources tagged with the principal AND this application label
  z.object({
    kind: z.literal("app"),
    appTag: z.string()
      .min(1, "App tag must not be empty")
      .max(256, "App tag must be 256 characters or less"),
  }),
]);
export type CleanupScope = z.infer<typeof CleanupScopeSchema>;

const ResourceIdSchema = (prefix: string) =>
  z.string().regex(new RegExp(`^${prefix}-[0-9a-f]+$`), `Must look like ${prefix}-<hex>`);

export const FleetConfigSchema = z.object({
  cleanup: CleanupScopeSchema,
  // true: connect to public addresses (elastic IPs for multi-NIC instances)
  // false: connect to private addresses, caller must be inside the VPC
  usePublicAddresses: z.boolean().default(true),
  vpcId: ResourceIdSchema("vpc").optional(),
  subnetId: ResourceIdSchema("subnet").optional(),
  securityGroupId: ResourceIdSchema("sg").optional(),
  // Wait for a public IP whenever the subnet maps one on launch (single interface), even if we connect privately
  awaitAutoAssignedPublicIp: z.boolean().default(true),
  // Give up waiting for sshd after this long; unset waits as long as the instance takes to boot
  sshReachabilityTimeoutMs: z.number().int().positive().optional(),
});
export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type FleetConfigInput = z.input<typeof FleetConfigSchema>;

export const InstanceOs = z.enum(SUPPORTED_OS);
export type InstanceOs = z.infer<typeof InstanceOs>;

export const InstanceDefinitionSchema = z.object({
  instanceType: z.string()
    .regex(/^[a-z][a-z0-9-]*\.[a-z0-9]+$/, "Must be an instance type such as t3.micro"),
  volumeSizeGb: z.number().int().min(1).max(16_384).default(8),
  // More than one interface forbids auto-assigned public IPs, an elastic IP is used instead
  networkInterfaceCount: z.number().int().min(1).max(15).default(1),
  os: InstanceOs.default("ubuntu-22.04"),
  // Explicit image reference; when absent it is resolved from os + architecture
  ami: z.string().min(1).optional(),
});
export type InstanceDefinition = z.infer<typeof InstanceDefinitionSchema>;
export type InstanceDefinitionInput = z.input<typeof InstanceDefinitionSchema>;

export class ConfigValidationError extends Error {
  constructor(
    readonly subject: string,
    readonly issues: string[],
  ) {
    super(`Invalid ${subject}: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export function validateFleetConfig(data: unknown): FleetConfig {
  const result = FleetConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError("fleet config", formatIssues(result.error));
  }
  return result.data;
}

export function validateInstanceDefinition(data: unknown): InstanceDefinition {
  const result = InstanceDefinitionSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError("instance definition", formatIssues(result.error));
  }
  return result.data;
}
