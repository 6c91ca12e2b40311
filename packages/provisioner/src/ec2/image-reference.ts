import type { InstanceOs } from "@scratchfleet/core";

export type CpuArchitecture = "amd64" | "arm64";

/**
 * Graviton families: `a1`, and any family whose generation digit is followed
 * by `g` (t4g, c7gn, x2gd, im4gn, is4gen, hpc7g).
 */
const GRAVITON_FAMILY = /^(a1|[a-z]+\d+g[a-z]*)$/;

export function cpuArchitecture(instanceType: string): CpuArchitecture {
  const family = instanceType.split(".")[0] ?? "";
  return GRAVITON_FAMILY.test(family) ? "arm64" : "amd64";
}

/**
 * SSM public parameter path that resolves to the current Canonical image,
 * passed to RunInstances as `resolve:ssm:<path>`.
 */
export function resolveImageReference(os: InstanceOs, instanceType: string): string {
  const version = os.replace(/^ubuntu-/, "");
  const arch = cpuArchitecture(instanceType);
  return `resolve:ssm:/aws/service/canonical/ubuntu/server/${version}/stable/current/${arch}/hvm/ebs-gp2/ami-id`;
}
