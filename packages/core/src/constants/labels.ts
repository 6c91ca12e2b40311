/**
 * Ownership tags written on every resource.
 */

export const LABEL_PREFIX = "scratchfleet";

export const RESOURCE_TAGS = {
  /** Principal (IAM identity) that owns the resource */
  OWNER: `${LABEL_PREFIX}:owner`,
  /** Optional application label narrowing the ownership scope */
  APP: `${LABEL_PREFIX}:app`,
  NAME: "Name",
} as const;
