import type { Tag, TagSpecification } from "@aws-sdk/client-ec2";
import type { CleanupScope } from "@scratchfleet/core";
import type { OwnedResourceKind, TaggedResourceType } from "../../types";

/**
 * Derives ownership tags for everything this process creates, and recovers
 * what a principal (optionally narrowed by app tag) owns from the tag index.
 */
export interface IOwnershipLedger {
  readonly principal: string;

  /** Deterministic tag set: Name, owner, and the app tag when the scope has one */
  tagsFor(kind: TaggedResourceType, purpose: string): Tag[];

  /** `tagsFor` wrapped for a create call's `TagSpecifications` */
  tagSpecification(kind: TaggedResourceType, purpose: string): TagSpecification;

  /**
   * Ids of resources of `kind` owned by the principal within `scope`.
   * An empty list means nothing is owned, not an error.
   */
  discover(scope: CleanupScope, kind: OwnedResourceKind): Promise<string[]>;
}
