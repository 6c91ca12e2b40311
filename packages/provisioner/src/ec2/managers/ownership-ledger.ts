/**
 * Ownership Ledger: tags every resource with its owner and recovers owned
 * resources from the EC2 tag index. There is no other record of what exists:
 * a crashed process's resources are found the same way as our own.
 */

import {
  type EC2Client,
  type Filter,
  type Tag,
  type TagSpecification,
  DescribeTagsCommand,
} from "@aws-sdk/client-ec2";
import { type CleanupScope, RESOURCE_TAGS } from "@scratchfleet/core";
import type { IOwnershipLedger } from "./interfaces";
import type { OwnedResourceKind, OwnershipContext, TaggedResourceType } from "../types";

/**
 * Ids present in both sets, in `principalIds` order, without duplicates.
 * With no label set, the principal set alone.
 */
export function intersectOwned(principalIds: string[], labelIds?: string[]): string[] {
  const unique = [...new Set(principalIds)];
  if (labelIds === undefined) return unique;

  const labelled = new Set(labelIds);
  return unique.filter((id) => labelled.has(id));
}

export class OwnershipLedger implements IOwnershipLedger {
  constructor(
    private readonly ec2: EC2Client,
    private readonly context: OwnershipContext,
  ) {}

  get principal(): string {
    return this.context.principal;
  }

  tagsFor(_kind: TaggedResourceType, purpose: string): Tag[] {
    const tags: Tag[] = [
      { Key: RESOURCE_TAGS.NAME, Value: purpose },
      { Key: RESOURCE_TAGS.OWNER, Value: this.context.principal },
    ];
    if (this.context.scope.kind === "app") {
      tags.push({ Key: RESOURCE_TAGS.APP, Value: this.context.scope.appTag });
    }
    return tags;
  }

  tagSpecification(kind: TaggedResourceType, purpose: string): TagSpecification {
    return { ResourceType: kind, Tags: this.tagsFor(kind, purpose) };
  }

  async discover(scope: CleanupScope, kind: OwnedResourceKind): Promise<string[]> {
    // The label query alone could match another principal's resources
    const [principalIds, labelIds] = await Promise.all([
      this.taggedIds(kind, RESOURCE_TAGS.OWNER, this.context.principal),
      scope.kind === "app"
        ? this.taggedIds(kind, RESOURCE_TAGS.APP, scope.appTag)
        : Promise.resolve(undefined),
    ]);
    return intersectOwned(principalIds, labelIds);
  }

  private async taggedIds(kind: OwnedResourceKind, key: string, value: string): Promise<string[]> {
    const filters: Filter[] = [
      { Name: "key", Values: [key] },
      { Name: "value", Values: [value] },
      { Name: "resource-type", Values: [kind] },
    ];

    const ids: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.ec2.send(
        new DescribeTagsCommand({ Filters: filters, NextToken: nextToken }),
      );
      for (const tag of page.Tags ?? []) {
        if (tag.ResourceId) ids.push(tag.ResourceId);
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return ids;
  }
}
