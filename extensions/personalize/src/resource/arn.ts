/**
 * Amazon Personalize ARN construction.
 */

import { getKindSpec, type ResourceKind } from "./kinds.js";

export type AWSContext = {
  partition: string;
  region: string;
  accountId: string;
};

export function arnPrefix(ctx: AWSContext): string {
  return `arn:${ctx.partition}:personalize:${ctx.region}:${ctx.accountId}`;
}

/**
 * Build the ARN of a named resource. Solution versions live under their
 * solution: `arn:...:solution/{name}/{versionId}`.
 */
export function buildResourceArn(
  kind: ResourceKind,
  name: string,
  ctx: AWSContext,
  options?: { solutionVersionId?: string },
): string {
  if (kind === "solutionVersion") {
    return `${arnPrefix(ctx)}:solution/${name}/${options?.solutionVersionId ?? "unknown"}`;
  }
  return `${arnPrefix(ctx)}:${getKindSpec(kind).name.dash}/${name}`;
}

/**
 * The solution ARN a solution version belongs to.
 */
export function solutionArnOf(solutionVersionArn: string): string {
  const idx = solutionVersionArn.lastIndexOf("/");
  return idx === -1 ? solutionVersionArn : solutionVersionArn.slice(0, idx);
}

/**
 * Accepts either a dataset group name or its ARN.
 */
export function datasetGroupArnOf(nameOrArn: string, ctx: AWSContext): string {
  return nameOrArn.startsWith("arn:") ? nameOrArn : buildResourceArn("datasetGroup", nameOrArn, ctx);
}

export type ParsedResourceArn = {
  partition: string;
  region: string;
  accountId: string;
  resourceType: string;
  resourceName: string;
};

export function parseResourceArn(arn: string): ParsedResourceArn | undefined {
  const match = /^arn:([^:]+):personalize:([^:]*):([^:]*):([a-z-]+)\/(.+)$/.exec(arn);
  if (!match) return undefined;
  const [, partition, region, accountId, resourceType, resourceName] = match;
  return { partition, region, accountId, resourceType, resourceName };
}
