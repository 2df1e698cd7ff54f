/**
 * Resource location
 *
 * Finds the live resource a desired configuration refers to, using the
 * strategy the kind registry assigns: derive the ARN from the name, or list
 * the parent's children and describe the newest matching candidate.
 */

import { arnKey, getKindSpec, type ResourceKind } from "../resource/kinds.js";
import { buildResourceArn, type AWSContext } from "../resource/arn.js";
import { resourceArnOf, type RemoteResource, type ResourceProvider } from "../personalize/provider.js";
import { isAWSError, RESOURCE_NOT_FOUND } from "../personalize/errors.js";
import { SourceDataNotFoundError } from "../storage/s3-freshness.js";
import type { WorkflowLogger } from "../logging/index.js";
import { isCurrent, toDate, STATUS_CREATING, type FreshnessPolicy } from "./staleness.js";

/**
 * Source data an import job reads, e.g. an `S3DataSource`.
 */
export interface SourceData {
  exists(): Promise<boolean>;
  newDataSince(date: Date): Promise<boolean>;
}

export type LocatorDeps = {
  provider: ResourceProvider;
  context: AWSContext;
  now: Date;
  /** Used by `current` kinds that do not consult source data */
  freshness: FreshnessPolicy;
  dataSource: (url: string) => SourceData;
  logger?: WorkflowLogger;
};

type CandidateFilter = (candidate: RemoteResource) => Promise<boolean>;

function requireString(kind: ResourceKind, desired: Record<string, unknown>, key: string): string {
  const value = desired[key];
  if (typeof value !== "string" || value === "") {
    throw new Error(`${kind} requires ${key}`);
  }
  return value;
}

function createdAt(resource: RemoteResource): number {
  return toDate(resource.creationDateTime)?.getTime() ?? 0;
}

function dataLocationOf(desired: Record<string, unknown>): string | undefined {
  const source = desired.dataSource;
  if (typeof source !== "object" || source === null || !("dataLocation" in source)) return undefined;
  return typeof source.dataLocation === "string" ? source.dataLocation : undefined;
}

async function describeByName(
  kind: ResourceKind,
  desired: Record<string, unknown>,
  deps: LocatorDeps,
): Promise<RemoteResource | undefined> {
  const arn = buildResourceArn(kind, requireString(kind, desired, "name"), deps.context);
  try {
    return await deps.provider.describe(kind, arn);
  } catch (err) {
    if (isAWSError(err, RESOURCE_NOT_FOUND)) return undefined;
    throw err;
  }
}

async function describeFromParent(
  kind: ResourceKind,
  desired: Record<string, unknown>,
  deps: LocatorDeps,
  condition: CandidateFilter,
): Promise<RemoteResource | undefined> {
  const parent = getKindSpec(kind).parent;
  if (!parent) {
    throw new Error(`${kind} is not listed under a parent`);
  }
  const parentArn = requireString(kind, desired, arnKey(parent));

  const matching: RemoteResource[] = [];
  for (const candidate of await deps.provider.list(kind, parentArn)) {
    if (await condition(candidate)) matching.push(candidate);
  }
  matching.sort((a, b) => createdAt(b) - createdAt(a));

  const newest = matching[0];
  const arn = newest ? resourceArnOf(kind, newest) : undefined;
  if (!arn) {
    deps.logger?.debug(`could not find ${kind} for ${parent} ${parentArn}`);
    return undefined;
  }
  return deps.provider.describe(kind, arn);
}

async function freshnessFor(
  kind: ResourceKind,
  desired: Record<string, unknown>,
  deps: LocatorDeps,
  mode: "source-data" | "policy",
): Promise<FreshnessPolicy> {
  if (mode === "policy") return deps.freshness;

  const url = dataLocationOf(desired);
  if (!url) throw new Error(`${kind} requires dataSource.dataLocation`);
  const source = deps.dataSource(url);
  if (!(await source.exists())) {
    throw new SourceDataNotFoundError(url);
  }
  return { kind: "comparator", newDataSince: (date) => source.newDataSince(date) };
}

/**
 * Describe the live resource for `desired`, or `undefined` when none exists.
 */
export async function locateResource(
  kind: ResourceKind,
  desired: Record<string, unknown>,
  deps: LocatorDeps,
): Promise<RemoteResource | undefined> {
  const strategy = getKindSpec(kind).locate;

  switch (strategy.type) {
    case "by-name":
      return describeByName(kind, desired, deps);

    case "by-dataset-type": {
      const datasetType = requireString(kind, desired, "datasetType").toUpperCase();
      return describeFromParent(kind, desired, deps, async (candidate) =>
        typeof candidate.datasetType === "string" && candidate.datasetType.toUpperCase() === datasetType,
      );
    }

    case "active-or-creating":
      return describeFromParent(kind, desired, deps, async (candidate) =>
        typeof candidate.status === "string" && STATUS_CREATING.includes(candidate.status),
      );

    case "current": {
      const freshness = await freshnessFor(kind, desired, deps, strategy.freshness);
      const maxAge = desired.maxAge;
      return describeFromParent(kind, desired, deps, (candidate) =>
        isCurrent(candidate, {
          nameKey: strategy.nameKey,
          desiredName: desired[strategy.nameKey],
          maxAgeSeconds: typeof maxAge === "number" ? maxAge : undefined,
          freshness,
          now: deps.now,
          logger: deps.logger,
        }),
      );
    }
  }
}
