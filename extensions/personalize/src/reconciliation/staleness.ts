/**
 * Staleness of parent-listed candidates
 *
 * A listed import job, solution version or batch job is reused when it is
 * current: it carries the requested name, or it is active or creating and has
 * not outlived its staleness window (unless no newer data could replace it).
 */

import type { RemoteResource } from "../personalize/provider.js";
import type { WorkflowLogger } from "../logging/index.js";

// =============================================================================
// Freshness
// =============================================================================

/**
 * Whether newer source data exists than a candidate was built from.
 *
 * - `comparator`: ask the data source.
 * - `assume-new-data`: a stale candidate is always replaced.
 * - `assume-no-new-data`: a stale candidate is always kept.
 */
export type FreshnessPolicy =
  | { kind: "comparator"; newDataSince(date: Date): Promise<boolean> }
  | { kind: "assume-new-data" }
  | { kind: "assume-no-new-data" };

export const DEFAULT_FRESHNESS_POLICY: FreshnessPolicy = { kind: "assume-new-data" };

async function newDataAvailable(policy: FreshnessPolicy, since: Date): Promise<boolean> {
  switch (policy.kind) {
    case "comparator":
      return policy.newDataSince(since);
    case "assume-new-data":
      return true;
    case "assume-no-new-data":
      return false;
  }
}

// =============================================================================
// Dates
// =============================================================================

/**
 * Dates arrive as `Date` from the SDK and as ISO strings from serialized state.
 */
export function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

// =============================================================================
// Predicate
// =============================================================================

export const STATUS_ACTIVE = "ACTIVE";
export const STATUS_CREATING: readonly string[] = [STATUS_ACTIVE, "CREATE PENDING", "CREATE IN_PROGRESS"];

export type CurrencyCheck = {
  /** Candidate field that identifies the requested resource, e.g. `jobName` */
  nameKey: string;
  desiredName: unknown;
  maxAgeSeconds?: number;
  freshness: FreshnessPolicy;
  now: Date;
  logger?: WorkflowLogger;
};

export async function isCurrent(candidate: RemoteResource, check: CurrencyCheck): Promise<boolean> {
  const candidateName = candidate[check.nameKey];
  const label = typeof candidateName === "string" ? candidateName : "candidate";

  if (candidateName !== undefined && candidateName === check.desiredName) {
    check.logger?.debug(`${label} may be current`);
    return true;
  }

  const status = candidate.status;
  if (typeof status !== "string" || !STATUS_CREATING.includes(status)) {
    check.logger?.debug(`${label} has status ${String(status)} which is not active or creating`);
    return false;
  }

  if (!check.maxAgeSeconds) return true;
  if (status !== STATUS_ACTIVE) {
    check.logger?.debug(`${label} remains current as it is ${status}`);
    return true;
  }

  const lastUpdated = toDate(candidate.lastUpdatedDateTime);
  if (!lastUpdated) return true;

  const ageSeconds = (check.now.getTime() - lastUpdated.getTime()) / 1000;
  if (ageSeconds <= check.maxAgeSeconds) {
    check.logger?.debug(`${label} remains current (${Math.floor(check.maxAgeSeconds - ageSeconds)}s remaining)`);
    return true;
  }

  if (await newDataAvailable(check.freshness, lastUpdated)) {
    check.logger?.debug(`${label} is not current`);
    return false;
  }
  check.logger?.info(`${label} is not current, but no new data is available`);
  return true;
}
