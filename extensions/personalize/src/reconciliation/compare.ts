/**
 * Desired vs described comparison and status evaluation
 */

import { getKindSpec, type ResourceKind } from "../resource/kinds.js";
import { solutionArnOf } from "../resource/arn.js";
import type { RemoteResource } from "../personalize/provider.js";
import { failed, invalid, needsUpdate, pending, terminal, type Outcome } from "./outcome.js";
import { STATUS_ACTIVE } from "./staleness.js";

export const STATUS_IN_PROGRESS: readonly string[] = [
  "CREATE PENDING",
  "CREATE IN_PROGRESS",
  "DELETE PENDING",
  "DELETE IN_PROGRESS",
];
export const STATUS_FAILED = "CREATE FAILED";

const OUT_OF_BAND_HINT =
  "This can happen if a user modifies a resource out-of-band, or if a resource of the same name " +
  "and a different configuration is used across dataset groups";

// =============================================================================
// Value Comparison
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Whether `actual` satisfies `desired`. Objects match when every desired key
 * matches, so fields the service adds on describe are ignored.
 */
export function matchesDesired(desired: unknown, actual: unknown): boolean {
  if (desired instanceof Date || actual instanceof Date) {
    const a = desired instanceof Date ? desired.getTime() : desired;
    const b = actual instanceof Date ? actual.getTime() : actual;
    return a === b;
  }
  if (Array.isArray(desired)) {
    return (
      Array.isArray(actual) &&
      actual.length === desired.length &&
      desired.every((item, index) => matchesDesired(item, actual[index]))
    );
  }
  if (isRecord(desired)) {
    if (!isRecord(actual)) return false;
    return Object.entries(desired).every(([key, value]) => matchesDesired(value, actual[key]));
  }
  return desired === actual;
}

function parseJsonField(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

function render(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value);
}

export function getPath(resource: RemoteResource, path: string): unknown {
  let current: unknown = resource;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

// =============================================================================
// Mismatches
// =============================================================================

/**
 * Fields whose described value differs from the desired one, as
 * `expected X to be Y but got Z` messages. Updatable fields are left to
 * `checkUpdatableFields`; the rest are read with the newest update overlaid.
 */
export function findMismatches(
  kind: ResourceKind,
  desired: Record<string, unknown>,
  actual: RemoteResource,
): string[] {
  const spec = getKindSpec(kind);
  const skipped = new Set([...spec.workflowFields, ...spec.uncomparedFields, ...spec.updatableFields]);
  const current = withLatestUpdate(kind, actual);
  const mismatches: string[] = [];

  for (const [key, rawExpected] of Object.entries(desired)) {
    if (skipped.has(key) || rawExpected === undefined) continue;

    let expected: unknown = rawExpected;
    let received = current[key];
    if (spec.jsonFields.includes(key)) {
      expected = parseJsonField(expected);
      received = parseJsonField(received);
    }
    if (spec.caseInsensitiveFields.includes(key) && typeof expected === "string" && typeof received === "string") {
      expected = expected.toLowerCase();
      received = received.toLowerCase();
    }

    if (!matchesDesired(expected, received)) {
      mismatches.push(`expected ${key} to be ${render(expected)} but got ${render(received)}`);
    }
  }
  return mismatches;
}

export function mismatchReason(mismatches: string[]): string {
  return `${mismatches.join(". ")}. ${OUT_OF_BAND_HINT}`;
}

/**
 * The described resource with its newest update's values overlaid, so an update
 * in flight is compared against what it will become.
 */
export function withLatestUpdate(kind: ResourceKind, resource: RemoteResource): RemoteResource {
  const field = getKindSpec(kind).latestUpdateField;
  const update = field ? resource[field] : undefined;
  return isRecord(update) ? { ...resource, ...update } : resource;
}

/**
 * Decide whether an updatable resource must be updated.
 *
 * A campaign pointing at a version of another solution has been changed
 * out-of-band and fails instead of being updated.
 */
export function checkUpdatableFields(
  kind: ResourceKind,
  desired: Record<string, unknown>,
  actual: RemoteResource,
): Outcome | undefined {
  const spec = getKindSpec(kind);
  const current = withLatestUpdate(kind, actual);
  const changed: string[] = [];

  for (const field of spec.updatableFields) {
    const expected = desired[field];
    if (expected === undefined) continue;
    const received = current[field];

    if (field === "solutionVersionArn" && typeof expected === "string" && typeof received === "string") {
      const expectedSolution = solutionArnOf(expected);
      const receivedSolution = solutionArnOf(received);
      if (expectedSolution !== receivedSolution) {
        return failed(`Expected solution ARN ${expectedSolution} but got ${receivedSolution}. ${OUT_OF_BAND_HINT}`);
      }
    }

    if (!matchesDesired(expected, received)) changed.push(field);
  }

  return changed.length > 0 ? needsUpdate(changed) : undefined;
}

// =============================================================================
// Status
// =============================================================================

/**
 * The first status found along the kind's status paths.
 */
export function readStatus(kind: ResourceKind, resource: RemoteResource): string | undefined {
  for (const path of getKindSpec(kind).statusPaths) {
    const status = getPath(resource, path);
    if (typeof status === "string" && status !== "") return status;
  }
  return undefined;
}

export function evaluateStatus(kind: ResourceKind, resource: RemoteResource): Outcome {
  if (getKindSpec(kind).statusPaths.length === 0) {
    return terminal(resource);
  }

  const status = readStatus(kind, resource);
  if (status === STATUS_ACTIVE) return terminal(resource);
  if (status !== undefined && STATUS_IN_PROGRESS.includes(status)) return pending(`${kind} is ${status}`);
  if (status === STATUS_FAILED) {
    const reason = resource.failureReason;
    return failed(typeof reason === "string" ? `${kind} ${status}: ${reason}` : `${kind} ${status}`);
  }
  return invalid(`${kind} has unrecognized status ${status ?? "invalid"}`);
}
