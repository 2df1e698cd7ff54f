/**
 * Resource state change notifications
 *
 * A reconciliation result is either a creation (the create/update response
 * carrying `<kind>Arn` at the top level) or a description (`{ [kind]: resource }`).
 * Descriptions are only announced once the resource has stabilized after the
 * workflow's start time.
 */

import { arnKey, getKindSpec, type ResourceKind } from "../resource/kinds.js";
import { toDate } from "../reconciliation/staleness.js";

export type NotificationResult = Record<string, unknown>;

/**
 * Payload delivered to every notifier.
 */
export type ResourceStateChange = {
  kind: ResourceKind;
  status: string;
  arn: string;
  durationSeconds?: number;
};

export interface Notifier {
  readonly name: string;
  notifyCreate(change: ResourceStateChange): Promise<void>;
  notifyComplete(change: ResourceStateChange): Promise<void>;
}

/**
 * Thrown by a notifier whose sink rejected a notification.
 */
export class NotificationError extends Error {
  constructor(
    readonly notifier: string,
    message: string,
  ) {
    super(message);
    this.name = "NotificationError";
  }
}

// =============================================================================
// Transition Classification
// =============================================================================

export type Transition =
  | { type: "create"; arn: string }
  | { type: "complete"; arn: string; durationSeconds: number }
  | { type: "none"; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

export function isCreate(kind: ResourceKind, result: NotificationResult): boolean {
  return arnKey(kind) in result;
}

/**
 * The ARN at the top level of a create response, or inside the described resource.
 */
export function resultArn(kind: ResourceKind, result: NotificationResult): string | undefined {
  const key = arnKey(kind);
  const value = result[key] ?? asRecord(result[kind])?.[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Timestamps prefer the newest update (e.g. `latestCampaignUpdate`) over the resource's own.
 */
function resourceTime(
  kind: ResourceKind,
  resource: Record<string, unknown>,
  field: "creationDateTime" | "lastUpdatedDateTime",
): Date | undefined {
  const updateField = getKindSpec(kind).latestUpdateField;
  const update = updateField ? asRecord(resource[updateField]) : undefined;
  return toDate(update?.[field]) ?? toDate(resource[field]);
}

export function classifyTransition(kind: ResourceKind, result: NotificationResult, cutoff?: Date): Transition {
  const arn = resultArn(kind, result);

  if (isCreate(kind, result)) {
    return arn ? { type: "create", arn } : { type: "none", reason: `${kind} create response has no ARN` };
  }

  const resource = asRecord(result[kind]);
  if (!resource || !arn) {
    return { type: "none", reason: `${kind} is not described` };
  }

  const created = resourceTime(kind, resource, "creationDateTime");
  const lastUpdated = resourceTime(kind, resource, "lastUpdatedDateTime");
  if (!created || !lastUpdated) {
    return { type: "none", reason: `${kind} is not ready for notification (missing lastUpdated or creation DateTime)` };
  }
  if (resource.status !== "ACTIVE") {
    return { type: "none", reason: `${kind} is not yet ACTIVE` };
  }

  const updateField = getKindSpec(kind).latestUpdateField;
  const update = updateField ? asRecord(resource[updateField]) : undefined;
  if (update && update.status !== undefined && update.status !== "ACTIVE") {
    return { type: "none", reason: `${kind} is updating, and not yet active` };
  }
  if (!cutoff) {
    return { type: "none", reason: `${kind} has no cutoff specified for notification` };
  }
  if (lastUpdated.getTime() <= cutoff.getTime()) {
    return { type: "none", reason: `${kind} does not require notification at this time` };
  }

  return {
    type: "complete",
    arn,
    durationSeconds: Math.trunc((lastUpdated.getTime() - created.getTime()) / 1000),
  };
}
