/**
 * Reconciliation outcomes
 *
 * One pass over a resource ends in exactly one of these. The orchestrator
 * switches on `type`: `pending` retries with backoff, `needs-update` updates
 * then retries, `solution-version-pending` saves the new ARN then retries, and
 * the rest are terminal.
 */

import type { RemoteResource } from "../personalize/provider.js";

export type Outcome =
  | { type: "terminal"; resource: RemoteResource }
  | { type: "pending"; reason: string; createdArn?: string }
  | { type: "needs-update"; fields: string[] }
  | { type: "failed"; reason: string }
  | { type: "invalid"; reason: string }
  | { type: "solution-version-pending"; solutionVersionArn: string };

export type OutcomeType = Outcome["type"];

export function terminal(resource: RemoteResource): Outcome {
  return { type: "terminal", resource };
}

export function pending(reason: string, createdArn?: string): Outcome {
  return createdArn ? { type: "pending", reason, createdArn } : { type: "pending", reason };
}

export function needsUpdate(fields: string[]): Outcome {
  return { type: "needs-update", fields };
}

export function failed(reason: string): Outcome {
  return { type: "failed", reason };
}

export function invalid(reason: string): Outcome {
  return { type: "invalid", reason };
}

export function solutionVersionPending(solutionVersionArn: string): Outcome {
  return { type: "solution-version-pending", solutionVersionArn };
}

/**
 * Whether the orchestrator should invoke the step again.
 */
export function isRetryable(outcome: Outcome): boolean {
  return outcome.type === "pending" || outcome.type === "needs-update" || outcome.type === "solution-version-pending";
}
