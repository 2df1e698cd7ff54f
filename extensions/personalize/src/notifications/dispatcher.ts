/**
 * Notification Dispatcher
 *
 * Fans one resource transition out to an explicit list of notifiers. A call
 * announces either a creation or a stabilization, never both, and a failing
 * notifier is logged without stopping the others.
 */

import { arnKey, type ResourceKind } from "../resource/kinds.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";
import type { Outcome } from "../reconciliation/outcome.js";
import { classifyTransition, type NotificationResult, type Notifier, type ResourceStateChange } from "./notifier.js";

export const STATUS_CREATING = "CREATING";
export const STATUS_ACTIVE = "ACTIVE";

/**
 * Names of the notifiers that delivered each kind of notification.
 */
export type DispatchReport = {
  created: string[];
  completed: string[];
};

export class NotificationDispatcher {
  private logger: WorkflowLogger;

  constructor(
    private readonly notifiers: readonly Notifier[],
    options: { logger?: WorkflowLogger } = {},
  ) {
    this.logger = options.logger ?? getWorkflowLogger("notify");
  }

  async notify(
    status: string,
    kind: ResourceKind,
    result: NotificationResult,
    cutoff?: Date,
  ): Promise<DispatchReport> {
    const report: DispatchReport = { created: [], completed: [] };
    const transition = classifyTransition(kind, result, cutoff);

    if (transition.type === "none") {
      this.logger.debug(transition.reason);
      return report;
    }

    const change: ResourceStateChange = { kind, status, arn: transition.arn };
    if (transition.type === "complete") {
      change.durationSeconds = transition.durationSeconds;
    }

    for (const notifier of this.notifiers) {
      try {
        if (transition.type === "create") {
          this.logger.info(`notifier ${notifier.name} starting for creation of ${kind}`);
          await notifier.notifyCreate(change);
          report.created.push(notifier.name);
        } else {
          this.logger.info(`notifier ${notifier.name} starting for completion of ${kind}`);
          await notifier.notifyComplete(change);
          report.completed.push(notifier.name);
        }
      } catch (err) {
        this.logger.error(`notifier ${notifier.name} failed: ${formatErrorMessage(err)}`);
      }
    }
    return report;
  }

  /**
   * Announce what a reconciliation pass observed: a resource it created, a
   * solution version it started, or a resource it found active.
   */
  async notifyOutcome(kind: ResourceKind, outcome: Outcome, cutoff?: Date): Promise<DispatchReport> {
    switch (outcome.type) {
      case "terminal":
        return this.notify(STATUS_ACTIVE, kind, { [kind]: outcome.resource }, cutoff);
      case "pending":
        if (outcome.createdArn) {
          return this.notify(STATUS_CREATING, kind, { [arnKey(kind)]: outcome.createdArn }, cutoff);
        }
        return { created: [], completed: [] };
      case "solution-version-pending":
        return this.notify(STATUS_CREATING, "solutionVersion", {
          solutionVersionArn: outcome.solutionVersionArn,
          status: "CREATE IN_PROGRESS",
        });
      default:
        return { created: [], completed: [] };
    }
  }
}
