/**
 * EventBridge notifier
 *
 * Publishes `Personalize <Kind> State Change` events to the workflow's bus.
 */

import { EventBridgeClient, PutEventsCommand, type PutEventsCommandOutput } from "@aws-sdk/client-eventbridge";
import { getKindSpec } from "../resource/kinds.js";
import { dashToTitle } from "../resource/name.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";
import { NotificationError, type Notifier, type ResourceStateChange } from "./notifier.js";

export const EVENT_SOURCE = "solutions.aws.personalize";

export type EventBridgeNotifierConfig = {
  eventBusName: string;
  region?: string;
  client?: Pick<EventBridgeClient, "send">;
  logger?: WorkflowLogger;
};

export class EventBridgeNotifier implements Notifier {
  readonly name = "EventBridgeNotifier";
  private client: Pick<EventBridgeClient, "send">;
  private logger: WorkflowLogger;

  constructor(private config: EventBridgeNotifierConfig) {
    this.client = config.client ?? new EventBridgeClient({ region: config.region || "us-east-1" });
    this.logger = config.logger ?? getWorkflowLogger("notify/eventbridge");
  }

  async notifyCreate(change: ResourceStateChange): Promise<void> {
    await this.publish(change);
  }

  async notifyComplete(change: ResourceStateChange): Promise<void> {
    await this.publish(change);
  }

  private async publish(change: ResourceStateChange): Promise<void> {
    const detail: Record<string, unknown> = { Arn: change.arn, Status: change.status };
    if (change.durationSeconds) {
      detail.Duration = change.durationSeconds;
    }

    let result: PutEventsCommandOutput;
    try {
      result = await this.client.send(
        new PutEventsCommand({
          Entries: [
            {
              Source: EVENT_SOURCE,
              Resources: [change.arn],
              DetailType: `Personalize ${dashToTitle(getKindSpec(change.kind).name.dash)} State Change`,
              Detail: JSON.stringify(detail),
              EventBusName: this.config.eventBusName,
            },
          ],
        }),
      );
    } catch (err) {
      throw new NotificationError(this.name, formatErrorMessage(err));
    }

    if ((result.FailedEntryCount ?? 0) > 0) {
      for (const entry of result.Entries ?? []) {
        if (entry.ErrorCode) {
          this.logger.error(`EventBridge failure (${entry.ErrorCode}) ${entry.ErrorMessage ?? ""}`.trimEnd());
        }
      }
    }
  }
}
