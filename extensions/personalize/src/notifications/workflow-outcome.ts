/**
 * Workflow outcome notifications
 *
 * Summarizes a finished workflow execution (`UPDATE COMPLETE` or `UPDATE FAILED`)
 * for the notification topic's subscribers.
 */

import type { MetricsRecorder } from "../metrics/recorder.js";
import type { AWSContext } from "../resource/arn.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import type { ProtocolMessages, SnsPublisher } from "./sns.js";

export const UNKNOWN_SOURCE = "UNKNOWN";

export type StatesError = {
  Error?: string;
  Cause?: string;
};

/**
 * Output of the workflow's success or failure state.
 */
export type WorkflowOutcomeEvent = {
  datasetGroup?: string;
  statesError?: StatesError;
  serviceError?: StatesError;
};

export type WorkflowOutcomeContext = AWSContext & {
  /** X-Ray trace ID of the failing execution, when tracing is on */
  traceId?: string;
};

export type WorkflowOutcomeMessage = {
  failed: boolean;
  messages: Required<ProtocolMessages>;
};

function errorMessageOf(error: StatesError): string {
  const cause = error.Cause ?? "{}";
  try {
    const parsed: unknown = JSON.parse(cause);
    if (typeof parsed === "object" && parsed !== null && "errorMessage" in parsed) {
      return typeof parsed.errorMessage === "string" ? parsed.errorMessage : UNKNOWN_SOURCE;
    }
    return UNKNOWN_SOURCE;
  } catch {
    return cause;
  }
}

export function buildWorkflowOutcomeMessage(
  event: WorkflowOutcomeEvent,
  ctx: WorkflowOutcomeContext,
): WorkflowOutcomeMessage {
  const datasetGroup = event.datasetGroup ?? UNKNOWN_SOURCE;
  const error = event.statesError ?? event.serviceError;
  const failed = error !== undefined;

  const summary = `The personalization workflow for ${datasetGroup} completed ${failed ? "with errors" : "successfully"}`;

  let description: string;
  if (error) {
    description = `There was an error running the personalization job for dataset group ${datasetGroup}\n\n`;
    description += `Message: ${errorMessageOf(error)}\n\n`;
    if (ctx.traceId) {
      description += `Traces: https://console.aws.amazon.com/xray/home?region=${ctx.region}#/traces/${ctx.traceId}`;
    }
  } else {
    const consoleLink =
      `https://console.aws.amazon.com/personalize/home?region=${ctx.region}` +
      `#arn:${ctx.partition}:personalize:${ctx.region}:${ctx.accountId}:dataset-group$${datasetGroup}/setup`;
    description = `The Personalization job for dataset group ${datasetGroup} is complete\n\nLink: ${consoleLink}`;
  }

  const json = JSON.stringify({
    datasetGroup,
    status: failed ? "UPDATE FAILED" : "UPDATE COMPLETE",
    summary,
    description,
  });

  return {
    failed,
    messages: {
      default: summary,
      sms: summary,
      email: description,
      "email-json": json,
      sqs: json,
    },
  };
}

export type PublishWorkflowOutcomeOptions = {
  publisher: SnsPublisher;
  solutionName: string;
  context: WorkflowOutcomeContext;
  metrics?: MetricsRecorder;
  logger?: WorkflowLogger;
};

/**
 * Publish the outcome of a workflow execution and count it as `JobSuccess` or `JobFailure`.
 */
export async function publishWorkflowOutcome(
  event: WorkflowOutcomeEvent,
  options: PublishWorkflowOutcomeOptions,
): Promise<WorkflowOutcomeMessage> {
  const logger = options.logger ?? getWorkflowLogger("notify/outcome");
  const message = buildWorkflowOutcomeMessage(event, options.context);

  await options.metrics?.record(message.failed ? "JobFailure" : "JobSuccess");

  logger.info("publishing message for event", { datasetGroup: event.datasetGroup ?? UNKNOWN_SOURCE });
  await options.publisher.publishMultiProtocol(message.messages, `${options.solutionName} Notifications`);
  return message;
}
