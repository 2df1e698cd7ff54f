/**
 * Notification tests
 */

import { describe, it, expect, vi } from "vitest";
import { PutEventsCommand } from "@aws-sdk/client-eventbridge";
import { PublishCommand } from "@aws-sdk/client-sns";
import { NotificationDispatcher } from "./dispatcher.js";
import { EventBridgeNotifier } from "./eventbridge.js";
import { classifyTransition, NotificationError, type Notifier, type ResourceStateChange } from "./notifier.js";
import { SnsPublisher } from "./sns.js";
import { buildWorkflowOutcomeMessage, publishWorkflowOutcome } from "./workflow-outcome.js";
import { InMemoryMetricsRecorder } from "../metrics/recorder.js";
import { createWorkflowLogger, MemoryTransport } from "../logging/index.js";

const CAMPAIGN_ARN = "arn:aws:personalize:us-east-1:111111111111:campaign/top-picks";
const cutoff = new Date("2024-06-15T00:00:00Z");

class RecordingNotifier implements Notifier {
  readonly created: ResourceStateChange[] = [];
  readonly completed: ResourceStateChange[] = [];

  constructor(
    readonly name: string,
    private readonly failing = false,
  ) {}

  async notifyCreate(change: ResourceStateChange): Promise<void> {
    if (this.failing) throw new NotificationError(this.name, "sink unavailable");
    this.created.push(change);
  }

  async notifyComplete(change: ResourceStateChange): Promise<void> {
    if (this.failing) throw new NotificationError(this.name, "sink unavailable");
    this.completed.push(change);
  }
}

function describedCampaign(overrides: Record<string, unknown> = {}) {
  return {
    campaign: {
      campaignArn: CAMPAIGN_ARN,
      status: "ACTIVE",
      creationDateTime: new Date("2024-06-15T00:00:00Z"),
      lastUpdatedDateTime: new Date("2024-06-15T00:10:00Z"),
      ...overrides,
    },
  };
}

describe("classifyTransition", () => {
  it("should treat a top-level ARN as a creation", () => {
    expect(classifyTransition("campaign", { campaignArn: CAMPAIGN_ARN }, cutoff)).toEqual({
      type: "create",
      arn: CAMPAIGN_ARN,
    });
  });

  it("should report stabilization after the cutoff with its duration", () => {
    expect(classifyTransition("campaign", describedCampaign(), cutoff)).toEqual({
      type: "complete",
      arn: CAMPAIGN_ARN,
      durationSeconds: 600,
    });
  });

  it("should prefer the latest campaign update timestamps", () => {
    const result = describedCampaign({
      latestCampaignUpdate: {
        status: "ACTIVE",
        creationDateTime: new Date("2024-06-15T01:00:00Z"),
        lastUpdatedDateTime: new Date("2024-06-15T01:00:30Z"),
      },
    });
    expect(classifyTransition("campaign", result, cutoff)).toEqual({
      type: "complete",
      arn: CAMPAIGN_ARN,
      durationSeconds: 30,
    });
  });

  it("should not notify before stabilization or without a later update", () => {
    expect(classifyTransition("campaign", describedCampaign({ status: "CREATE IN_PROGRESS" }), cutoff).type).toBe(
      "none",
    );
    expect(
      classifyTransition("campaign", describedCampaign({ latestCampaignUpdate: { status: "CREATE PENDING" } }), cutoff)
        .type,
    ).toBe("none");
    expect(classifyTransition("campaign", describedCampaign(), undefined)).toEqual({
      type: "none",
      reason: "campaign has no cutoff specified for notification",
    });
    expect(classifyTransition("campaign", describedCampaign(), new Date("2024-06-15T00:10:00Z")).type).toBe("none");
    expect(classifyTransition("campaign", describedCampaign({ lastUpdatedDateTime: undefined }), cutoff).type).toBe(
      "none",
    );
  });
});

describe("NotificationDispatcher", () => {
  it("should notify creation only for create results", async () => {
    const notifier = new RecordingNotifier("recording");
    const dispatcher = new NotificationDispatcher([notifier]);

    const report = await dispatcher.notify("CREATING", "campaign", { campaignArn: CAMPAIGN_ARN }, cutoff);

    expect(report).toEqual({ created: ["recording"], completed: [] });
    expect(notifier.created).toEqual([{ kind: "campaign", status: "CREATING", arn: CAMPAIGN_ARN }]);
    expect(notifier.completed).toEqual([]);
  });

  it("should notify stabilization only for described results", async () => {
    const notifier = new RecordingNotifier("recording");
    const dispatcher = new NotificationDispatcher([notifier]);

    const report = await dispatcher.notify("ACTIVE", "campaign", describedCampaign(), cutoff);

    expect(report).toEqual({ created: [], completed: ["recording"] });
    expect(notifier.completed).toEqual([
      { kind: "campaign", status: "ACTIVE", arn: CAMPAIGN_ARN, durationSeconds: 600 },
    ]);
  });

  it("should continue past a failing notifier", async () => {
    const transport = new MemoryTransport();
    const failing = new RecordingNotifier("failing", true);
    const working = new RecordingNotifier("working");
    const dispatcher = new NotificationDispatcher([failing, working], {
      logger: createWorkflowLogger("notify", { transports: [transport] }),
    });

    const report = await dispatcher.notify("CREATING", "campaign", { campaignArn: CAMPAIGN_ARN });

    expect(report.created).toEqual(["working"]);
    expect(transport.messages("error")).toEqual(["notifier failing failed: sink unavailable"]);
  });

  it("should announce a started solution version without a cutoff", async () => {
    const notifier = new RecordingNotifier("recording");
    const dispatcher = new NotificationDispatcher([notifier]);
    const svArn = "arn:aws:personalize:us-east-1:111111111111:solution/sims/abc";

    await dispatcher.notifyOutcome("solutionVersion", { type: "solution-version-pending", solutionVersionArn: svArn });

    expect(notifier.created).toEqual([{ kind: "solutionVersion", status: "CREATING", arn: svArn }]);
  });

  it("should stay silent for plain pending outcomes", async () => {
    const notifier = new RecordingNotifier("recording");
    const dispatcher = new NotificationDispatcher([notifier]);

    const report = await dispatcher.notifyOutcome("campaign", { type: "pending", reason: "campaign is updating" }, cutoff);

    expect(report).toEqual({ created: [], completed: [] });
  });
});

describe("EventBridgeNotifier", () => {
  it("should put one state change event", async () => {
    const send = vi.fn().mockResolvedValue({ FailedEntryCount: 0, Entries: [{ EventId: "1" }] });
    const notifier = new EventBridgeNotifier({ eventBusName: "test-bus", client: { send } });

    await notifier.notifyComplete({ kind: "datasetImportJob", status: "ACTIVE", arn: "job-arn", durationSeconds: 42 });

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutEventsCommand);
    expect(command.input).toEqual({
      Entries: [
        {
          Source: "solutions.aws.personalize",
          Resources: ["job-arn"],
          DetailType: "Personalize Dataset Import Job State Change",
          Detail: '{"Arn":"job-arn","Status":"ACTIVE","Duration":42}',
          EventBusName: "test-bus",
        },
      ],
    });
  });

  it("should omit a zero duration", async () => {
    const send = vi.fn().mockResolvedValue({ FailedEntryCount: 0 });
    const notifier = new EventBridgeNotifier({ eventBusName: "test-bus", client: { send } });

    await notifier.notifyCreate({ kind: "campaign", status: "CREATING", arn: CAMPAIGN_ARN });

    expect(send.mock.calls[0][0].input.Entries[0].Detail).toBe(`{"Arn":"${CAMPAIGN_ARN}","Status":"CREATING"}`);
  });

  it("should log failed entries", async () => {
    const transport = new MemoryTransport();
    const send = vi.fn().mockResolvedValue({
      FailedEntryCount: 1,
      Entries: [{ ErrorCode: "InternalFailure", ErrorMessage: "try again" }],
    });
    const notifier = new EventBridgeNotifier({
      eventBusName: "test-bus",
      client: { send },
      logger: createWorkflowLogger("eventbridge", { transports: [transport] }),
    });

    await notifier.notifyCreate({ kind: "filter", status: "CREATING", arn: "filter-arn" });

    expect(transport.messages("error")).toEqual(["EventBridge failure (InternalFailure) try again"]);
  });

  it("should raise a NotificationError when the call fails", async () => {
    const send = vi.fn().mockRejectedValue(new Error("bus not found"));
    const notifier = new EventBridgeNotifier({ eventBusName: "test-bus", client: { send } });

    await expect(notifier.notifyCreate({ kind: "filter", status: "CREATING", arn: "f" })).rejects.toBeInstanceOf(
      NotificationError,
    );
  });
});

describe("workflow outcome messages", () => {
  const ctx = { partition: "aws", region: "us-east-1", accountId: "111111111111" };

  it("should describe a successful workflow with a console link", () => {
    const message = buildWorkflowOutcomeMessage({ datasetGroup: "retail" }, ctx);

    expect(message.failed).toBe(false);
    expect(message.messages.default).toBe("The personalization workflow for retail completed successfully");
    expect(message.messages.email).toBe(
      "The Personalization job for dataset group retail is complete\n\n" +
        "Link: https://console.aws.amazon.com/personalize/home?region=us-east-1" +
        "#arn:aws:personalize:us-east-1:111111111111:dataset-group$retail/setup",
    );
    expect(JSON.parse(message.messages["email-json"]).status).toBe("UPDATE COMPLETE");
  });

  it("should extract the error message from the failure cause", () => {
    const message = buildWorkflowOutcomeMessage(
      {
        datasetGroup: "retail",
        statesError: { Error: "ResourceFailed", Cause: JSON.stringify({ errorMessage: "campaign CREATE FAILED" }) },
      },
      ctx,
    );

    expect(message.failed).toBe(true);
    expect(message.messages.sms).toBe("The personalization workflow for retail completed with errors");
    expect(message.messages.email).toBe(
      "There was an error running the personalization job for dataset group retail\n\n" +
        "Message: campaign CREATE FAILED\n\n",
    );
    expect(JSON.parse(message.messages.sqs)).toEqual({
      datasetGroup: "retail",
      status: "UPDATE FAILED",
      summary: "The personalization workflow for retail completed with errors",
      description: message.messages.email,
    });
  });

  it("should publish with a JSON message structure and count the outcome", async () => {
    const send = vi.fn().mockResolvedValue({ MessageId: "m-1" });
    const metrics = new InMemoryMetricsRecorder();
    const publisher = new SnsPublisher({ topicArn: "test-topic", client: { send } });

    await publishWorkflowOutcome(
      { serviceError: { Cause: "not json" } },
      { publisher, solutionName: "Test Solution", context: ctx, metrics },
    );

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PublishCommand);
    expect(command.input.MessageStructure).toBe("json");
    expect(command.input.Subject).toBe("Test Solution Notifications");
    expect(command.input.TopicArn).toBe("test-topic");
    expect(JSON.parse(command.input.Message).email).toContain("Message: not json");
    expect(metrics.total("JobFailure")).toBe(1);
    expect(metrics.total("JobSuccess")).toBe(0);
  });
});
