import { describe, it, expect, vi } from "vitest";
import { CreateCampaignCommand, DescribeCampaignCommand } from "@aws-sdk/client-personalize";
import { PutEventsCommand } from "@aws-sdk/client-eventbridge";
import { ScanCommand } from "@aws-sdk/lib-dynamodb";
import { ConfigurationError } from "./config/runtime.js";
import { InMemoryMetricsRecorder } from "./metrics/recorder.js";
import { MemoryTransport } from "./logging/index.js";
import { createOrchestrator } from "./orchestrator.js";

const CAMPAIGN_ARN = "arn:aws:personalize:us-east-1:111111111111:campaign/sims-campaign";
const VERSION_ARN = "arn:aws:personalize:us-east-1:111111111111:solution/sims/abc123";
const BUS_ARN = "arn:aws:events:us-east-1:111111111111:event-bus/personalize";

function options() {
  return { metrics: new InMemoryMetricsRecorder(), transports: [new MemoryTransport()] };
}

describe("createOrchestrator", () => {
  it("should build the ARN context from the environment", () => {
    const orchestrator = createOrchestrator({ AWS_ACCOUNT_ID: "111111111111", AWS_REGION: "eu-west-1" }, options());

    expect(orchestrator.context).toEqual({ partition: "aws", region: "eu-west-1", accountId: "111111111111" });
  });

  it("should fail on first use of a component whose setting is unset", () => {
    const orchestrator = createOrchestrator({ AWS_ACCOUNT_ID: "111111111111" }, options());

    expect(() => orchestrator.scheduler).toThrow(ConfigurationError);
    expect(() => orchestrator.intake).toThrow("STATE_MACHINE_ARN: is required");
  });

  it("should announce created resources on the event bus", async () => {
    const personalize = {
      send: vi.fn().mockImplementation(async (command: unknown) => {
        if (command instanceof DescribeCampaignCommand) {
          throw Object.assign(new Error("not found"), { name: "ResourceNotFoundException" });
        }
        if (command instanceof CreateCampaignCommand) return { campaignArn: CAMPAIGN_ARN };
        throw new Error("unexpected command");
      }),
    };
    const eventbridge = { send: vi.fn().mockResolvedValue({ FailedEntryCount: 0, Entries: [] }) };
    const metrics = new InMemoryMetricsRecorder();
    const orchestrator = createOrchestrator(
      { AWS_ACCOUNT_ID: "111111111111", EVENT_BUS_ARN: BUS_ARN },
      { metrics, transports: [new MemoryTransport()], clients: { personalize, eventbridge } },
    );

    const response = await orchestrator.pipeline.run({
      kind: "campaign",
      event: { serviceConfig: { name: "sims-campaign", solutionVersionArn: VERSION_ARN } },
    });

    expect(response.outcome).toEqual({ type: "pending", reason: "campaign was created", createdArn: CAMPAIGN_ARN });
    expect(response.notifications).toEqual({ created: ["EventBridgeNotifier"], completed: [] });
    expect(metrics.total("CampaignCreated")).toBe(1);

    const command: unknown = eventbridge.send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutEventsCommand);
    if (!(command instanceof PutEventsCommand)) return;
    expect(command.input.Entries).toEqual([
      {
        Source: "solutions.aws.personalize",
        Resources: [CAMPAIGN_ARN],
        DetailType: "Personalize Campaign State Change",
        Detail: JSON.stringify({ Arn: CAMPAIGN_ARN, Status: "CREATING" }),
        EventBusName: BUS_ARN,
      },
    ]);
  });

  it("should list scheduled tasks from the schedules table", async () => {
    const dynamodb = {
      send: vi.fn().mockImplementation(async (command: unknown) => {
        if (!(command instanceof ScanCommand)) throw new Error("unexpected command");
        return { Items: [{ name: "retail-import" }, { name: "retail-train" }, { name: "retail-import" }] };
      }),
    };
    const orchestrator = createOrchestrator(
      {
        AWS_ACCOUNT_ID: "111111111111",
        DDB_SCHEDULES_TABLE: "schedules",
        DDB_SCHEDULER_STEPFUNCTION: "arn:aws:states:us-east-1:111111111111:stateMachine:trigger",
      },
      { ...options(), clients: { dynamodb } },
    );

    expect(await orchestrator.scheduler.list()).toEqual(["retail-import", "retail-train"]);
    expect(orchestrator.scheduler).toBe(orchestrator.scheduler);
  });

  it("should publish workflow outcomes and count them", async () => {
    const sns = { send: vi.fn().mockResolvedValue({ MessageId: "message-1" }) };
    const metrics = new InMemoryMetricsRecorder();
    const orchestrator = createOrchestrator(
      { AWS_ACCOUNT_ID: "111111111111", SNS_TOPIC_ARN: "arn:aws:sns:us-east-1:111111111111:topic" },
      { metrics, transports: [new MemoryTransport()], clients: { sns } },
    );

    const message = await orchestrator.publishOutcome({ datasetGroup: "retail" });

    expect(message.failed).toBe(false);
    expect(message.messages.default).toBe("The personalization workflow for retail completed successfully");
    expect(metrics.total("JobSuccess")).toBe(1);
    expect(sns.send).toHaveBeenCalledTimes(1);
  });
});
