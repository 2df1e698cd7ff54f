/**
 * Reconciliation Engine Tests
 *
 * Drives single reconciliation passes against a fake resource provider.
 */

import { describe, it, expect, vi } from "vitest";
import { ReconciliationEngine, createParameters, type ReconciliationEngineConfig } from "./engine.js";
import type { SourceData } from "./locator.js";
import { InMemoryMetricsRecorder } from "../metrics/recorder.js";
import { createWorkflowLogger, MemoryTransport } from "../logging/index.js";
import { SourceDataNotFoundError } from "../storage/s3-freshness.js";
import type { AWSContext } from "../resource/arn.js";

const context: AWSContext = { partition: "aws", region: "us-east-1", accountId: "111111111111" };
const now = new Date("2024-06-15T00:00:00Z");
const DSG_ARN = "arn:aws:personalize:us-east-1:111111111111:dataset-group/retail";
const CAMPAIGN_ARN = "arn:aws:personalize:us-east-1:111111111111:campaign/top-picks";
const SV_A1 = "arn:aws:personalize:us-east-1:111111111111:solution/sims/a1";
const SV_A2 = "arn:aws:personalize:us-east-1:111111111111:solution/sims/a2";

function awsError(name: string, message = name): Error {
  return Object.assign(new Error(message), { name });
}

function createProvider() {
  return {
    describe: vi.fn(),
    list: vi.fn().mockResolvedValue([]),
    create: vi.fn(),
    update: vi.fn().mockResolvedValue(undefined),
    getSolutionMetrics: vi.fn().mockResolvedValue({}),
  };
}

function createEngine(overrides: Partial<ReconciliationEngineConfig> = {}) {
  const provider = createProvider();
  const metrics = new InMemoryMetricsRecorder();
  const transport = new MemoryTransport();
  const engine = new ReconciliationEngine({
    provider,
    context,
    metrics,
    logger: createWorkflowLogger("reconcile", { level: "trace", transports: [transport] }),
    clock: () => now,
    ...overrides,
  });
  return { engine, provider, metrics, transport };
}

describe("createParameters", () => {
  it("should drop workflow fields before create", () => {
    expect(
      createParameters("solutionVersion", {
        solutionArn: "sol",
        trainingMode: "FULL",
        maxAge: 10,
        timeStarted: "t",
        solutionVersionArn: "sv",
      }),
    ).toEqual({ solutionArn: "sol", trainingMode: "FULL" });
    expect(createParameters("campaign", { name: "c", solutionVersionArn: "sv", maxAge: 1 })).toEqual({
      name: "c",
      solutionVersionArn: "sv",
    });
  });
});

describe("ReconciliationEngine", () => {
  describe("create", () => {
    it("should create a missing resource and report pending", async () => {
      const { engine, provider, metrics } = createEngine();
      provider.describe.mockRejectedValueOnce(awsError("ResourceNotFoundException"));
      provider.create.mockResolvedValueOnce(DSG_ARN);

      const outcome = await engine.reconcile("datasetGroup", { name: "retail", maxAge: 86400, timeStarted: "t" });

      expect(outcome).toEqual({ type: "pending", reason: "datasetGroup was created", createdArn: DSG_ARN });
      expect(provider.describe).toHaveBeenCalledWith("datasetGroup", DSG_ARN);
      expect(provider.create).toHaveBeenCalledWith("datasetGroup", { name: "retail" });
      expect(metrics.total("DatasetGroupCreated")).toBe(1);
    });

    it("should capture the ARN of a new solution version", async () => {
      const { engine, provider, metrics } = createEngine();
      provider.create.mockResolvedValueOnce(SV_A1);

      const outcome = await engine.reconcile("solutionVersion", {
        solutionArn: "arn:aws:personalize:us-east-1:111111111111:solution/sims",
        trainingMode: "FULL",
      });

      expect(outcome).toEqual({ type: "solution-version-pending", solutionVersionArn: SV_A1 });
      expect(provider.list).toHaveBeenCalledWith(
        "solutionVersion",
        "arn:aws:personalize:us-east-1:111111111111:solution/sims",
      );
      expect(metrics.total("SolutionVersionCreated")).toBe(1);
    });

    it("should wait on soft limits", async () => {
      const { engine, provider, metrics } = createEngine();
      provider.create.mockRejectedValueOnce(awsError("LimitExceededException", "too many jobs"));

      const outcome = await engine.reconcile("batchSegmentJob", {
        jobName: "segment",
        solutionVersionArn: SV_A1,
      });

      expect(outcome.type).toBe("pending");
      expect(metrics.data).toEqual([]);
    });

    it("should propagate hard limits", async () => {
      const { engine, provider } = createEngine();
      provider.describe.mockRejectedValueOnce(awsError("ResourceNotFoundException"));
      provider.create.mockRejectedValueOnce(awsError("LimitExceededException", "too many dataset groups"));

      await expect(engine.reconcile("datasetGroup", { name: "retail" })).rejects.toThrow("too many dataset groups");
    });
  });

  it("should report pending while a resource is in use", async () => {
    const { engine, provider } = createEngine();
    provider.describe.mockRejectedValueOnce(awsError("ResourceInUseException"));

    expect(await engine.reconcile("filter", { name: "f", datasetGroupArn: DSG_ARN })).toEqual({
      type: "pending",
      reason: "filter is in use",
    });
  });

  it("should propagate unclassified describe errors", async () => {
    const { engine, provider } = createEngine();
    provider.describe.mockRejectedValueOnce(awsError("AccessDeniedException", "denied"));

    await expect(engine.reconcile("solution", { name: "sims" })).rejects.toThrow("denied");
  });

  it("should fail when described fields differ from the configuration", async () => {
    const { engine, provider } = createEngine();
    provider.describe.mockResolvedValueOnce({ name: "sims", recipeArn: "arn:recipe/b", status: "ACTIVE" });

    const outcome = await engine.reconcile("solution", { name: "sims", recipeArn: "arn:recipe/a" });

    expect(outcome.type).toBe("failed");
    if (outcome.type === "failed") {
      expect(outcome.reason.startsWith("expected recipeArn to be arn:recipe/a but got arn:recipe/b. ")).toBe(true);
    }
  });

  it("should locate datasets by type under their dataset group", async () => {
    const { engine, provider } = createEngine();
    provider.list.mockResolvedValueOnce([
      { datasetArn: "users", datasetType: "USERS", creationDateTime: new Date("2024-01-01T00:00:00Z") },
      { datasetArn: "interactions", datasetType: "INTERACTIONS", creationDateTime: new Date("2024-01-02T00:00:00Z") },
    ]);
    provider.describe.mockResolvedValueOnce({
      datasetArn: "interactions",
      name: "retail-interactions",
      datasetType: "INTERACTIONS",
      datasetGroupArn: DSG_ARN,
      status: "ACTIVE",
    });

    const outcome = await engine.reconcile("dataset", {
      name: "retail-interactions",
      datasetType: "interactions",
      datasetGroupArn: DSG_ARN,
    });

    expect(provider.describe).toHaveBeenCalledWith("dataset", "interactions");
    expect(outcome.type).toBe("terminal");
  });

  describe("dataset import jobs", () => {
    const desired = {
      jobName: "import_2024_06_15",
      datasetArn: "ds-arn",
      dataSource: { dataLocation: "s3://data-bucket/interactions.csv" },
      roleArn: "role",
      importMode: "FULL",
      maxAge: 5 * 24 * 60 * 60,
    };
    const stale = {
      datasetImportJobArn: "old-import",
      jobName: "import_2024_06_05",
      status: "ACTIVE",
      creationDateTime: new Date("2024-06-05T00:00:00Z"),
      lastUpdatedDateTime: new Date("2024-06-05T00:00:00Z"),
    };

    function source(newData: boolean, exists = true): SourceData {
      return { exists: async () => exists, newDataSince: async () => newData };
    }

    it("should keep a stale import when the data has not changed", async () => {
      const { engine, provider } = createEngine({ dataSource: () => source(false) });
      provider.list.mockResolvedValueOnce([stale]);
      provider.describe.mockResolvedValueOnce({ ...stale, datasetArn: "ds-arn", importMode: "FULL" });

      const outcome = await engine.reconcile("datasetImportJob", desired);

      expect(outcome.type).toBe("terminal");
      expect(provider.create).not.toHaveBeenCalled();
    });

    it("should import again when newer data is available", async () => {
      const { engine, provider } = createEngine({ dataSource: () => source(true) });
      provider.list.mockResolvedValueOnce([stale]);
      provider.create.mockResolvedValueOnce("new-import");

      const outcome = await engine.reconcile("datasetImportJob", desired);

      expect(outcome).toEqual({ type: "pending", reason: "datasetImportJob was created", createdArn: "new-import" });
      expect(provider.create).toHaveBeenCalledWith("datasetImportJob", {
        jobName: "import_2024_06_15",
        datasetArn: "ds-arn",
        dataSource: { dataLocation: "s3://data-bucket/interactions.csv" },
        roleArn: "role",
        importMode: "FULL",
      });
    });

    it("should fail before listing when the source data is missing", async () => {
      const { engine, provider } = createEngine({ dataSource: () => source(false, false) });

      await expect(engine.reconcile("datasetImportJob", desired)).rejects.toBeInstanceOf(SourceDataNotFoundError);
      expect(provider.list).not.toHaveBeenCalled();
    });
  });

  describe("campaign updates", () => {
    const described = {
      campaignArn: CAMPAIGN_ARN,
      name: "top-picks",
      solutionVersionArn: SV_A1,
      minProvisionedTPS: 1,
      status: "ACTIVE",
    };

    it("should update a campaign to a new solution version", async () => {
      const { engine, provider } = createEngine();
      provider.describe.mockResolvedValueOnce(described);

      const outcome = await engine.reconcile("campaign", {
        name: "top-picks",
        solutionVersionArn: SV_A2,
        minProvisionedTPS: 1,
      });

      expect(outcome).toEqual({ type: "pending", reason: "campaign is updating" });
      expect(provider.update).toHaveBeenCalledWith("campaign", CAMPAIGN_ARN, {
        solutionVersionArn: SV_A2,
        minProvisionedTPS: 1,
      });
    });

    it("should return needs-update when updates are left to the caller", async () => {
      const { engine, provider } = createEngine({ applyUpdates: false });
      provider.describe.mockResolvedValueOnce(described);

      const outcome = await engine.reconcile("campaign", { name: "top-picks", solutionVersionArn: SV_A2 });

      expect(outcome).toEqual({ type: "needs-update", fields: ["solutionVersionArn"] });
      expect(provider.update).not.toHaveBeenCalled();
    });

    it("should report pending when the update finds the campaign in use", async () => {
      const { engine, provider } = createEngine();
      provider.describe.mockResolvedValueOnce(described);
      provider.update.mockRejectedValueOnce(awsError("ResourceInUseException"));

      const outcome = await engine.reconcile("campaign", { name: "top-picks", solutionVersionArn: SV_A2 });

      expect(outcome).toEqual({ type: "pending", reason: "campaign is in use" });
    });

    it("should wait while an update to the requested version is in flight", async () => {
      const { engine, provider } = createEngine();
      provider.describe.mockResolvedValueOnce({
        ...described,
        latestCampaignUpdate: { solutionVersionArn: SV_A2, minProvisionedTPS: 1, status: "CREATE IN_PROGRESS" },
      });

      const outcome = await engine.reconcile("campaign", {
        name: "top-picks",
        solutionVersionArn: SV_A2,
        minProvisionedTPS: 1,
      });

      expect(outcome).toEqual({ type: "pending", reason: "campaign is CREATE IN_PROGRESS" });
      expect(provider.update).not.toHaveBeenCalled();
    });

    it("should wait while a recommender update is in flight", async () => {
      const { engine, provider } = createEngine();
      provider.describe.mockResolvedValueOnce({
        recommenderArn: "arn:aws:personalize:us-east-1:111111111111:recommender/for-you",
        name: "for-you",
        recommenderConfig: { minRecommendationRequestsPerSecond: 1 },
        status: "ACTIVE",
        latestRecommenderUpdate: {
          recommenderConfig: { minRecommendationRequestsPerSecond: 5 },
          status: "CREATE PENDING",
        },
      });

      const outcome = await engine.reconcile("recommender", {
        name: "for-you",
        recommenderConfig: { minRecommendationRequestsPerSecond: 5 },
      });

      expect(outcome).toEqual({ type: "pending", reason: "recommender is CREATE PENDING" });
      expect(provider.update).not.toHaveBeenCalled();
    });

    it("should return the campaign once it matches", async () => {
      const { engine, provider } = createEngine();
      provider.describe.mockResolvedValueOnce(described);

      const outcome = await engine.reconcile("campaign", { name: "top-picks", solutionVersionArn: SV_A1 });

      expect(outcome).toEqual({ type: "terminal", resource: described });
    });
  });

  it("should record offline metrics for active solution versions", async () => {
    const { engine, provider, metrics } = createEngine();
    const version = {
      solutionVersionArn: SV_A1,
      solutionArn: "arn:aws:personalize:us-east-1:111111111111:solution/sims",
      status: "ACTIVE",
      creationDateTime: now,
      lastUpdatedDateTime: now,
    };
    provider.list.mockResolvedValueOnce([version]);
    provider.describe.mockResolvedValueOnce(version);
    provider.getSolutionMetrics.mockResolvedValueOnce({ coverage: 0.25 });

    const outcome = await engine.reconcile("solutionVersion", {
      solutionArn: "arn:aws:personalize:us-east-1:111111111111:solution/sims",
      solutionVersionArn: SV_A1,
    });

    expect(outcome.type).toBe("terminal");
    expect(metrics.data).toEqual([
      {
        name: "coverage",
        value: 0.25,
        unit: "None",
        dimensions: { service: "SolutionMetrics", solutionArn: "arn:aws:personalize:us-east-1:111111111111:solution/sims" },
      },
    ]);
  });
});
