import { describe, it, expect, vi } from "vitest";
import type { RemoteResource, ResourceProvider } from "../personalize/provider.js";
import { createWorkflowLogger, MemoryTransport } from "../logging/index.js";
import type { AWSContext } from "./arn.js";
import type { ResourceKind } from "./kinds.js";
import { ServiceModel, toServiceConfig } from "./service-model.js";

const context: AWSContext = { partition: "aws", region: "us-east-1", accountId: "111111111111" };
const PREFIX = "arn:aws:personalize:us-east-1:111111111111";
const DSG = `${PREFIX}:dataset-group/retail`;
const OTHER_DSG = `${PREFIX}:dataset-group/archive`;
const DATASET = `${PREFIX}:dataset/retail/INTERACTIONS`;
const SCHEMA = `${PREFIX}:schema/retail-interactions`;
const IMPORT = `${PREFIX}:dataset-import-job/import_1`;
const FILTER = `${PREFIX}:filter/popular`;
const TRACKER = `${PREFIX}:event-tracker/tracker`;
const SOLUTION = `${PREFIX}:solution/sims`;
const VERSION = `${PREFIX}:solution/sims/abc123`;
const CAMPAIGN = `${PREFIX}:campaign/sims-campaign`;
const BATCH = `${PREFIX}:batch-inference-job/batch_sims`;

const LISTINGS: Record<string, RemoteResource[]> = {
  "datasetGroup|": [{ datasetGroupArn: DSG }, { datasetGroupArn: OTHER_DSG }],
  [`dataset|${DSG}`]: [{ datasetArn: DATASET }],
  [`datasetImportJob|${DATASET}`]: [{ datasetImportJobArn: IMPORT }],
  [`eventTracker|${DSG}`]: [{ eventTrackerArn: TRACKER }],
  [`filter|${DSG}`]: [{ filterArn: FILTER }],
  [`solution|${DSG}`]: [{ solutionArn: SOLUTION }],
  [`solutionVersion|${SOLUTION}`]: [{ solutionVersionArn: VERSION }],
  [`campaign|${SOLUTION}`]: [{ campaignArn: CAMPAIGN }],
  [`batchInferenceJob|${VERSION}`]: [{ batchInferenceJobArn: BATCH }],
};

const SCHEMA_DOCUMENT = { type: "record", name: "Interactions", fields: [] };

const DESCRIPTIONS: Record<string, RemoteResource> = {
  [DSG]: {
    name: "retail",
    datasetGroupArn: DSG,
    domain: "ECOMMERCE",
    status: "ACTIVE",
    creationDateTime: new Date("2024-01-01T00:00:00Z"),
  },
  [DATASET]: {
    name: "retail-interactions",
    datasetArn: DATASET,
    datasetGroupArn: DSG,
    datasetType: "INTERACTIONS",
    schemaArn: SCHEMA,
    status: "ACTIVE",
  },
  [SCHEMA]: { name: "retail-interactions-schema", schemaArn: SCHEMA, schema: JSON.stringify(SCHEMA_DOCUMENT) },
  [FILTER]: {
    name: "popular",
    filterArn: FILTER,
    datasetGroupArn: DSG,
    filterExpression: 'EXCLUDE ItemID WHERE Items.CATEGORY IN ("hidden")',
    status: "ACTIVE",
  },
  [TRACKER]: {
    name: "tracker",
    eventTrackerArn: TRACKER,
    datasetGroupArn: DSG,
    accountId: "111111111111",
    trackingId: "tracking-id",
    status: "ACTIVE",
  },
  [SOLUTION]: {
    name: "sims",
    solutionArn: SOLUTION,
    datasetGroupArn: DSG,
    recipeArn: "arn:aws:personalize:::recipe/aws-sims",
    performHPO: false,
    latestSolutionVersion: { solutionVersionArn: VERSION, status: "ACTIVE" },
    status: "ACTIVE",
  },
  [CAMPAIGN]: {
    name: "sims-campaign",
    campaignArn: CAMPAIGN,
    solutionVersionArn: VERSION,
    minProvisionedTPS: 1,
    latestCampaignUpdate: { status: "ACTIVE" },
    status: "ACTIVE",
  },
  [BATCH]: {
    jobName: "batch_sims",
    batchInferenceJobArn: BATCH,
    solutionVersionArn: VERSION,
    roleArn: "roleArn",
    jobInput: { s3DataSource: { path: "s3://input" } },
    jobOutput: { s3DataDestination: { path: "s3://output" } },
    numResults: 25,
    status: "ACTIVE",
  },
};

function createProvider() {
  const provider = {
    describe: vi.fn(async (_kind: ResourceKind, arn: string) => DESCRIPTIONS[arn] ?? {}),
    list: vi.fn(async (kind: ResourceKind, parentArn?: string) => LISTINGS[`${kind}|${parentArn ?? ""}`] ?? []),
    create: vi.fn(),
    update: vi.fn(),
    getSolutionMetrics: vi.fn(),
  } satisfies ResourceProvider;
  return provider;
}

const logger = createWorkflowLogger("service-model", { transports: [new MemoryTransport()] });

describe("ServiceModel", () => {
  it("should record which dataset group owns each resource", async () => {
    const model = await ServiceModel.load(createProvider(), { context, logger });

    expect(model.ownedBy(CAMPAIGN, "retail")).toBe(true);
    expect(model.ownedBy(BATCH, DSG)).toBe(true);
    expect(model.ownedBy(CAMPAIGN, "archive")).toBe(false);
  });

  it("should report listed ARNs as unavailable", async () => {
    const model = await ServiceModel.load(createProvider(), { context, logger });

    expect(model.available(IMPORT)).toBe(false);
    expect(model.available(DSG)).toBe(false);
    expect(model.available(`${PREFIX}:campaign/new-campaign`)).toBe(true);
  });

  it("should only list the requested dataset group", async () => {
    const provider = createProvider();

    const model = await ServiceModel.load(provider, { context, logger, datasetGroup: "retail" });

    expect(provider.list).not.toHaveBeenCalledWith("datasetGroup");
    expect(model.children({ kind: "solution", arn: SOLUTION })).toEqual([
      { kind: "solutionVersion", arn: VERSION },
      { kind: "campaign", arn: CAMPAIGN },
    ]);
  });

  it("should export a dataset group as a configuration", async () => {
    const model = await ServiceModel.load(createProvider(), { context, logger, datasetGroup: DSG });

    const config = await model.exportConfig("retail", {
      import: "cron(0 0 * * ? *)",
      solutions: { sims: { full: "cron(0 0 ? * 1 *)" } },
    });

    expect(config).toEqual({
      datasetGroup: {
        serviceConfig: { name: "retail", domain: "ECOMMERCE" },
        workflowConfig: { schedules: { import: "cron(0 0 * * ? *)" } },
      },
      filters: [
        { serviceConfig: { name: "popular", filterExpression: 'EXCLUDE ItemID WHERE Items.CATEGORY IN ("hidden")' } },
      ],
      eventTracker: { serviceConfig: { name: "tracker" } },
      datasets: {
        interactions: {
          dataset: { serviceConfig: { name: "retail-interactions" } },
          schema: { serviceConfig: { name: "retail-interactions-schema", schema: SCHEMA_DOCUMENT } },
        },
      },
      solutions: [
        {
          serviceConfig: { name: "sims", recipeArn: "arn:aws:personalize:::recipe/aws-sims", performHPO: false },
          campaigns: [{ serviceConfig: { name: "sims-campaign", minProvisionedTPS: 1 } }],
          batchInferenceJobs: [{ serviceConfig: { numResults: 25 } }],
          workflowConfig: { schedules: { full: "cron(0 0 ? * 1 *)" } },
        },
      ],
    });
  });
});

describe("toServiceConfig", () => {
  it("should keep the recipe ARN and drop other ARNs", () => {
    expect(
      toServiceConfig("recommender", {
        name: "top-picks",
        recommenderArn: `${PREFIX}:recommender/top-picks`,
        recipeArn: "arn:aws:personalize:::recipe/aws-ecomm-recommended-for-you",
        latestRecommenderUpdate: { status: "ACTIVE" },
      }),
    ).toEqual({ name: "top-picks", recipeArn: "arn:aws:personalize:::recipe/aws-ecomm-recommended-for-you" });
  });
});
