/**
 * Amazon Personalize Resource Provider
 *
 * Describe, list, create and update calls for every resource kind, dispatched
 * through a static table instead of by composing SDK method names at run time.
 */

import {
  PersonalizeClient,
  CreateBatchInferenceJobCommand,
  CreateBatchSegmentJobCommand,
  CreateCampaignCommand,
  CreateDatasetCommand,
  CreateDatasetGroupCommand,
  CreateDatasetImportJobCommand,
  CreateEventTrackerCommand,
  CreateFilterCommand,
  CreateRecommenderCommand,
  CreateSchemaCommand,
  CreateSolutionCommand,
  CreateSolutionVersionCommand,
  DescribeBatchInferenceJobCommand,
  DescribeBatchSegmentJobCommand,
  DescribeCampaignCommand,
  DescribeDatasetCommand,
  DescribeDatasetGroupCommand,
  DescribeDatasetImportJobCommand,
  DescribeEventTrackerCommand,
  DescribeFilterCommand,
  DescribeRecommenderCommand,
  DescribeSchemaCommand,
  DescribeSolutionCommand,
  DescribeSolutionVersionCommand,
  GetSolutionMetricsCommand,
  ListBatchInferenceJobsCommand,
  ListBatchSegmentJobsCommand,
  ListCampaignsCommand,
  ListDatasetGroupsCommand,
  ListDatasetImportJobsCommand,
  ListDatasetsCommand,
  ListEventTrackersCommand,
  ListFiltersCommand,
  ListRecommendersCommand,
  ListSchemasCommand,
  ListSolutionVersionsCommand,
  ListSolutionsCommand,
  UpdateCampaignCommand,
  UpdateRecommenderCommand,
} from "@aws-sdk/client-personalize";
import { arnKey, type ResourceKind } from "../resource/kinds.js";
import {
  parseInput,
  CreateBatchInferenceJobInputSchema,
  CreateBatchSegmentJobInputSchema,
  CreateCampaignInputSchema,
  CreateDatasetGroupInputSchema,
  CreateDatasetImportJobInputSchema,
  CreateDatasetInputSchema,
  CreateEventTrackerInputSchema,
  CreateFilterInputSchema,
  CreateRecommenderInputSchema,
  CreateSchemaInputSchema,
  CreateSolutionInputSchema,
  CreateSolutionVersionInputSchema,
  UpdateCampaignInputSchema,
  UpdateRecommenderInputSchema,
} from "./schemas.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A described or listed resource as a plain record (`status`, `creationDateTime`, ...).
 */
export type RemoteResource = Record<string, unknown>;

export type PersonalizeSender = Pick<PersonalizeClient, "send">;

/**
 * The remote resource provider the reconciliation engine talks to.
 */
export interface ResourceProvider {
  describe(kind: ResourceKind, arn: string): Promise<RemoteResource>;
  list(kind: ResourceKind, parentArn?: string): Promise<RemoteResource[]>;
  /** Returns the ARN of the created resource */
  create(kind: ResourceKind, params: Record<string, unknown>): Promise<string>;
  update(kind: ResourceKind, arn: string, params: Record<string, unknown>): Promise<void>;
  getSolutionMetrics(solutionVersionArn: string): Promise<Record<string, number>>;
}

type ListPage = { items: RemoteResource[]; nextToken?: string };

interface KindOperations {
  describe(client: PersonalizeSender, arn: string): Promise<RemoteResource | undefined>;
  list(client: PersonalizeSender, parentArn: string | undefined, nextToken: string | undefined): Promise<ListPage>;
  create(client: PersonalizeSender, params: Record<string, unknown>): Promise<string | undefined>;
  update?(client: PersonalizeSender, arn: string, params: Record<string, unknown>): Promise<void>;
}

function records(items: object[] | undefined): RemoteResource[] {
  return (items ?? []).map((item) => ({ ...item }));
}

function body(value: object | undefined): RemoteResource | undefined {
  return value ? { ...value } : undefined;
}

// =============================================================================
// Operation Table
// =============================================================================

const OPERATIONS: Record<ResourceKind, KindOperations> = {
  datasetGroup: {
    describe: async (client, datasetGroupArn) =>
      body((await client.send(new DescribeDatasetGroupCommand({ datasetGroupArn }))).datasetGroup),
    list: async (client, _parentArn, nextToken) => {
      const out = await client.send(new ListDatasetGroupsCommand({ nextToken }));
      return { items: records(out.datasetGroups), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateDatasetGroup", CreateDatasetGroupInputSchema, params);
      return (await client.send(new CreateDatasetGroupCommand(input))).datasetGroupArn;
    },
  },
  schema: {
    describe: async (client, schemaArn) => body((await client.send(new DescribeSchemaCommand({ schemaArn }))).schema),
    list: async (client, _parentArn, nextToken) => {
      const out = await client.send(new ListSchemasCommand({ nextToken }));
      return { items: records(out.schemas), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateSchema", CreateSchemaInputSchema, params);
      return (await client.send(new CreateSchemaCommand(input))).schemaArn;
    },
  },
  dataset: {
    describe: async (client, datasetArn) => body((await client.send(new DescribeDatasetCommand({ datasetArn }))).dataset),
    list: async (client, datasetGroupArn, nextToken) => {
      const out = await client.send(new ListDatasetsCommand({ datasetGroupArn, nextToken }));
      return { items: records(out.datasets), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateDataset", CreateDatasetInputSchema, params);
      return (await client.send(new CreateDatasetCommand(input))).datasetArn;
    },
  },
  datasetImportJob: {
    describe: async (client, datasetImportJobArn) =>
      body((await client.send(new DescribeDatasetImportJobCommand({ datasetImportJobArn }))).datasetImportJob),
    list: async (client, datasetArn, nextToken) => {
      const out = await client.send(new ListDatasetImportJobsCommand({ datasetArn, nextToken }));
      return { items: records(out.datasetImportJobs), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateDatasetImportJob", CreateDatasetImportJobInputSchema, params);
      return (await client.send(new CreateDatasetImportJobCommand(input))).datasetImportJobArn;
    },
  },
  eventTracker: {
    describe: async (client, eventTrackerArn) =>
      body((await client.send(new DescribeEventTrackerCommand({ eventTrackerArn }))).eventTracker),
    list: async (client, datasetGroupArn, nextToken) => {
      const out = await client.send(new ListEventTrackersCommand({ datasetGroupArn, nextToken }));
      return { items: records(out.eventTrackers), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateEventTracker", CreateEventTrackerInputSchema, params);
      return (await client.send(new CreateEventTrackerCommand(input))).eventTrackerArn;
    },
  },
  filter: {
    describe: async (client, filterArn) => body((await client.send(new DescribeFilterCommand({ filterArn }))).filter),
    list: async (client, datasetGroupArn, nextToken) => {
      const out = await client.send(new ListFiltersCommand({ datasetGroupArn, nextToken }));
      return { items: records(out.Filters), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateFilter", CreateFilterInputSchema, params);
      return (await client.send(new CreateFilterCommand(input))).filterArn;
    },
  },
  solution: {
    describe: async (client, solutionArn) =>
      body((await client.send(new DescribeSolutionCommand({ solutionArn }))).solution),
    list: async (client, datasetGroupArn, nextToken) => {
      const out = await client.send(new ListSolutionsCommand({ datasetGroupArn, nextToken }));
      return { items: records(out.solutions), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateSolution", CreateSolutionInputSchema, params);
      return (await client.send(new CreateSolutionCommand(input))).solutionArn;
    },
  },
  solutionVersion: {
    describe: async (client, solutionVersionArn) =>
      body((await client.send(new DescribeSolutionVersionCommand({ solutionVersionArn }))).solutionVersion),
    list: async (client, solutionArn, nextToken) => {
      const out = await client.send(new ListSolutionVersionsCommand({ solutionArn, nextToken }));
      return { items: records(out.solutionVersions), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateSolutionVersion", CreateSolutionVersionInputSchema, params);
      return (await client.send(new CreateSolutionVersionCommand(input))).solutionVersionArn;
    },
  },
  campaign: {
    describe: async (client, campaignArn) =>
      body((await client.send(new DescribeCampaignCommand({ campaignArn }))).campaign),
    list: async (client, solutionArn, nextToken) => {
      const out = await client.send(new ListCampaignsCommand({ solutionArn, nextToken }));
      return { items: records(out.campaigns), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateCampaign", CreateCampaignInputSchema, params);
      return (await client.send(new CreateCampaignCommand(input))).campaignArn;
    },
    update: async (client, campaignArn, params) => {
      const input = parseInput("UpdateCampaign", UpdateCampaignInputSchema, { ...params, campaignArn });
      await client.send(new UpdateCampaignCommand(input));
    },
  },
  recommender: {
    describe: async (client, recommenderArn) =>
      body((await client.send(new DescribeRecommenderCommand({ recommenderArn }))).recommender),
    list: async (client, datasetGroupArn, nextToken) => {
      const out = await client.send(new ListRecommendersCommand({ datasetGroupArn, nextToken }));
      return { items: records(out.recommenders), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateRecommender", CreateRecommenderInputSchema, params);
      return (await client.send(new CreateRecommenderCommand(input))).recommenderArn;
    },
    update: async (client, recommenderArn, params) => {
      const input = parseInput("UpdateRecommender", UpdateRecommenderInputSchema, { ...params, recommenderArn });
      await client.send(new UpdateRecommenderCommand(input));
    },
  },
  batchInferenceJob: {
    describe: async (client, batchInferenceJobArn) =>
      body((await client.send(new DescribeBatchInferenceJobCommand({ batchInferenceJobArn }))).batchInferenceJob),
    list: async (client, solutionVersionArn, nextToken) => {
      const out = await client.send(new ListBatchInferenceJobsCommand({ solutionVersionArn, nextToken }));
      return { items: records(out.batchInferenceJobs), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateBatchInferenceJob", CreateBatchInferenceJobInputSchema, params);
      return (await client.send(new CreateBatchInferenceJobCommand(input))).batchInferenceJobArn;
    },
  },
  batchSegmentJob: {
    describe: async (client, batchSegmentJobArn) =>
      body((await client.send(new DescribeBatchSegmentJobCommand({ batchSegmentJobArn }))).batchSegmentJob),
    list: async (client, solutionVersionArn, nextToken) => {
      const out = await client.send(new ListBatchSegmentJobsCommand({ solutionVersionArn, nextToken }));
      return { items: records(out.batchSegmentJobs), nextToken: out.nextToken };
    },
    create: async (client, params) => {
      const input = parseInput("CreateBatchSegmentJob", CreateBatchSegmentJobInputSchema, params);
      return (await client.send(new CreateBatchSegmentJobCommand(input))).batchSegmentJobArn;
    },
  },
};

// =============================================================================
// Provider
// =============================================================================

export type PersonalizeProviderConfig = {
  region?: string;
  client?: PersonalizeSender;
};

/**
 * Thrown when the service answers without the resource a call promised.
 */
export class EmptyResponseError extends Error {
  constructor(operation: string) {
    super(`${operation} returned no resource`);
    this.name = "EmptyResponseError";
  }
}

export class PersonalizeResourceProvider implements ResourceProvider {
  private client: PersonalizeSender;

  constructor(config: PersonalizeProviderConfig = {}) {
    this.client = config.client ?? new PersonalizeClient({ region: config.region || "us-east-1" });
  }

  async describe(kind: ResourceKind, arn: string): Promise<RemoteResource> {
    const resource = await OPERATIONS[kind].describe(this.client, arn);
    if (!resource) throw new EmptyResponseError(`Describe ${kind} ${arn}`);
    return resource;
  }

  async list(kind: ResourceKind, parentArn?: string): Promise<RemoteResource[]> {
    const items: RemoteResource[] = [];
    let nextToken: string | undefined;
    do {
      const page = await OPERATIONS[kind].list(this.client, parentArn, nextToken);
      items.push(...page.items);
      nextToken = page.nextToken;
    } while (nextToken);
    return items;
  }

  async create(kind: ResourceKind, params: Record<string, unknown>): Promise<string> {
    const arn = await OPERATIONS[kind].create(this.client, params);
    if (!arn) throw new EmptyResponseError(`Create ${kind}`);
    return arn;
  }

  async update(kind: ResourceKind, arn: string, params: Record<string, unknown>): Promise<void> {
    const update = OPERATIONS[kind].update;
    if (!update) {
      throw new Error(`${kind} does not support update`);
    }
    await update(this.client, arn, params);
  }

  async getSolutionMetrics(solutionVersionArn: string): Promise<Record<string, number>> {
    const out = await this.client.send(new GetSolutionMetricsCommand({ solutionVersionArn }));
    return { ...out.metrics };
  }
}

/**
 * The ARN of a listed or described resource, e.g. `campaignArn` for campaigns.
 */
export function resourceArnOf(kind: ResourceKind, resource: RemoteResource): string | undefined {
  const value = resource[arnKey(kind)];
  return typeof value === "string" ? value : undefined;
}

export function createPersonalizeProvider(config?: PersonalizeProviderConfig): PersonalizeResourceProvider {
  return new PersonalizeResourceProvider(config);
}
