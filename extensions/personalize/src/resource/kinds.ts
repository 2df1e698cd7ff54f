/**
 * Resource kind registry
 *
 * A static table over the closed set of Amazon Personalize resource kinds the
 * workflow manages. Everything the engine needs to know about a kind (how it is
 * located, whether it can be updated, which fields never round-trip) is read
 * from here rather than derived from naming conventions at run time.
 */

import { ResourceName } from "./name.js";

// =============================================================================
// Kinds
// =============================================================================

export const RESOURCE_KINDS = [
  "datasetGroup",
  "schema",
  "dataset",
  "datasetImportJob",
  "eventTracker",
  "filter",
  "solution",
  "solutionVersion",
  "campaign",
  "recommender",
  "batchInferenceJob",
  "batchSegmentJob",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export function isResourceKind(value: unknown): value is ResourceKind {
  return typeof value === "string" && (RESOURCE_KINDS as readonly string[]).includes(value);
}

/**
 * How an existing resource is found before deciding to create it.
 *
 * - `by-name`: the ARN is derived from the configured name and described directly.
 * - `by-dataset-type`: list the parent's children and match `datasetType`.
 * - `active-or-creating`: list the parent's children and take one that is active or creating.
 * - `current`: list the parent's children and take the newest that passes the
 *   staleness predicate, matching `nameKey` first. `freshness: "source-data"` consults
 *   the import's S3 data to decide whether a stale candidate can be replaced.
 */
export type LocateStrategy =
  | { type: "by-name" }
  | { type: "by-dataset-type" }
  | { type: "active-or-creating" }
  | { type: "current"; nameKey: string; freshness: "source-data" | "policy" };

export interface ResourceKindSpec {
  readonly kind: ResourceKind;
  readonly name: ResourceName;
  /** Kind whose list call enumerates this kind */
  readonly parent?: ResourceKind;
  /** Limit errors on create/update are capacity waits, not failures */
  readonly hasSoftLimit: boolean;
  /** Empty when the service has no update call for the kind */
  readonly updatableFields: readonly string[];
  readonly locate: LocateStrategy;
  /** Dotted paths into the described resource, first present wins; empty for status-less kinds */
  readonly statusPaths: readonly string[];
  /** Workflow-only fields: removed before create and never compared */
  readonly workflowFields: readonly string[];
  /** Fields the service never echoes back on describe */
  readonly uncomparedFields: readonly string[];
  readonly caseInsensitiveFields: readonly string[];
  /** Fields holding JSON documents serialized as strings */
  readonly jsonFields: readonly string[];
  /** Whether describing the resource records its offline metrics */
  readonly recordsOfflineMetrics: boolean;
  /** Field holding the values of the newest update, overlaid before comparing */
  readonly latestUpdateField?: string;
}

const WORKFLOW_FIELDS = ["maxAge", "timeStarted"] as const;
const BATCH_JOB_UNECHOED = ["tags", "jobName", "jobInput", "jobOutput", "roleArn"] as const;

type KindOverrides = Partial<Omit<ResourceKindSpec, "kind" | "name">>;

function defineKind(kind: ResourceKind, overrides: KindOverrides = {}): ResourceKindSpec {
  return {
    kind,
    name: new ResourceName(kind),
    hasSoftLimit: false,
    updatableFields: [],
    locate: { type: "by-name" },
    statusPaths: ["status"],
    workflowFields: WORKFLOW_FIELDS,
    uncomparedFields: ["tags"],
    caseInsensitiveFields: [],
    jsonFields: [],
    recordsOfflineMetrics: false,
    ...overrides,
  };
}

export const RESOURCE_KIND_SPECS: Readonly<Record<ResourceKind, ResourceKindSpec>> = {
  datasetGroup: defineKind("datasetGroup"),
  schema: defineKind("schema", {
    statusPaths: [],
    jsonFields: ["schema"],
  }),
  dataset: defineKind("dataset", {
    parent: "datasetGroup",
    locate: { type: "by-dataset-type" },
    caseInsensitiveFields: ["datasetType"],
  }),
  datasetImportJob: defineKind("datasetImportJob", {
    parent: "dataset",
    hasSoftLimit: true,
    locate: { type: "current", nameKey: "jobName", freshness: "source-data" },
    uncomparedFields: ["tags", "jobName", "dataSource", "roleArn"],
  }),
  eventTracker: defineKind("eventTracker", {
    parent: "datasetGroup",
    locate: { type: "active-or-creating" },
  }),
  filter: defineKind("filter", { parent: "datasetGroup" }),
  solution: defineKind("solution", { parent: "datasetGroup" }),
  solutionVersion: defineKind("solutionVersion", {
    parent: "solution",
    hasSoftLimit: true,
    locate: { type: "current", nameKey: "solutionVersionArn", freshness: "policy" },
    workflowFields: [...WORKFLOW_FIELDS, "solutionVersionArn"],
    uncomparedFields: ["tags", "trainingMode"],
    recordsOfflineMetrics: true,
  }),
  campaign: defineKind("campaign", {
    parent: "solution",
    updatableFields: ["solutionVersionArn", "minProvisionedTPS", "campaignConfig"],
    statusPaths: ["latestCampaignUpdate.status", "status"],
    latestUpdateField: "latestCampaignUpdate",
  }),
  recommender: defineKind("recommender", {
    parent: "datasetGroup",
    updatableFields: ["recommenderConfig"],
    statusPaths: ["latestRecommenderUpdate.status", "status"],
    latestUpdateField: "latestRecommenderUpdate",
  }),
  batchInferenceJob: defineKind("batchInferenceJob", {
    parent: "solutionVersion",
    hasSoftLimit: true,
    locate: { type: "current", nameKey: "jobName", freshness: "policy" },
    uncomparedFields: BATCH_JOB_UNECHOED,
  }),
  batchSegmentJob: defineKind("batchSegmentJob", {
    parent: "solutionVersion",
    hasSoftLimit: true,
    locate: { type: "current", nameKey: "jobName", freshness: "policy" },
    uncomparedFields: BATCH_JOB_UNECHOED,
  }),
};

export function getKindSpec(kind: ResourceKind): ResourceKindSpec {
  return RESOURCE_KIND_SPECS[kind];
}

/**
 * Kinds listed directly under `kind`, in registry order.
 */
export function childKinds(kind: ResourceKind): ResourceKind[] {
  return RESOURCE_KINDS.filter((k) => RESOURCE_KIND_SPECS[k].parent === kind);
}

export function supportsUpdate(kind: ResourceKind): boolean {
  return RESOURCE_KIND_SPECS[kind].updatableFields.length > 0;
}

/**
 * `datasetGroup` -> `datasetGroupArn`
 */
export function arnKey(kind: ResourceKind): string {
  return `${kind}Arn`;
}

/**
 * Metric emitted once per successful create, e.g. `DatasetImportJobCreated`.
 */
export function createdMetricName(kind: ResourceKind): string {
  return `${RESOURCE_KIND_SPECS[kind].name.pascal}Created`;
}
