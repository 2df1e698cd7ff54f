/**
 * Allowed keys of a desired-state configuration document.
 *
 * A node is either a leaf (`true`, any value accepted), an object whose keys
 * are listed, or a list whose items share one shape.
 */

export type KeyNode = true | KeyObject | KeyList;

export type KeyObject = { readonly kind: "object"; readonly keys: Readonly<Record<string, KeyNode>> };
export type KeyList = { readonly kind: "list"; readonly item: KeyNode };

const object = (keys: Record<string, KeyNode>): KeyObject => ({ kind: "object", keys });
const list = (item: KeyNode): KeyList => ({ kind: "list", item });

const workflowConfig = (extra: Record<string, KeyNode> = {}): KeyObject =>
  object({ maxAge: true, timeStarted: true, ...extra });

const batchJob = object({
  serviceConfig: true,
  workflowConfig: workflowConfig({ schedule: true }),
});

const dataset = object({
  dataset: object({ serviceConfig: true, workflowConfig: workflowConfig() }),
  schema: object({ serviceConfig: true }),
  datasetImportJob: object({ serviceConfig: true, workflowConfig: workflowConfig() }),
});

export const CONFIGURATION_KEYS: KeyObject = object({
  datasetGroup: object({
    serviceConfig: true,
    workflowConfig: workflowConfig({ schedules: object({ import: true }) }),
  }),
  datasets: object({
    users: dataset,
    items: dataset,
    interactions: dataset,
  }),
  eventTracker: object({ serviceConfig: true, workflowConfig: workflowConfig() }),
  filters: list(object({ serviceConfig: true, workflowConfig: workflowConfig() })),
  solutions: list(
    object({
      serviceConfig: true,
      workflowConfig: workflowConfig({ schedules: object({ full: true, update: true }) }),
      solutionVersions: list(object({ serviceConfig: true, workflowConfig: workflowConfig() })),
      campaigns: list(object({ serviceConfig: true, workflowConfig: workflowConfig() })),
      batchInferenceJobs: list(batchJob),
      batchSegmentJobs: list(batchJob),
    }),
  ),
  recommenders: list(
    object({
      serviceConfig: true,
      workflowConfig: workflowConfig(),
      batchInferenceJobs: list(batchJob),
      batchSegmentJobs: list(batchJob),
    }),
  ),
  // set when the configuration is accepted
  bucket: true,
  currentDate: true,
});

/** Recipes whose solutions may train with `trainingMode: UPDATE` */
export const UPDATABLE_RECIPES: readonly string[] = [
  "arn:aws:personalize:::recipe/aws-hrnn-coldstart",
  "arn:aws:personalize:::recipe/aws-user-personalization",
];

export const DATASET_TYPES = ["users", "items", "interactions"] as const;

export const MAX_JOB_NAME_LENGTH = 63;
