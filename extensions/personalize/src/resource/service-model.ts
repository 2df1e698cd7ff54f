/**
 * Service Model
 *
 * A snapshot of the resources that exist under one or all dataset groups,
 * listed through the registry's parent links. Used to answer ownership and
 * availability questions and to export a live dataset group as a
 * configuration document.
 */

import { resourceArnOf, type RemoteResource, type ResourceProvider } from "../personalize/provider.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { buildResourceArn, datasetGroupArnOf, type AWSContext } from "./arn.js";
import { childKinds, type ResourceKind } from "./kinds.js";
import { ResourceTree, type ResourceElement } from "./tree.js";

export type ExportSchedules = {
  import?: string;
  /** Keyed by solution name */
  solutions?: Record<string, { full?: string; update?: string }>;
};

export type ServiceModelOptions = {
  context: AWSContext;
  /** Only list this dataset group (name or ARN) */
  datasetGroup?: string;
  logger?: WorkflowLogger;
};

const DATASET_TYPES = ["USERS", "ITEMS", "INTERACTIONS"] as const;

/** Describe fields the service generates, never part of a configuration */
const GENERATED_FIELDS = new Set([
  "status",
  "creationDateTime",
  "lastUpdatedDateTime",
  "accountId",
  "trackingId",
  "datasetType",
  "latestSolutionVersion",
  "latestCampaignUpdate",
  "latestRecommenderUpdate",
  "failureReason",
  "jobInput",
  "jobOutput",
  "jobName",
  "roleArn",
  "modelMetrics",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Strip a described resource down to the fields a configuration declares.
 */
export function toServiceConfig(kind: ResourceKind, resource: RemoteResource): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(resource)) {
    if (key.endsWith("Arn") && key !== "recipeArn") continue;
    if (GENERATED_FIELDS.has(key)) continue;
    config[key] = value;
  }

  if (kind === "schema" && typeof config.schema === "string") {
    config.schema = JSON.parse(config.schema);
  }
  return config;
}

export class ServiceModel {
  private readonly tree = new ResourceTree();
  /** resource ARN -> owning dataset group ARN */
  private readonly ownership = new Map<string, string>();

  private constructor(
    private readonly provider: ResourceProvider,
    private readonly context: AWSContext,
    private readonly logger: WorkflowLogger,
  ) {}

  /**
   * List every dataset group, or the one named in `options`, with all its descendants.
   */
  static async load(provider: ResourceProvider, options: ServiceModelOptions): Promise<ServiceModel> {
    const model = new ServiceModel(provider, options.context, options.logger ?? getWorkflowLogger("service-model"));

    let datasetGroups: string[];
    if (options.datasetGroup) {
      datasetGroups = [datasetGroupArnOf(options.datasetGroup, options.context)];
    } else {
      const listed = await provider.list("datasetGroup");
      datasetGroups = listed.flatMap((item) => resourceArnOf("datasetGroup", item) ?? []);
    }

    for (const arn of datasetGroups) {
      await model.listChildren({ kind: "datasetGroup", arn }, arn);
    }
    return model;
  }

  /**
   * Whether `arn` was listed under `datasetGroup`, given as a name or an ARN.
   */
  ownedBy(arn: string, datasetGroup: string): boolean {
    return this.ownership.get(arn) === datasetGroupArnOf(datasetGroup, this.context);
  }

  /**
   * Whether `arn` is free: neither a listed resource nor a listed dataset group.
   */
  available(arn: string): boolean {
    if (this.ownership.has(arn)) return false;
    for (const owner of this.ownership.values()) {
      if (owner === arn) return false;
    }
    return true;
  }

  children(of: ResourceElement, kind?: ResourceKind): ResourceElement[] {
    return this.tree.children(of, (element) => kind === undefined || element.kind === kind);
  }

  /**
   * Rebuild a configuration document from the live resources of a dataset group.
   */
  async exportConfig(datasetGroupName: string, schedules?: ExportSchedules): Promise<Record<string, unknown>> {
    const datasetGroup: ResourceElement = {
      kind: "datasetGroup",
      arn: buildResourceArn("datasetGroup", datasetGroupName, this.context),
    };

    const config: Record<string, unknown> = {
      datasetGroup: { serviceConfig: await this.serviceConfig(datasetGroup) },
    };

    const filters = this.children(datasetGroup, "filter");
    if (filters.length > 0) {
      config.filters = await Promise.all(filters.map(async (f) => ({ serviceConfig: await this.serviceConfig(f) })));
    }

    const [eventTracker] = this.children(datasetGroup, "eventTracker");
    if (eventTracker) {
      config.eventTracker = { serviceConfig: await this.serviceConfig(eventTracker) };
    }

    const datasets = await this.exportDatasets(datasetGroup);
    if (Object.keys(datasets).length > 0) config.datasets = datasets;

    const solutions = await this.exportSolutions(datasetGroup);
    if (solutions.length > 0) config.solutions = solutions;

    const recommenders = this.children(datasetGroup, "recommender");
    if (recommenders.length > 0) {
      config.recommenders = await Promise.all(
        recommenders.map(async (r) => ({ serviceConfig: await this.serviceConfig(r) })),
      );
    }

    if (schedules) this.attachSchedules(config, schedules);
    return config;
  }

  private async listChildren(parent: ResourceElement, datasetGroupArn: string): Promise<void> {
    for (const kind of childKinds(parent.kind)) {
      const listed = await this.provider.list(kind, parent.arn);
      for (const item of listed) {
        const arn = resourceArnOf(kind, item);
        if (!arn) continue;
        this.logger.debug(`listing children of ${arn}`);
        const child: ResourceElement = { kind, arn };
        this.tree.add(parent, child);
        this.ownership.set(arn, datasetGroupArn);
        await this.listChildren(child, datasetGroupArn);
      }
    }
  }

  private async serviceConfig(element: ResourceElement): Promise<Record<string, unknown>> {
    return toServiceConfig(element.kind, await this.provider.describe(element.kind, element.arn));
  }

  private async exportDatasets(datasetGroup: ResourceElement): Promise<Record<string, unknown>> {
    const datasets: Record<string, unknown> = {};
    for (const type of DATASET_TYPES) {
      const [dataset] = this.children(datasetGroup, "dataset").filter((d) => d.arn.endsWith(`/${type}`));
      if (!dataset) continue;

      const described = await this.provider.describe("dataset", dataset.arn);
      const entry: Record<string, unknown> = { dataset: { serviceConfig: toServiceConfig("dataset", described) } };
      if (typeof described.schemaArn === "string") {
        const schema = await this.provider.describe("schema", described.schemaArn);
        entry.schema = { serviceConfig: toServiceConfig("schema", schema) };
      }
      datasets[type.toLowerCase()] = entry;
    }
    return datasets;
  }

  private async exportSolutions(datasetGroup: ResourceElement): Promise<Record<string, unknown>[]> {
    const solutions: Record<string, unknown>[] = [];
    for (const solution of this.children(datasetGroup, "solution")) {
      const entry: Record<string, unknown> = { serviceConfig: await this.serviceConfig(solution) };

      const campaigns = this.children(solution, "campaign");
      if (campaigns.length > 0) {
        entry.campaigns = await Promise.all(
          campaigns.map(async (c) => ({ serviceConfig: await this.serviceConfig(c) })),
        );
      }

      const batchJobs = this.children(solution, "solutionVersion").flatMap((version) =>
        this.children(version, "batchInferenceJob"),
      );
      if (batchJobs.length > 0) {
        entry.batchInferenceJobs = await Promise.all(
          batchJobs.map(async (job) => ({ serviceConfig: await this.serviceConfig(job) })),
        );
      }
      solutions.push(entry);
    }
    return solutions;
  }

  private attachSchedules(config: Record<string, unknown>, schedules: ExportSchedules): void {
    if (schedules.import && isRecord(config.datasetGroup)) {
      config.datasetGroup.workflowConfig = { schedules: { import: schedules.import } };
    }

    const solutions = config.solutions;
    if (!Array.isArray(solutions) || !schedules.solutions) return;
    for (const solution of solutions) {
      if (!isRecord(solution) || !isRecord(solution.serviceConfig)) continue;
      const name = solution.serviceConfig.name;
      const solutionSchedules = typeof name === "string" ? schedules.solutions[name] : undefined;
      if (solutionSchedules) {
        solution.workflowConfig = { schedules: solutionSchedules };
      }
    }
  }
}
