/**
 * Desired-state configuration validation
 *
 * Every check runs and contributes its messages; a configuration is accepted
 * only when the list of errors is empty. Shapes of `serviceConfig` blocks are
 * checked against the service input schemas, with placeholders standing in
 * for the values the workflow supplies at run time.
 */

import type { TSchema } from "@sinclair/typebox";
import {
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
  schemaErrors,
} from "../personalize/schemas.js";
import { buildResourceArn, type AWSContext } from "../resource/arn.js";
import type { ResourceKind } from "../resource/kinds.js";
import { ScheduleError, validateSchedule } from "../scheduler/schedule.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { applyDefaults, formatCurrentDate, isRecord, type ConfigDocument } from "./defaults.js";
import {
  CONFIGURATION_KEYS,
  DATASET_TYPES,
  MAX_JOB_NAME_LENGTH,
  UPDATABLE_RECIPES,
  type KeyNode,
} from "./schema.js";

// =============================================================================
// Types
// =============================================================================

export type ConfigValidationResult = {
  valid: boolean;
  errors: string[];
  /** The configuration with defaults applied, present when valid */
  config?: ConfigDocument;
  /** Dataset group name, `UNKNOWN` when none could be read */
  datasetGroup: string;
};

export interface ConfigValidatorOptions {
  clock?: () => Date;
  logger?: WorkflowLogger;
}

const VALIDATION_CONTEXT: AWSContext = {
  partition: "aws",
  region: "us-east-1",
  accountId: "000000000000",
};

const placeholderArn = (kind: ResourceKind): string => buildResourceArn(kind, "validation", VALIDATION_CONTEXT);

const BATCH_JOB_PLACEHOLDERS = {
  roleArn: "roleArn",
  jobInput: { s3DataSource: { path: "s3://data-source" } },
  jobOutput: { s3DataDestination: { path: "s3://data-destination" } },
};

/**
 * Name given to the batch jobs of a solution started at `currentDate`.
 */
export function batchJobName(solutionName: string, currentDate: string): string {
  return `batch_${solutionName}_${currentDate}`;
}

/**
 * Check an Avro record schema declaration, returning the first problem.
 */
export function avroSchemaProblem(schema: unknown): string | undefined {
  let document = schema;
  if (typeof document === "string") {
    try {
      document = JSON.parse(document);
    } catch (err) {
      return `not valid JSON (${err instanceof Error ? err.message : String(err)})`;
    }
  }
  if (!isRecord(document)) return "a schema must be an object";
  if (document.type !== "record") return `type must be "record", got ${JSON.stringify(document.type)}`;
  if (typeof document.name !== "string" || document.name === "") return "a record must have a name";
  if (!Array.isArray(document.fields)) return `record ${document.name} must have a list of fields`;

  const seen = new Set<string>();
  for (const [idx, field] of document.fields.entries()) {
    if (!isRecord(field) || typeof field.name !== "string" || field.type === undefined) {
      return `field ${idx} of record ${document.name} must have a name and a type`;
    }
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(field.name)) {
      return `"${field.name}" is not a valid field name`;
    }
    if (seen.has(field.name)) return `duplicate field name "${field.name}"`;
    seen.add(field.name);
  }
  return undefined;
}

function findDuplicates(values: string[]): string[] {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  return [...counts].filter(([, count]) => count > 1).map(([value]) => value);
}

function recordAt(value: unknown, ...path: string[]): Record<string, unknown> | undefined {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return isRecord(current) ? current : undefined;
}

function valueAt(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function nameOf(serviceConfig: unknown): string | undefined {
  return isRecord(serviceConfig) && typeof serviceConfig.name === "string" ? serviceConfig.name : undefined;
}

// =============================================================================
// Validator
// =============================================================================

export class ConfigurationValidator {
  private errors: string[] = [];
  private config: ConfigDocument = {};
  private datasetGroup = "UNKNOWN";
  private currentDate = "";
  private readonly clock: () => Date;
  private readonly logger: WorkflowLogger;

  constructor(options: ConfigValidatorOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getWorkflowLogger("config");
  }

  /**
   * Validate a configuration given as JSON text or as an already decoded value.
   */
  validate(content: unknown): ConfigValidationResult {
    this.errors = [];
    this.datasetGroup = "UNKNOWN";
    const now = this.clock();
    this.currentDate = formatCurrentDate(now);
    this.config = this.decode(content);

    this.checkNotEmpty();
    this.checkKeys(this.config, CONFIGURATION_KEYS, "");
    this.checkDatasetGroup();
    this.checkSchemas();
    this.checkDatasets();
    this.checkEventTracker();
    this.checkFilters();
    this.checkSolutions();
    this.checkRecommenders();
    this.checkSolutionUpdates();
    this.checkSchedules();
    this.checkNaming();

    const errors = this.errors;
    if (errors.length > 0) {
      return { valid: false, errors, datasetGroup: this.datasetGroup };
    }
    return { valid: true, errors, config: applyDefaults(this.config, now), datasetGroup: this.datasetGroup };
  }

  private decode(content: unknown): ConfigDocument {
    let decoded = content;
    if (typeof content === "string") {
      try {
        decoded = JSON.parse(content);
      } catch (err) {
        this.errors.push(`Could not validate JSON: ${err instanceof Error ? err.message : String(err)}`);
        return {};
      }
    }
    if (decoded === undefined || decoded === null) return {};
    if (!isRecord(decoded)) {
      this.errors.push("Configuration must be an object");
      return {};
    }
    return structuredClone(decoded);
  }

  private checkShape(schema: TSchema, value: Record<string, unknown>, path: string): void {
    this.errors.push(...schemaErrors(schema, value, path));
  }

  private checkNotEmpty(): void {
    if (Object.keys(this.config).length === 0) {
      this.errors.push("Configuration should not be empty");
    }
  }

  private checkKeys(value: unknown, node: KeyNode, path: string): void {
    if (node === true) return;

    if (node.kind === "list") {
      // type mismatches are reported by the resource checks
      if (!Array.isArray(value)) return;
      value.forEach((item, idx) => this.checkKeys(item, node.item, `${path}[${idx}]`));
      return;
    }

    if (!isRecord(value)) return;
    for (const [key, nested] of Object.entries(value)) {
      const current = path ? `${path}.${key}` : key;
      const allowed = node.keys[key];
      if (allowed === undefined) {
        this.errors.push(`key ${current} is not an allowed key`);
        continue;
      }
      this.checkKeys(nested, allowed, current);
    }
  }

  private checkDatasetGroup(): void {
    const path = "datasetGroup.serviceConfig";
    const serviceConfig = valueAt(this.config, "datasetGroup", "serviceConfig");
    if (!serviceConfig) {
      this.errors.push("A datasetGroup must be provided at path datasetGroup");
      return;
    }
    if (!isRecord(serviceConfig)) {
      this.errors.push(`${path} must be an object`);
      return;
    }

    this.checkShape(CreateDatasetGroupInputSchema, serviceConfig, path);
    this.datasetGroup = nameOf(serviceConfig) ?? this.datasetGroup;
  }

  private checkSchemas(): void {
    for (const type of DATASET_TYPES) {
      const path = `datasets.${type}.schema.serviceConfig`;
      const serviceConfig = valueAt(this.config, "datasets", type, "schema", "serviceConfig");
      if (!serviceConfig) continue;
      if (!isRecord(serviceConfig)) {
        this.errors.push(`${path} must be an object`);
        continue;
      }

      const name = serviceConfig.name;
      const schema = serviceConfig.schema;
      if (!name) this.errors.push(`The ${type} schema name is missing`);
      if (!schema) {
        this.errors.push(`The ${type} schema is missing`);
        continue;
      }

      const problem = avroSchemaProblem(schema);
      if (problem) {
        this.errors.push(`The ${type} schema is not valid: ${problem}`);
        continue;
      }
      if (!name) continue;

      const serialized = typeof schema === "string" ? schema : JSON.stringify(schema);
      this.checkShape(CreateSchemaInputSchema, { ...serviceConfig, schema: serialized }, path);
    }
  }

  private checkDatasets(): void {
    const datasets = valueAt(this.config, "datasets");
    if (!datasets) {
      this.logger.warn("typical usage includes a dataset declaration");
      return;
    }
    if (!isRecord(datasets)) {
      this.errors.push("datasets must be an object");
      return;
    }

    if (!valueAt(datasets, "interactions", "dataset", "serviceConfig")) {
      this.errors.push("You must at minimum create an interactions dataset and declare its schema");
    }

    for (const type of DATASET_TYPES) {
      const path = `datasets.${type}.dataset.serviceConfig`;
      const serviceConfig = valueAt(datasets, type, "dataset", "serviceConfig");
      if (!serviceConfig) continue;
      if (!isRecord(serviceConfig)) {
        this.errors.push(`${path} must be an object`);
        continue;
      }
      this.checkShape(
        CreateDatasetInputSchema,
        {
          ...serviceConfig,
          datasetGroupArn: placeholderArn("datasetGroup"),
          schemaArn: placeholderArn("schema"),
          datasetType: type,
        },
        path,
      );

      const importPath = `datasets.${type}.datasetImportJob.serviceConfig`;
      const importJob = valueAt(datasets, type, "datasetImportJob", "serviceConfig");
      if (importJob === undefined) continue;
      if (!isRecord(importJob)) {
        this.errors.push(`${importPath} must be an object`);
        continue;
      }
      this.checkShape(
        CreateDatasetImportJobInputSchema,
        {
          ...importJob,
          jobName: "validation",
          datasetArn: placeholderArn("dataset"),
          dataSource: { dataLocation: "s3://data-source" },
          roleArn: "roleArn",
        },
        importPath,
      );
    }
  }

  private checkEventTracker(): void {
    const path = "eventTracker.serviceConfig";
    const serviceConfig = valueAt(this.config, "eventTracker", "serviceConfig");
    if (!serviceConfig) return;
    if (!isRecord(serviceConfig)) {
      this.errors.push(`${path} must be an object`);
      return;
    }
    this.checkShape(
      CreateEventTrackerInputSchema,
      { ...serviceConfig, datasetGroupArn: placeholderArn("datasetGroup") },
      path,
    );
  }

  private checkFilters(): void {
    const filters = valueAt(this.config, "filters");
    if (filters === undefined) return;
    if (!Array.isArray(filters)) {
      this.errors.push("filters must be a list");
      return;
    }

    filters.forEach((filter: unknown, idx) => {
      const path = `filters[${idx}].serviceConfig`;
      const serviceConfig = valueAt(filter, "serviceConfig");
      if (!isRecord(serviceConfig)) {
        this.errors.push(`${path} must be an object`);
        return;
      }
      this.checkShape(
        CreateFilterInputSchema,
        { ...serviceConfig, datasetGroupArn: placeholderArn("datasetGroup") },
        path,
      );
    });
  }

  private checkSolutions(): void {
    const solutions = valueAt(this.config, "solutions");
    if (solutions === undefined) return;
    if (!Array.isArray(solutions)) {
      this.errors.push("solutions must be a list");
      return;
    }

    solutions.forEach((solution: unknown, idx) => {
      const path = `solutions[${idx}]`;
      if (!isRecord(solution)) {
        this.errors.push(`${path} must be an object`);
        return;
      }
      const solutionName = nameOf(solution.serviceConfig) ?? "";

      this.checkList(solution, "solutionVersions", path, (version, versionPath) => {
        const serviceConfig = version.serviceConfig ?? {};
        if (!isRecord(serviceConfig)) {
          this.errors.push(`${versionPath}.serviceConfig must be an object`);
          return;
        }
        this.checkShape(
          CreateSolutionVersionInputSchema,
          { ...serviceConfig, solutionArn: placeholderArn("solution") },
          `${versionPath}.serviceConfig`,
        );
      });

      this.checkList(solution, "campaigns", path, (campaign, campaignPath) => {
        const serviceConfig = campaign.serviceConfig;
        if (!isRecord(serviceConfig)) {
          this.errors.push(`${campaignPath}.serviceConfig must be an object`);
          return;
        }
        this.checkShape(
          CreateCampaignInputSchema,
          { ...serviceConfig, solutionVersionArn: buildResourceArn("solutionVersion", "validation", VALIDATION_CONTEXT) },
          `${campaignPath}.serviceConfig`,
        );
      });

      this.checkBatchJobs(solution, path, solutionName);

      const serviceConfig = solution.serviceConfig;
      if (!isRecord(serviceConfig)) {
        this.errors.push(`${path}.serviceConfig must be an object`);
        return;
      }
      this.checkShape(
        CreateSolutionInputSchema,
        { ...serviceConfig, datasetGroupArn: placeholderArn("datasetGroup") },
        `${path}.serviceConfig`,
      );
    });
  }

  private checkRecommenders(): void {
    const recommenders = valueAt(this.config, "recommenders");
    if (recommenders === undefined) return;
    if (!Array.isArray(recommenders)) {
      this.errors.push("recommenders must be a list");
      return;
    }

    recommenders.forEach((recommender: unknown, idx) => {
      const path = `recommenders[${idx}]`;
      if (!isRecord(recommender)) {
        this.errors.push(`${path} must be an object`);
        return;
      }
      this.checkBatchJobs(recommender, path, nameOf(recommender.serviceConfig) ?? "");

      const serviceConfig = recommender.serviceConfig;
      if (!isRecord(serviceConfig)) {
        this.errors.push(`${path}.serviceConfig must be an object`);
        return;
      }
      this.checkShape(
        CreateRecommenderInputSchema,
        { ...serviceConfig, datasetGroupArn: placeholderArn("datasetGroup") },
        `${path}.serviceConfig`,
      );
    });
  }

  private checkList(
    parent: Record<string, unknown>,
    key: string,
    path: string,
    check: (item: Record<string, unknown>, itemPath: string) => void,
  ): void {
    const items = parent[key];
    if (items === undefined) return;
    if (!Array.isArray(items)) {
      this.errors.push(`${path}.${key} must be a list`);
      return;
    }
    items.forEach((item: unknown, idx) => {
      const itemPath = `${path}.${key}[${idx}]`;
      if (!isRecord(item)) {
        this.errors.push(`${itemPath} must be an object`);
        return;
      }
      check(item, itemPath);
    });
  }

  private checkBatchJobs(parent: Record<string, unknown>, path: string, ownerName: string): void {
    const jobs = [
      { key: "batchInferenceJobs", label: "batch inference job", schema: CreateBatchInferenceJobInputSchema },
      { key: "batchSegmentJobs", label: "batch segment job", schema: CreateBatchSegmentJobInputSchema },
    ];

    for (const { key, label, schema } of jobs) {
      this.checkList(parent, key, path, (job, jobPath) => {
        const serviceConfig = job.serviceConfig;
        if (!isRecord(serviceConfig)) {
          this.errors.push(`${jobPath}.serviceConfig must be an object`);
          return;
        }

        // the service does not check job name length before the call
        const jobName = batchJobName(ownerName, this.currentDate);
        if (jobName.length > MAX_JOB_NAME_LENGTH) {
          this.errors.push(
            `The generated ${label} name ${jobName} is longer than ${MAX_JOB_NAME_LENGTH} characters. Use a shorter solution name.`,
          );
          return;
        }

        this.checkShape(
          schema,
          {
            ...serviceConfig,
            ...BATCH_JOB_PLACEHOLDERS,
            jobName,
            solutionVersionArn: buildResourceArn("solutionVersion", "validation", VALIDATION_CONTEXT),
          },
          `${jobPath}.serviceConfig`,
        );
      });
    }
  }

  private checkSolutionUpdates(): void {
    const solutions = valueAt(this.config, "solutions");
    if (!Array.isArray(solutions)) return;

    for (const solution of solutions) {
      if (!valueAt(solution, "workflowConfig", "schedules", "update")) continue;
      const recipe = valueAt(solution, "serviceConfig", "recipeArn");
      if (typeof recipe === "string" && UPDATABLE_RECIPES.includes(recipe)) continue;
      this.errors.push(
        `solution ${nameOf(valueAt(solution, "serviceConfig")) ?? "UNKNOWN"} does not support solution version incremental updates - please use \`full\` instead of \`update\`.`,
      );
    }
  }

  private *schedules(): Generator<{ path: string; value: unknown }> {
    yield {
      path: "datasetGroup.workflowConfig.schedules.import",
      value: valueAt(this.config, "datasetGroup", "workflowConfig", "schedules", "import"),
    };

    const batchSchedules = function* (owner: unknown, path: string): Generator<{ path: string; value: unknown }> {
      for (const key of ["batchInferenceJobs", "batchSegmentJobs"]) {
        const jobs = valueAt(owner, key);
        if (!Array.isArray(jobs)) continue;
        for (const [idx, job] of jobs.entries()) {
          yield {
            path: `${path}.${key}[${idx}].workflowConfig.schedule`,
            value: valueAt(job, "workflowConfig", "schedule"),
          };
        }
      }
    };

    const solutions = valueAt(this.config, "solutions");
    if (Array.isArray(solutions)) {
      for (const [idx, solution] of solutions.entries()) {
        for (const kind of ["full", "update"]) {
          yield {
            path: `solutions[${idx}].workflowConfig.schedules.${kind}`,
            value: valueAt(solution, "workflowConfig", "schedules", kind),
          };
        }
        yield* batchSchedules(solution, `solutions[${idx}]`);
      }
    }

    const recommenders = valueAt(this.config, "recommenders");
    if (Array.isArray(recommenders)) {
      for (const [idx, recommender] of recommenders.entries()) {
        yield* batchSchedules(recommender, `recommenders[${idx}]`);
      }
    }
  }

  private checkSchedules(): void {
    for (const { path, value } of this.schedules()) {
      if (value === undefined || value === null || value === "") continue;
      if (typeof value !== "string") {
        this.errors.push(`unexpected type at path ${path}, expected string`);
        continue;
      }
      try {
        validateSchedule(value);
      } catch (err) {
        if (!(err instanceof ScheduleError)) throw err;
        this.errors.push(err.message);
      }
    }
  }

  private checkNaming(): void {
    const solutions = valueAt(this.config, "solutions");
    if (!Array.isArray(solutions)) return;

    const solutionNames: string[] = [];
    const campaignNames: string[] = [];
    for (const solution of solutions) {
      const name = nameOf(valueAt(solution, "serviceConfig"));
      if (name) solutionNames.push(name);
      const campaigns = valueAt(solution, "campaigns");
      if (!Array.isArray(campaigns)) continue;
      for (const campaign of campaigns) {
        const campaignName = nameOf(recordAt(campaign, "serviceConfig"));
        if (campaignName) campaignNames.push(campaignName);
      }
    }

    for (const [label, names] of [
      ["campaign names", campaignNames],
      ["solution names", solutionNames],
    ] as const) {
      const duplicates = findDuplicates(names);
      if (duplicates.length > 0) {
        this.errors.push(
          `duplicate ${label} found: ${duplicates.join(", ")}. Do not use the same ${label} across solutions`,
        );
      }
    }
  }
}

/**
 * Validate a configuration and, when it is valid, return it with defaults.
 */
export function validateConfiguration(content: unknown, options?: ConfigValidatorOptions): ConfigValidationResult {
  return new ConfigurationValidator(options).validate(content);
}
