/**
 * Resource Reconciliation Engine
 *
 * One describe/create/update/evaluate pass for a single Amazon Personalize
 * resource against its desired configuration. The engine never retries and
 * never throws for control flow: every decision is an `Outcome`, and errors it
 * does not classify propagate to the orchestrator's catch path.
 */

import {
  createdMetricName,
  getKindSpec,
  supportsUpdate,
  type ResourceKind,
} from "../resource/kinds.js";
import type { AWSContext } from "../resource/arn.js";
import { resourceArnOf, type RemoteResource, type ResourceProvider } from "../personalize/provider.js";
import { isAWSError, LIMIT_EXCEEDED, RESOURCE_IN_USE } from "../personalize/errors.js";
import { S3DataSource } from "../storage/s3-freshness.js";
import type { MetricsRecorder } from "../metrics/recorder.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";
import { checkUpdatableFields, evaluateStatus, findMismatches, mismatchReason } from "./compare.js";
import { locateResource, type SourceData } from "./locator.js";
import { failed, pending, solutionVersionPending, type Outcome } from "./outcome.js";
import { DEFAULT_FRESHNESS_POLICY, type FreshnessPolicy } from "./staleness.js";

export interface ReconciliationEngineConfig {
  provider: ResourceProvider;
  context: AWSContext;
  metrics?: MetricsRecorder;
  logger?: WorkflowLogger;
  /** Defaults to the system clock */
  clock?: () => Date;
  /**
   * Call update when an updatable field differs (default). When false the
   * engine returns `needs-update` and leaves the update to the caller.
   */
  applyUpdates?: boolean;
  /** Freshness of stale candidates that are not checked against source data */
  freshness?: FreshnessPolicy;
  /** Source data of dataset import jobs, defaulting to S3 */
  dataSource?: (url: string) => SourceData;
}

/**
 * Desired configuration minus the fields only the workflow understands.
 */
export function createParameters(kind: ResourceKind, desired: Record<string, unknown>): Record<string, unknown> {
  const workflowFields = new Set(getKindSpec(kind).workflowFields);
  return Object.fromEntries(Object.entries(desired).filter(([key]) => !workflowFields.has(key)));
}

function resourceLabel(kind: ResourceKind, desired: Record<string, unknown>): string {
  for (const key of ["name", "jobName", "datasetType"]) {
    const value = desired[key];
    if (typeof value === "string") return value;
  }
  return kind;
}

export class ReconciliationEngine {
  private readonly logger: WorkflowLogger;
  private readonly clock: () => Date;
  private readonly dataSource: (url: string) => SourceData;

  constructor(private config: ReconciliationEngineConfig) {
    this.logger = config.logger ?? getWorkflowLogger("reconcile");
    this.clock = config.clock ?? (() => new Date());
    this.dataSource = config.dataSource ?? ((url) => new S3DataSource(url));
  }

  async reconcile(kind: ResourceKind, desired: Record<string, unknown>): Promise<Outcome> {
    const log = this.logger.withContext({ resourceId: `${kind}/${resourceLabel(kind, desired)}` });

    let resource: RemoteResource | undefined;
    try {
      resource = await locateResource(kind, desired, {
        provider: this.config.provider,
        context: this.config.context,
        now: this.clock(),
        freshness: this.config.freshness ?? DEFAULT_FRESHNESS_POLICY,
        dataSource: this.dataSource,
        logger: log,
      });
    } catch (err) {
      if (isAWSError(err, RESOURCE_IN_USE)) {
        log.debug("resource is in use");
        return pending(`${kind} is in use`);
      }
      throw err;
    }

    if (!resource) {
      return this.create(kind, desired, log);
    }

    if (getKindSpec(kind).recordsOfflineMetrics) {
      await this.recordOfflineMetrics(resource, log);
    }

    if (supportsUpdate(kind)) {
      const decision = checkUpdatableFields(kind, desired, resource);
      if (decision?.type === "failed") {
        log.error("resource belongs to another solution", { reason: decision.reason });
        return decision;
      }
      if (decision?.type === "needs-update") {
        if (this.config.applyUpdates === false) {
          log.info(`resource needs update: ${decision.fields.join(", ")}`);
          return decision;
        }
        return this.update(kind, resource, desired, decision.fields, log);
      }
    }

    const mismatches = findMismatches(kind, desired, resource);
    if (mismatches.length > 0) {
      const reason = mismatchReason(mismatches);
      log.error("resource does not match its configuration", { mismatches });
      return failed(reason);
    }

    const outcome = evaluateStatus(kind, resource);
    switch (outcome.type) {
      case "terminal":
        log.info("resource is active");
        break;
      case "pending":
        log.debug(outcome.reason);
        break;
      case "failed":
      case "invalid":
        log.error(outcome.reason);
        break;
      default:
        break;
    }
    return outcome;
  }

  private async create(kind: ResourceKind, desired: Record<string, unknown>, log: WorkflowLogger): Promise<Outcome> {
    let arn: string;
    try {
      arn = await this.config.provider.create(kind, createParameters(kind, desired));
    } catch (err) {
      if (isAWSError(err, LIMIT_EXCEEDED) && getKindSpec(kind).hasSoftLimit) {
        log.warn(`soft limit encountered: ${formatErrorMessage(err)}`);
        return pending(`${kind} create is waiting on a soft limit`);
      }
      throw err;
    }

    await this.config.metrics?.record(createdMetricName(kind));
    log.info(`created ${kind} ${arn}`);

    if (kind === "solutionVersion") {
      return solutionVersionPending(arn);
    }
    return pending(`${kind} was created`, arn);
  }

  private async update(
    kind: ResourceKind,
    resource: RemoteResource,
    desired: Record<string, unknown>,
    fields: string[],
    log: WorkflowLogger,
  ): Promise<Outcome> {
    const arn = resourceArnOf(kind, resource);
    if (!arn) {
      throw new Error(`described ${kind} has no ARN`);
    }

    const params = Object.fromEntries(
      getKindSpec(kind)
        .updatableFields.filter((field) => desired[field] !== undefined)
        .map((field) => [field, desired[field]]),
    );

    try {
      await this.config.provider.update(kind, arn, params);
    } catch (err) {
      if (isAWSError(err, LIMIT_EXCEEDED) && getKindSpec(kind).hasSoftLimit) {
        log.warn(`soft limit encountered: ${formatErrorMessage(err)}`);
        return pending(`${kind} update is waiting on a soft limit`);
      }
      if (isAWSError(err, RESOURCE_IN_USE)) {
        return pending(`${kind} is in use`);
      }
      throw err;
    }

    log.info(`updating ${kind} ${arn}: ${fields.join(", ")}`);
    return pending(`${kind} is updating`);
  }

  private async recordOfflineMetrics(solutionVersion: RemoteResource, log: WorkflowLogger): Promise<void> {
    const metrics = this.config.metrics;
    const arn = resourceArnOf("solutionVersion", solutionVersion);
    const solutionArn = solutionVersion.solutionArn;
    if (!metrics || !arn || typeof solutionArn !== "string" || solutionVersion.status !== "ACTIVE") return;

    const offline = await this.config.provider.getSolutionMetrics(arn);
    for (const [name, value] of Object.entries(offline)) {
      await metrics.record(name, value, {
        unit: "None",
        dimensions: { service: "SolutionMetrics", solutionArn },
      });
    }
    log.debug(`recorded ${Object.keys(offline).length} offline metrics`);
  }
}

export function createReconciliationEngine(config: ReconciliationEngineConfig): ReconciliationEngine {
  return new ReconciliationEngine(config);
}
