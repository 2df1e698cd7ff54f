/**
 * Personalize Orchestrator
 *
 * Workflow steps for Amazon Personalize resources:
 * - Reconciliation of desired configuration against live resources
 * - Resource state change notifications (EventBridge, SNS)
 * - Versioned cron tasks driving Step Functions trigger loops
 * - Configuration validation, defaults and intake from S3
 */

// =============================================================================
// Resources
// =============================================================================

export {
  type AWSContext,
  type ParsedResourceArn,
  arnPrefix,
  buildResourceArn,
  datasetGroupArnOf,
  parseResourceArn,
  solutionArnOf,
} from "./resource/arn.js";
export {
  type ResourceKind,
  type ResourceKindSpec,
  type LocateStrategy,
  RESOURCE_KINDS,
  RESOURCE_KIND_SPECS,
  isResourceKind,
  getKindSpec,
  childKinds,
  supportsUpdate,
  arnKey,
  createdMetricName,
} from "./resource/kinds.js";
export { ResourceName, camelToDash, camelToPascal, camelToSnake, dashToTitle, snakeToCamel } from "./resource/name.js";
export { ResourceTree, type ResourceElement } from "./resource/tree.js";
export { ServiceModel, toServiceConfig, type ExportSchedules, type ServiceModelOptions } from "./resource/service-model.js";

// =============================================================================
// Personalize API
// =============================================================================

export {
  type RemoteResource,
  type ResourceProvider,
  type PersonalizeSender,
  type PersonalizeProviderConfig,
  EmptyResponseError,
  PersonalizeResourceProvider,
  createPersonalizeProvider,
  resourceArnOf,
} from "./personalize/provider.js";
export { InputValidationError, parseInput, schemaErrors } from "./personalize/schemas.js";
export { LIMIT_EXCEEDED, RESOURCE_IN_USE, RESOURCE_NOT_FOUND, awsErrorName, isAWSError } from "./personalize/errors.js";

// =============================================================================
// Reconciliation
// =============================================================================

export {
  type Outcome,
  type OutcomeType,
  terminal,
  pending,
  needsUpdate,
  failed,
  invalid,
  solutionVersionPending,
  isRetryable,
} from "./reconciliation/outcome.js";
export {
  type ReconciliationEngineConfig,
  ReconciliationEngine,
  createReconciliationEngine,
  createParameters,
} from "./reconciliation/engine.js";
export { type SourceData, type LocatorDeps, locateResource } from "./reconciliation/locator.js";
export { type FreshnessPolicy, DEFAULT_FRESHNESS_POLICY, isCurrent, toDate } from "./reconciliation/staleness.js";
export {
  STATUS_FAILED,
  STATUS_IN_PROGRESS,
  checkUpdatableFields,
  evaluateStatus,
  findMismatches,
  matchesDesired,
  readStatus,
} from "./reconciliation/compare.js";
export { S3DataSource, SourceDataNotFoundError, parseS3Url, type S3Location, type S3Sender } from "./storage/s3-freshness.js";

// =============================================================================
// Ambient
// =============================================================================

export * from "./logging/index.js";
export * from "./config/index.js";
export {
  type MetricsRecorder,
  type MetricDatum,
  type MetricDimensions,
  CloudWatchMetricsRecorder,
  InMemoryMetricsRecorder,
} from "./metrics/recorder.js";
export { type RetryConfig, type AWSRetryOptions, withAWSRetry, retryAsync, formatErrorMessage } from "./retry.js";

// =============================================================================
// Workflow Surfaces
// =============================================================================

export * from "./notifications/index.js";
export * from "./scheduler/index.js";
export * from "./pipeline/index.js";
export * from "./intake/index.js";
export * from "./cli/index.js";
