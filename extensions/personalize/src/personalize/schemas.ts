/**
 * TypeBox schemas for Amazon Personalize create/update inputs.
 *
 * The same schemas back the configuration validator (as `serviceConfig` shapes,
 * minus the ARNs the workflow injects) and the resource provider, where a
 * successful `Check` narrows a resolved parameter map to the SDK input type.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

// =============================================================================
// Shared Shapes
// =============================================================================

export const TagSchema = Type.Object({
  tagKey: Type.String({ minLength: 1 }),
  tagValue: Type.String(),
});

const Tags = Type.Optional(Type.Array(TagSchema));
const StringMap = Type.Record(Type.String(), Type.String());

const DomainSchema = Type.Union([Type.Literal("ECOMMERCE"), Type.Literal("VIDEO_ON_DEMAND")]);

const S3DataConfigSchema = Type.Object({
  path: Type.String({ minLength: 1 }),
  kmsKeyArn: Type.Optional(Type.String()),
});

const HyperParameterRangeSchema = Type.Object({
  name: Type.Optional(Type.String()),
  minValue: Type.Optional(Type.Number()),
  maxValue: Type.Optional(Type.Number()),
});

export const SolutionConfigSchema = Type.Object({
  eventValueThreshold: Type.Optional(Type.String()),
  hpoConfig: Type.Optional(
    Type.Object({
      hpoObjective: Type.Optional(
        Type.Object({
          type: Type.Optional(Type.String()),
          metricName: Type.Optional(Type.String()),
          metricRegex: Type.Optional(Type.String()),
        }),
      ),
      hpoResourceConfig: Type.Optional(
        Type.Object({
          maxNumberOfTrainingJobs: Type.Optional(Type.String()),
          maxParallelTrainingJobs: Type.Optional(Type.String()),
        }),
      ),
      algorithmHyperParameterRanges: Type.Optional(
        Type.Object({
          integerHyperParameterRanges: Type.Optional(Type.Array(HyperParameterRangeSchema)),
          continuousHyperParameterRanges: Type.Optional(Type.Array(HyperParameterRangeSchema)),
          categoricalHyperParameterRanges: Type.Optional(
            Type.Array(
              Type.Object({
                name: Type.Optional(Type.String()),
                values: Type.Optional(Type.Array(Type.String())),
              }),
            ),
          ),
        }),
      ),
    }),
  ),
  algorithmHyperParameters: Type.Optional(StringMap),
  featureTransformationParameters: Type.Optional(StringMap),
  autoMLConfig: Type.Optional(
    Type.Object({
      metricName: Type.Optional(Type.String()),
      recipeList: Type.Optional(Type.Array(Type.String())),
    }),
  ),
  optimizationObjective: Type.Optional(
    Type.Object({
      itemAttribute: Type.Optional(Type.String()),
      objectiveSensitivity: Type.Optional(
        Type.Union([Type.Literal("LOW"), Type.Literal("MEDIUM"), Type.Literal("HIGH"), Type.Literal("OFF")]),
      ),
    }),
  ),
});

export const CampaignConfigSchema = Type.Object({
  itemExplorationConfig: Type.Optional(StringMap),
  enableMetadataWithRecommendations: Type.Optional(Type.Boolean()),
});

export const RecommenderConfigSchema = Type.Object({
  itemExplorationConfig: Type.Optional(StringMap),
  minRecommendationRequestsPerSecond: Type.Optional(Type.Integer({ minimum: 1 })),
  enableMetadataWithRecommendations: Type.Optional(Type.Boolean()),
});

// =============================================================================
// Create Inputs
// =============================================================================

export const CreateDatasetGroupInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  roleArn: Type.Optional(Type.String()),
  kmsKeyArn: Type.Optional(Type.String()),
  domain: Type.Optional(DomainSchema),
  tags: Tags,
});

export const CreateSchemaInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  schema: Type.String({ minLength: 1 }),
  domain: Type.Optional(DomainSchema),
});

export const CreateDatasetInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  schemaArn: Type.String(),
  datasetGroupArn: Type.String(),
  datasetType: Type.String({ minLength: 1 }),
  tags: Tags,
});

export const CreateDatasetImportJobInputSchema = Type.Object({
  jobName: Type.String({ minLength: 1, maxLength: 63 }),
  datasetArn: Type.String(),
  dataSource: Type.Object({ dataLocation: Type.String({ minLength: 1 }) }),
  roleArn: Type.String(),
  importMode: Type.Optional(Type.Union([Type.Literal("FULL"), Type.Literal("INCREMENTAL")])),
  publishAttributionMetricsToS3: Type.Optional(Type.Boolean()),
  tags: Tags,
});

export const CreateEventTrackerInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  datasetGroupArn: Type.String(),
  tags: Tags,
});

export const CreateFilterInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  datasetGroupArn: Type.String(),
  filterExpression: Type.String({ minLength: 1, maxLength: 2500 }),
  tags: Tags,
});

export const CreateSolutionInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  datasetGroupArn: Type.String(),
  performHPO: Type.Optional(Type.Boolean()),
  performAutoML: Type.Optional(Type.Boolean()),
  recipeArn: Type.Optional(Type.String()),
  eventType: Type.Optional(Type.String()),
  solutionConfig: Type.Optional(SolutionConfigSchema),
  tags: Tags,
});

export const CreateSolutionVersionInputSchema = Type.Object({
  solutionArn: Type.String(),
  trainingMode: Type.Optional(Type.Union([Type.Literal("FULL"), Type.Literal("UPDATE")])),
  tags: Tags,
});

export const CreateCampaignInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  solutionVersionArn: Type.String(),
  minProvisionedTPS: Type.Optional(Type.Integer({ minimum: 1 })),
  campaignConfig: Type.Optional(CampaignConfigSchema),
  tags: Tags,
});

export const CreateRecommenderInputSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 63 }),
  datasetGroupArn: Type.String(),
  recipeArn: Type.String(),
  recommenderConfig: Type.Optional(RecommenderConfigSchema),
  tags: Tags,
});

export const CreateBatchInferenceJobInputSchema = Type.Object({
  jobName: Type.String({ minLength: 1, maxLength: 63 }),
  solutionVersionArn: Type.String(),
  filterArn: Type.Optional(Type.String()),
  numResults: Type.Optional(Type.Integer({ minimum: 1 })),
  jobInput: Type.Object({ s3DataSource: S3DataConfigSchema }),
  jobOutput: Type.Object({ s3DataDestination: S3DataConfigSchema }),
  roleArn: Type.String(),
  batchInferenceJobConfig: Type.Optional(Type.Object({ itemExplorationConfig: Type.Optional(StringMap) })),
  tags: Tags,
});

export const CreateBatchSegmentJobInputSchema = Type.Object({
  jobName: Type.String({ minLength: 1, maxLength: 63 }),
  solutionVersionArn: Type.String(),
  filterArn: Type.Optional(Type.String()),
  numResults: Type.Optional(Type.Integer({ minimum: 1 })),
  jobInput: Type.Object({ s3DataSource: S3DataConfigSchema }),
  jobOutput: Type.Object({ s3DataDestination: S3DataConfigSchema }),
  roleArn: Type.String(),
  tags: Tags,
});

// =============================================================================
// Update Inputs
// =============================================================================

export const UpdateCampaignInputSchema = Type.Object({
  campaignArn: Type.String(),
  solutionVersionArn: Type.Optional(Type.String()),
  minProvisionedTPS: Type.Optional(Type.Integer({ minimum: 1 })),
  campaignConfig: Type.Optional(CampaignConfigSchema),
});

export const UpdateRecommenderInputSchema = Type.Object({
  recommenderArn: Type.String(),
  recommenderConfig: RecommenderConfigSchema,
});

export type CreateDatasetGroupInput = Static<typeof CreateDatasetGroupInputSchema>;
export type CreateSolutionInput = Static<typeof CreateSolutionInputSchema>;
export type CreateCampaignInput = Static<typeof CreateCampaignInputSchema>;

// =============================================================================
// Validation
// =============================================================================

/**
 * Thrown when a resolved parameter map does not match a service input shape.
 */
export class InputValidationError extends Error {
  constructor(
    readonly operation: string,
    readonly errors: string[],
  ) {
    super(`Parameter validation failed for ${operation}: ${errors.join("; ")}`);
    this.name = "InputValidationError";
  }
}

/**
 * Collect `path: message` strings for a value that fails a schema.
 */
export function schemaErrors(schema: TSchema, value: unknown, prefix = ""): string[] {
  const errors: string[] = [];
  for (const error of Errors(schema, value)) {
    const path = `${prefix}${error.path}` || "(root)";
    errors.push(`${path}: ${error.message}`);
  }
  return errors;
}

/**
 * Narrow `value` to the schema's static type or throw `InputValidationError`.
 */
export function parseInput<T extends TSchema>(operation: string, schema: T, value: unknown): Static<T> {
  if (Check(schema, value)) {
    return value;
  }
  const errors = schemaErrors(schema, value);
  throw new InputValidationError(operation, errors.length > 0 ? errors : ["input does not match schema"]);
}
