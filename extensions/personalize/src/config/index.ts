/**
 * Configuration Module Index
 */

export { parseDuration, DurationParseError } from "./duration.js";
export {
  type RuntimeConfig,
  type RuntimeEnvironment,
  type OptionalSetting,
  RuntimeEnvironmentSchema,
  SETTING_VARIABLES,
  ConfigurationError,
  loadRuntimeConfig,
  requireSetting,
} from "./runtime.js";
export { CONFIGURATION_KEYS, UPDATABLE_RECIPES, DATASET_TYPES, type KeyNode } from "./schema.js";
export {
  type ConfigDocument,
  DEFAULT_MAX_AGE,
  applyDefaults,
  formatCurrentDate,
  formatTimeStarted,
} from "./defaults.js";
export {
  type ConfigValidationResult,
  type ConfigValidatorOptions,
  ConfigurationValidator,
  avroSchemaProblem,
  batchJobName,
  validateConfiguration,
} from "./validator.js";
