/**
 * Workflow Pipeline Module Index
 */

export {
  OMIT,
  ParameterSpecSchema,
  ParameterTableSchema,
  ParameterResolutionError,
  type ParameterSpec,
  type ParameterFormat,
  type ParameterTable,
  loadParameterTable,
  formatParameter,
  resolveParameter,
  resolveParameters,
} from "./parameters.js";
export {
  type StepEvent,
  type StepRequest,
  type StepResponse,
  type StepSignalName,
  type PipelineConfig,
  StepSignal,
  ReconciliationPipeline,
  createReconciliationPipeline,
  outcomeSignal,
  runStep,
  toJsonValue,
} from "./pipeline.js";
