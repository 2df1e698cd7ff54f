/**
 * Reconciliation Pipeline
 *
 * One workflow step for one resource, as explicit ordered stages:
 * resolve parameters, reconcile, notify, shape the response. The state
 * machine adapter turns every non-terminal outcome into a `StepSignal` whose
 * name its Retry and Catch clauses match on.
 */

import type { ResourceKind } from "../resource/kinds.js";
import type { ReconciliationEngine } from "../reconciliation/engine.js";
import type { Outcome } from "../reconciliation/outcome.js";
import type { DispatchReport, NotificationDispatcher } from "../notifications/dispatcher.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { loadParameterTable, resolveParameters, type ParameterTable } from "./parameters.js";

// =============================================================================
// Types
// =============================================================================

export type StepEvent = Record<string, unknown>;

export type StepRequest = {
  kind: ResourceKind;
  event: StepEvent;
};

export type StepResponse = {
  kind: ResourceKind;
  outcome: Outcome;
  /** The request event, with `resource` set once the resource is active */
  event: StepEvent;
  notifications: DispatchReport;
};

export type StepSignalName =
  | "ResourcePending"
  | "ResourceNeedsUpdate"
  | "ResourceFailed"
  | "ResourceInvalid"
  | "SolutionVersionPending";

export class StepSignal extends Error {
  constructor(
    readonly signal: StepSignalName,
    message: string,
    readonly outcome: Outcome,
  ) {
    super(message);
    this.name = signal;
  }
}

export interface PipelineConfig {
  engine: ReconciliationEngine;
  dispatcher: NotificationDispatcher;
  /** Defaults to the table shipped in `parameters.json` */
  parameters?: ParameterTable;
  env?: Record<string, string | undefined>;
  logger?: WorkflowLogger;
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Convert Dates and other JSON-incompatible values the way a state machine
 * would see them.
 */
export function toJsonValue(value: unknown): unknown {
  const text = JSON.stringify(value);
  return text === undefined ? undefined : JSON.parse(text);
}

export class ReconciliationPipeline {
  private readonly parameters: ParameterTable;
  private readonly env: Record<string, string | undefined>;
  private readonly logger: WorkflowLogger;

  constructor(private readonly config: PipelineConfig) {
    this.parameters = config.parameters ?? loadParameterTable();
    this.env = config.env ?? process.env;
    this.logger = config.logger ?? getWorkflowLogger("pipeline");
  }

  async run(request: StepRequest): Promise<StepResponse> {
    const desired = this.resolveParameters(request);
    const outcome = await this.reconcile(request.kind, desired);
    this.logger.debug(`${request.kind} step ended ${outcome.type}`);
    const notifications = await this.notify(request.kind, outcome, desired);
    return this.shapeResponse(request, outcome, notifications);
  }

  resolveParameters(request: StepRequest): Record<string, unknown> {
    return resolveParameters(this.parameters[request.kind], request.event, this.env);
  }

  async reconcile(kind: ResourceKind, desired: Record<string, unknown>): Promise<Outcome> {
    return this.config.engine.reconcile(kind, desired);
  }

  async notify(kind: ResourceKind, outcome: Outcome, desired: Record<string, unknown>): Promise<DispatchReport> {
    const cutoff = desired.timeStarted instanceof Date ? desired.timeStarted : undefined;
    return this.config.dispatcher.notifyOutcome(kind, outcome, cutoff);
  }

  shapeResponse(request: StepRequest, outcome: Outcome, notifications: DispatchReport): StepResponse {
    const event: StepEvent = { ...request.event };
    if (outcome.type === "terminal") {
      event.resource = toJsonValue(outcome.resource);
    }
    return { kind: request.kind, outcome, event, notifications };
  }
}

export function createReconciliationPipeline(config: PipelineConfig): ReconciliationPipeline {
  return new ReconciliationPipeline(config);
}

// =============================================================================
// State Machine Adapter
// =============================================================================

/**
 * The signal a non-terminal outcome raises, or undefined for `terminal`.
 */
export function outcomeSignal(kind: ResourceKind, outcome: Outcome): StepSignal | undefined {
  switch (outcome.type) {
    case "terminal":
      return undefined;
    case "pending":
      return new StepSignal("ResourcePending", outcome.reason, outcome);
    case "needs-update":
      return new StepSignal("ResourceNeedsUpdate", `${kind} needs update: ${outcome.fields.join(", ")}`, outcome);
    case "failed":
      return new StepSignal("ResourceFailed", outcome.reason, outcome);
    case "invalid":
      return new StepSignal("ResourceInvalid", outcome.reason, outcome);
    case "solution-version-pending":
      return new StepSignal("SolutionVersionPending", outcome.solutionVersionArn, outcome);
  }
}

/**
 * Run one step and return its event, throwing a `StepSignal` unless the
 * resource is active.
 */
export async function runStep(pipeline: ReconciliationPipeline, request: StepRequest): Promise<StepEvent> {
  const response = await pipeline.run(request);
  const signal = outcomeSignal(request.kind, response.outcome);
  if (signal) throw signal;
  return response.event;
}
