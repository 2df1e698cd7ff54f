/**
 * Step Functions executions
 *
 * The scheduler keeps at most one running trigger-loop execution per task. An
 * execution belongs to a task when its name starts with the task's name prefix
 * and its input names the task.
 */

import {
  SFNClient,
  StartExecutionCommand,
  StopExecutionCommand,
  ListExecutionsCommand,
  DescribeExecutionCommand,
} from "@aws-sdk/client-sfn";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { withAWSRetry, type RetryConfig } from "../retry.js";
import { TASK_NAME_PREFIX_LENGTH } from "./task.js";

export type StartExecutionRequest = {
  stateMachineArn: string;
  name: string;
  input: Record<string, unknown>;
};

export interface ExecutionController {
  /** ARN of the running execution started for `taskName`, if any */
  findRunning(stateMachineArn: string, taskName: string): Promise<string | undefined>;
  start(request: StartExecutionRequest): Promise<string>;
  stop(executionArn: string, error: string, cause: string): Promise<void>;
}

function inputTaskName(input: string | undefined): string | undefined {
  if (!input) return undefined;
  try {
    const parsed: unknown = JSON.parse(input);
    if (typeof parsed === "object" && parsed !== null && "name" in parsed && typeof parsed.name === "string") {
      return parsed.name;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

// =============================================================================
// AWS Step Functions
// =============================================================================

export type SfnExecutionControllerConfig = {
  region?: string;
  client?: Pick<SFNClient, "send">;
  retry?: RetryConfig;
  logger?: WorkflowLogger;
  sleep?: (ms: number) => Promise<void>;
};

export class SfnExecutionController implements ExecutionController {
  private client: Pick<SFNClient, "send">;
  private logger: WorkflowLogger;

  constructor(private config: SfnExecutionControllerConfig = {}) {
    this.client = config.client ?? new SFNClient({ region: config.region || "us-east-1" });
    this.logger = config.logger ?? getWorkflowLogger("scheduler/executions");
  }

  private retrying<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withAWSRetry(fn, { retry: this.config.retry, label, logger: this.logger, sleep: this.config.sleep });
  }

  async findRunning(stateMachineArn: string, taskName: string): Promise<string | undefined> {
    const prefix = taskName.slice(0, TASK_NAME_PREFIX_LENGTH);
    let nextToken: string | undefined;

    do {
      const token = nextToken;
      const page = await this.retrying("ListExecutions", () =>
        this.client.send(
          new ListExecutionsCommand({ stateMachineArn, statusFilter: "RUNNING", nextToken: token }),
        ),
      );

      for (const execution of page.executions ?? []) {
        if (!execution.name?.startsWith(prefix) || !execution.executionArn) continue;

        // names are truncated, so the input decides ownership
        const executionArn = execution.executionArn;
        const described = await this.retrying("DescribeExecution", () =>
          this.client.send(new DescribeExecutionCommand({ executionArn })),
        );
        if (inputTaskName(described.input) === taskName) {
          return executionArn;
        }
      }
      nextToken = page.nextToken;
    } while (nextToken);

    return undefined;
  }

  async start(request: StartExecutionRequest): Promise<string> {
    const response = await this.retrying("StartExecution", () =>
      this.client.send(
        new StartExecutionCommand({
          stateMachineArn: request.stateMachineArn,
          name: request.name,
          input: JSON.stringify(request.input),
        }),
      ),
    );
    return response.executionArn ?? "";
  }

  async stop(executionArn: string, error: string, cause: string): Promise<void> {
    await this.retrying("StopExecution", () =>
      this.client.send(new StopExecutionCommand({ executionArn, error, cause })),
    );
  }
}

// =============================================================================
// In-Memory
// =============================================================================

export type RecordedExecution = {
  executionArn: string;
  stateMachineArn: string;
  name: string;
  input: Record<string, unknown>;
  status: "RUNNING" | "ABORTED";
  error?: string;
  cause?: string;
};

export class InMemoryExecutionController implements ExecutionController {
  readonly executions: RecordedExecution[] = [];

  async findRunning(stateMachineArn: string, taskName: string): Promise<string | undefined> {
    const prefix = taskName.slice(0, TASK_NAME_PREFIX_LENGTH);
    return this.executions.find(
      (e) =>
        e.status === "RUNNING" &&
        e.stateMachineArn === stateMachineArn &&
        e.name.startsWith(prefix) &&
        e.input.name === taskName,
    )?.executionArn;
  }

  async start(request: StartExecutionRequest): Promise<string> {
    if (this.executions.some((e) => e.stateMachineArn === request.stateMachineArn && e.name === request.name)) {
      throw Object.assign(new Error(`Execution ${request.name} already exists`), { name: "ExecutionAlreadyExists" });
    }
    const executionArn = `${request.stateMachineArn.replace(":stateMachine:", ":execution:")}:${request.name}`;
    this.executions.push({ ...request, input: structuredClone(request.input), executionArn, status: "RUNNING" });
    return executionArn;
  }

  async stop(executionArn: string, error: string, cause: string): Promise<void> {
    const execution = this.executions.find((e) => e.executionArn === executionArn);
    if (!execution) {
      throw Object.assign(new Error(`Execution ${executionArn} does not exist`), { name: "ExecutionDoesNotExist" });
    }
    execution.status = "ABORTED";
    execution.error = error;
    execution.cause = cause;
  }

  running(stateMachineArn?: string): RecordedExecution[] {
    return this.executions.filter(
      (e) => e.status === "RUNNING" && (!stateMachineArn || e.stateMachineArn === stateMachineArn),
    );
  }
}
