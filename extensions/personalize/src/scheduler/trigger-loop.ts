/**
 * Trigger loop
 *
 * One iteration loads a task, waits for its next cron time and starts the
 * task's target state machine. The orchestrating state machine re-invokes the
 * iteration with `nextPrior` until the task is deleted.
 */

import { setTimeout as delay } from "node:timers/promises";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";
import { nextFireTime } from "./cron.js";
import type { ExecutionController } from "./executions.js";
import { scheduleToCron } from "./schedule.js";
import type { TaskStore } from "./store.js";
import { Task } from "./task.js";

export const MAX_JITTER_SECONDS = 60;

export type TriggerLoopDeps = {
  store: TaskStore;
  executions: ExecutionController;
  clock?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Source of the 0-59 second jitter; returns [0, 1) */
  random?: () => number;
  logger?: WorkflowLogger;
};

export type TriggerIterationOptions = {
  /** Fire time of the previous iteration; defaults to now */
  prior?: Date;
  signal?: AbortSignal;
};

export type TriggerIterationResult =
  | { status: "continue"; nextPrior: Date; firedAt: Date; executionArn?: string }
  | { status: "deleted" }
  | { status: "exhausted" }
  | { status: "aborted" };

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/**
 * Next cron time strictly after `after`, or `undefined` past the last supported year.
 */
export function nextTriggerTime(expression: string, after: Date): Date | undefined {
  return nextFireTime(scheduleToCron(expression), after);
}

export async function runTriggerIteration(
  name: string,
  deps: TriggerLoopDeps,
  options: TriggerIterationOptions = {},
): Promise<TriggerIterationResult> {
  const clock = deps.clock ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const logger = (deps.logger ?? getWorkflowLogger("scheduler/trigger")).withContext({ taskName: name });

  const pointer = await deps.store.get(name, 0);
  if (!pointer) {
    logger.info(`task ${name} no longer exists, stopping`);
    return { status: "deleted" };
  }
  const snapshot = (await deps.store.get(name, pointer.latest ?? 0)) ?? pointer;
  const task = Task.fromRecord(snapshot);

  const scheduled = nextTriggerTime(task.schedule, options.prior ?? clock());
  if (!scheduled) {
    logger.warn(`schedule ${task.schedule} has no future trigger time`);
    return { status: "exhausted" };
  }
  const firedAt = new Date(scheduled.getTime() + Math.floor(random() * MAX_JITTER_SECONDS) * 1000);

  const waitMs = firedAt.getTime() - clock().getTime();
  if (waitMs > 0) {
    logger.debug(`waiting until ${firedAt.toISOString()}`);
    try {
      await sleep(waitMs, options.signal);
    } catch (err) {
      if (options.signal?.aborted) return { status: "aborted" };
      throw err;
    }
  }
  if (options.signal?.aborted) return { status: "aborted" };

  const targetArn = typeof task.stateMachine.arn === "string" ? task.stateMachine.arn : "state machine";
  let executionArn: string | undefined;
  try {
    const target = task.validate();
    executionArn = await deps.executions.start({
      stateMachineArn: target.arn,
      name: task.nextInvocationId,
      input: target.input,
    });
    logger.info(`started ${target.arn} for ${name}`, { executionName: task.nextInvocationId });
  } catch (err) {
    logger.error(`failed to start ${targetArn} for ${name}: ${formatErrorMessage(err)}`);
  }

  return { status: "continue", nextPrior: scheduled, firedAt, executionArn };
}

export type TriggerLoopResult = {
  status: "deleted" | "exhausted" | "aborted";
  iterations: number;
};

/**
 * Run iterations back to back in-process until the task is deleted or `signal` aborts.
 */
export async function runTriggerLoop(
  name: string,
  deps: TriggerLoopDeps,
  options: TriggerIterationOptions = {},
): Promise<TriggerLoopResult> {
  let prior = options.prior;
  let iterations = 0;

  while (!options.signal?.aborted) {
    const result = await runTriggerIteration(name, deps, { prior, signal: options.signal });
    if (result.status !== "continue") {
      return { status: result.status, iterations };
    }
    iterations++;
    prior = result.nextPrior;
  }
  return { status: "aborted", iterations };
}
