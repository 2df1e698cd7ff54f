/**
 * Scheduled tasks
 */

import { randomUUID } from "node:crypto";
import { isDeepStrictEqual } from "node:util";
import { validateSchedule } from "./schedule.js";

/** Execution names are capped at 80 characters: 67 of the task name, a dash, 12 hex. */
export const TASK_NAME_PREFIX_LENGTH = 67;

export type TaskTarget = {
  arn: string;
  input: Record<string, unknown>;
};

export type TaskInit = {
  name: string;
  schedule?: string;
  stateMachine?: { arn?: unknown; input?: unknown };
  latest?: number;
  version?: string;
};

/**
 * Row layout in the schedules table. The `v0` row also carries `latest`.
 */
export type TaskRecord = {
  name: string;
  version: string;
  schedule?: string;
  state_machine_arn?: string;
  state_machine_input?: Record<string, unknown>;
  latest?: number;
};

export class TaskValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskValidationError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function versionKey(version: number): string {
  return `v${version}`;
}

export class Task {
  readonly name: string;
  readonly schedule: string;
  readonly stateMachine: { arn?: unknown; input?: unknown };
  readonly latest: number;
  readonly version: string;
  /** Fresh per instance; used as the next execution name. */
  readonly nextInvocationId: string;

  constructor(init: TaskInit) {
    this.name = init.name;
    this.schedule = init.schedule ? validateSchedule(init.schedule) : "";
    this.stateMachine = init.stateMachine ?? {};
    this.latest = init.latest ?? 0;
    this.version = init.version ?? versionKey(0);
    this.nextInvocationId = `${this.name.slice(0, TASK_NAME_PREFIX_LENGTH)}-${randomUUID().replace(/-/g, "").slice(0, 12)}`;
  }

  /**
   * Check the task can be written, returning its typed target.
   */
  validate(): TaskTarget {
    if (!this.schedule) {
      throw new TaskValidationError("to create a task, it must have a schedule (e.g. cron(* * * * ? *))");
    }
    if (!("arn" in this.stateMachine) || !("input" in this.stateMachine)) {
      throw new TaskValidationError("task stateMachine must have an arn and input");
    }
    const { arn, input } = this.stateMachine;
    if (typeof arn !== "string") {
      throw new TaskValidationError("task stateMachine.arn must be a string");
    }
    if (!isPlainObject(input)) {
      throw new TaskValidationError("task stateMachine.input must be an object");
    }
    return { arn, input };
  }

  /**
   * Tasks are equal when their name, schedule and target match; versions are ignored.
   */
  equals(other: Task): boolean {
    return (
      this.name === other.name &&
      this.schedule === other.schedule &&
      this.stateMachine.arn === other.stateMachine.arn &&
      isDeepStrictEqual(this.stateMachine.input, other.stateMachine.input)
    );
  }

  toString(): string {
    return this.schedule ? `${this.name} (${this.schedule})` : this.name;
  }

  static fromRecord(record: TaskRecord): Task {
    return new Task({
      name: record.name,
      schedule: record.schedule,
      stateMachine: { arn: record.state_machine_arn, input: record.state_machine_input },
      latest: record.latest,
      version: record.version,
    });
  }

  static key(name: string, version = 0): { name: string; version: string } {
    return { name, version: versionKey(version) };
  }
}
