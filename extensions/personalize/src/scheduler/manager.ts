/**
 * Scheduler
 *
 * Versioned cron tasks that each keep one trigger-loop execution running. Writes
 * are idempotent: re-submitting an unchanged task neither bumps its version nor
 * restarts its loop.
 */

import type { MetricsRecorder } from "../metrics/recorder.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import type { ExecutionController } from "./executions.js";
import { isDeleteSchedule } from "./schedule.js";
import type { TaskStore } from "./store.js";
import { Task } from "./task.js";

export const SUPERSEDED_ERROR = "301";
export const DISABLED_ERROR = "410";

const SCHEDULER_DIMENSIONS = { service: "Scheduler" };

export type SchedulerConfig = {
  store: TaskStore;
  executions: ExecutionController;
  /** ARN of the trigger-loop state machine */
  triggerStateMachineArn: string;
  metrics?: MetricsRecorder;
  logger?: WorkflowLogger;
};

export type ScheduleResult = {
  task: Task;
  changed: boolean;
  /** Version written, the unchanged latest version, or 0 after a delete */
  version: number;
};

export class Scheduler {
  private logger: WorkflowLogger;

  constructor(private config: SchedulerConfig) {
    this.logger = config.logger ?? getWorkflowLogger("scheduler");
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Create or update a task. A `delete` schedule removes the task instead.
   */
  async create(task: Task): Promise<ScheduleResult> {
    const log = this.logger.withContext({ taskName: task.name });
    log.info(`creating scheduled task for ${task.toString()}`);

    if (isDeleteSchedule(task.schedule)) {
      const removed = await this.delete(task);
      return { task, changed: removed, version: 0 };
    }

    const target = task.validate();
    const latest = await this.read(task.name);
    const current = latest?.latest ?? 0;

    if (latest && current !== 0 && task.equals(latest)) {
      log.info(`task ${task.name} unchanged from version ${current}`);
      return { task, changed: false, version: current };
    }

    const version = await this.config.store.putVersion({
      name: task.name,
      expectedLatest: current,
      schedule: task.schedule,
      target,
    });
    log.info(`put scheduled task for ${task.name} with version ${version}`);

    if (current === 0) {
      await this.config.metrics?.record("JobsCreated", 1, { dimensions: SCHEDULER_DIMENSIONS });
    }

    log.info(`enabling scheduled task for ${task.toString()}`);
    await this.enable(task);
    return { task, changed: true, version };
  }

  async update(task: Task): Promise<ScheduleResult> {
    return this.create(task);
  }

  /**
   * Stop the task's loop and remove every version row. Returns false when the task did not exist.
   */
  async delete(task: Task | string): Promise<boolean> {
    const name = typeof task === "string" ? task : task.name;
    const log = this.logger.withContext({ taskName: name });
    const latest = await this.read(name);
    const versions = latest?.latest ?? 0;

    log.info(`disabling ${name}`);
    await this.disable(name);

    if (!versions) {
      log.info(`no versions of task ${name} to remove`);
      return false;
    }

    log.info(`removing all ${versions} task(s) for ${name}`);
    await this.config.store.deleteVersions(name, versions);
    await this.config.metrics?.record("JobsDeleted", 1, { dimensions: SCHEDULER_DIMENSIONS });
    return true;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Read a task version; version 0 is always the latest.
   */
  async read(name: string, version = 0): Promise<Task | undefined> {
    const record = await this.config.store.get(name, version);
    return record ? Task.fromRecord(record) : undefined;
  }

  /**
   * Distinct task names, in the order the scan first sees them.
   */
  async list(): Promise<string[]> {
    const seen = new Set<string>();
    for await (const name of this.config.store.scanNames()) {
      seen.add(name);
    }
    return [...seen];
  }

  // ===========================================================================
  // Trigger Loop Control
  // ===========================================================================

  async isEnabled(task: Task | string): Promise<boolean> {
    const name = typeof task === "string" ? task : task.name;
    const running = await this.config.executions.findRunning(this.config.triggerStateMachineArn, name);
    return running !== undefined;
  }

  /**
   * Start the task's loop unless one is already running.
   */
  async activate(task: Task): Promise<boolean> {
    if (await this.isEnabled(task)) {
      this.logger.info(`${task.name} already enabled`);
      return false;
    }
    await this.enable(task);
    return true;
  }

  async deactivate(task: Task | string): Promise<boolean> {
    return this.disable(typeof task === "string" ? task : task.name);
  }

  private async enable(task: Task): Promise<void> {
    const running = await this.config.executions.findRunning(this.config.triggerStateMachineArn, task.name);
    if (running) {
      await this.config.executions.stop(
        running,
        SUPERSEDED_ERROR,
        `execution superseded by ${task.nextInvocationId}`,
      );
    }
    await this.config.executions.start({
      stateMachineArn: this.config.triggerStateMachineArn,
      name: task.nextInvocationId,
      input: { name: task.name },
    });
  }

  private async disable(name: string): Promise<boolean> {
    const running = await this.config.executions.findRunning(this.config.triggerStateMachineArn, name);
    if (!running) {
      this.logger.info(`${name} already disabled`);
      return false;
    }
    await this.config.executions.stop(running, DISABLED_ERROR, `execution disabled for ${name}`);
    this.logger.info(`disabled ${name}`);
    return true;
  }
}

export function createScheduler(config: SchedulerConfig): Scheduler {
  return new Scheduler(config);
}
