/**
 * Scheduler Module Index
 */

export {
  type CronExpression,
  type CronFieldName,
  type WeekdayRule,
  CRON_ANY_WILDCARD,
  CRON_MIN_YEAR,
  CRON_MAX_YEAR,
  CronSyntaxError,
  parseCron,
  parseCronYears,
  nextFireTime,
} from "./cron.js";
export { ScheduleError, DELETE_SCHEDULE, validateSchedule, isDeleteSchedule, scheduleToCron } from "./schedule.js";
export { Task, TaskValidationError, type TaskInit, type TaskRecord, type TaskTarget } from "./task.js";
export {
  type TaskStore,
  type TaskVersionWrite,
  type DynamoTaskStoreConfig,
  ConcurrentTaskUpdateError,
  DynamoTaskStore,
  InMemoryTaskStore,
} from "./store.js";
export {
  type ExecutionController,
  type StartExecutionRequest,
  type RecordedExecution,
  SfnExecutionController,
  InMemoryExecutionController,
} from "./executions.js";
export { Scheduler, createScheduler, type SchedulerConfig, type ScheduleResult } from "./manager.js";
export {
  nextTriggerTime,
  runTriggerIteration,
  runTriggerLoop,
  type TriggerLoopDeps,
  type TriggerIterationResult,
  type TriggerLoopResult,
} from "./trigger-loop.js";
