/**
 * CLI Module Index
 */

export {
  type SchedulerCliOptions,
  type SchedulerCliDeps,
  type ImportOptions,
  type SolutionSchedule,
  buildExportSchedules,
  collectSolutionSchedule,
  createSchedulerProgram,
  defaultSchedulerCliDeps,
  parseConfigPath,
  registerSchedulerCli,
} from "./scheduler-cli.js";
