/**
 * Scheduler CLI
 *
 * Registers the `personalize-scheduler` commands for inspecting and toggling
 * scheduled tasks, and for importing an existing dataset group as a
 * configuration with schedules.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { DynamoTaskStore } from "../scheduler/store.js";
import { SfnExecutionController } from "../scheduler/executions.js";
import { Scheduler } from "../scheduler/manager.js";
import { ScheduleError, validateSchedule } from "../scheduler/schedule.js";
import type { Task } from "../scheduler/task.js";
import { PersonalizeResourceProvider } from "../personalize/provider.js";
import { ServiceModel, type ExportSchedules } from "../resource/service-model.js";
import { DEFAULT_PARTITION, DEFAULT_REGION } from "../config/runtime.js";

// =============================================================================
// Types
// =============================================================================

export type SchedulerCliOptions = {
  table?: string;
  stateMachine?: string;
  region: string;
};

export type ImportOptions = {
  datasetGroup: string;
  path: string;
  bucket: string;
  account: string;
  region: string;
  schedules: ExportSchedules;
};

export type SchedulerCliDeps = {
  createScheduler: (options: SchedulerCliOptions) => Scheduler;
  /** Rebuild the dataset group's configuration from its live resources */
  exportConfig: (options: ImportOptions) => Promise<Record<string, unknown>>;
  upload: (options: ImportOptions, body: string) => Promise<void>;
};

type TaskOptions = { task: string };

type ImportCommandOptions = {
  datasetGroup: string;
  path: string;
  bucket?: string;
  account?: string;
  importSchedule?: string;
  fullSchedule: SolutionSchedule[];
  updateSchedule: SolutionSchedule[];
};

export type SolutionSchedule = { solution: string; schedule: string };

// =============================================================================
// Argument Parsing
// =============================================================================

export function parseConfigPath(value: string): string {
  if (!value.startsWith("train/")) throw new InvalidArgumentError("must start with 'train/'");
  if (!value.endsWith(".json")) throw new InvalidArgumentError("must end with a suffix of .json");
  return value;
}

function parseSchedule(value: string): string {
  try {
    return validateSchedule(value);
  } catch (err) {
    if (err instanceof ScheduleError) throw new InvalidArgumentError(err.message);
    throw err;
  }
}

/**
 * Parse a repeated `solution@cron(...)` option.
 */
export function collectSolutionSchedule(value: string, previous: SolutionSchedule[]): SolutionSchedule[] {
  const at = value.indexOf("@");
  const solution = at > 0 ? value.slice(0, at) : "";
  const schedule = at > 0 ? value.slice(at + 1) : "";
  if (!solution || !schedule) {
    throw new InvalidArgumentError(
      "format must be solution_name@schedule_expression e.g solution@cron(0 */12 * * ? *)",
    );
  }
  return [...previous, { solution, schedule: parseSchedule(schedule) }];
}

export function buildExportSchedules(
  importSchedule: string | undefined,
  full: SolutionSchedule[],
  update: SolutionSchedule[],
): ExportSchedules {
  const schedules: ExportSchedules = {};
  if (importSchedule) schedules.import = importSchedule;

  const solutions: NonNullable<ExportSchedules["solutions"]> = {};
  for (const { solution, schedule } of full) {
    solutions[solution] = { ...solutions[solution], full: schedule };
  }
  for (const { solution, schedule } of update) {
    solutions[solution] = { ...solutions[solution], update: schedule };
  }
  if (Object.keys(solutions).length > 0) schedules.solutions = solutions;
  return schedules;
}

// =============================================================================
// Default Dependencies
// =============================================================================

export const defaultSchedulerCliDeps: SchedulerCliDeps = {
  createScheduler: (options) => {
    if (!options.table) throw new Error("a schedules table is required (--table or DDB_SCHEDULES_TABLE)");
    if (!options.stateMachine) {
      throw new Error("a trigger state machine is required (--state-machine or DDB_SCHEDULER_STEPFUNCTION)");
    }
    return new Scheduler({
      store: new DynamoTaskStore({ tableName: options.table, region: options.region }),
      executions: new SfnExecutionController({ region: options.region }),
      triggerStateMachineArn: options.stateMachine,
    });
  },
  exportConfig: async (options) => {
    const provider = new PersonalizeResourceProvider({ region: options.region });
    const context = { partition: DEFAULT_PARTITION, region: options.region, accountId: options.account };
    const model = await ServiceModel.load(provider, { context, datasetGroup: options.datasetGroup });
    return model.exportConfig(options.datasetGroup, options.schedules);
  },
  upload: async (options, body) => {
    const s3 = new S3Client({ region: options.region });
    await s3.send(
      new PutObjectCommand({
        Bucket: options.bucket,
        Key: options.path,
        Body: body,
        ContentType: "application/json",
        ExpectedBucketOwner: options.account,
      }),
    );
  },
};

// =============================================================================
// CLI Registration
// =============================================================================

function print(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Register the scheduler commands and their global options on `program`.
 */
export function registerSchedulerCli(program: Command, deps: SchedulerCliDeps = defaultSchedulerCliDeps): Command {
  program
    .description("Inspect and control scheduled personalization tasks")
    .addOption(new Option("--table <name>", "DynamoDB schedules table").env("DDB_SCHEDULES_TABLE"))
    .addOption(
      new Option("--state-machine <arn>", "trigger loop state machine ARN").env("DDB_SCHEDULER_STEPFUNCTION"),
    )
    .addOption(new Option("-r, --region <region>", "AWS region").env("AWS_REGION").default(DEFAULT_REGION));

  const scheduler = (command: Command): Scheduler => {
    try {
      return deps.createScheduler(command.optsWithGlobals<SchedulerCliOptions>());
    } catch (err) {
      command.error(err instanceof Error ? err.message : String(err));
    }
  };

  const latestTask = async (command: Command, tasks: Scheduler, name: string): Promise<Task> => {
    const tracker = await tasks.read(name);
    const latest = tracker?.latest ? await tasks.read(name, tracker.latest) : undefined;
    if (!latest) command.error(`task ${name} does not exist`);
    return latest;
  };

  const describeTask = async (command: Command, tasks: Scheduler, name: string): Promise<void> => {
    const tracker = await tasks.read(name);
    const latest = await latestTask(command, tasks, name);
    print({
      task: {
        active: await tasks.isEnabled(latest),
        name: latest.name,
        schedule: latest.schedule,
        step_function: latest.stateMachine.arn,
        version: `v${tracker?.latest ?? 0}`,
      },
    });
  };

  // ---------------------------------------------------------------------------
  // list
  // ---------------------------------------------------------------------------
  program
    .command("list")
    .description("List all scheduled tasks")
    .action(async (_options: Record<string, never>, command: Command) => {
      const names = await scheduler(command).list();
      print({ tasks: [...names].sort() });
    });

  // ---------------------------------------------------------------------------
  // describe
  // ---------------------------------------------------------------------------
  program
    .command("describe")
    .description("Describe a scheduled task")
    .requiredOption("-t, --task <name>", "task name")
    .action(async (options: TaskOptions, command: Command) => {
      await describeTask(command, scheduler(command), options.task);
    });

  // ---------------------------------------------------------------------------
  // activate / deactivate
  // ---------------------------------------------------------------------------
  program
    .command("activate")
    .description("Start the trigger loop of a scheduled task")
    .requiredOption("-t, --task <name>", "task name")
    .action(async (options: TaskOptions, command: Command) => {
      const tasks = scheduler(command);
      await tasks.activate(await latestTask(command, tasks, options.task));
      await describeTask(command, tasks, options.task);
    });

  program
    .command("deactivate")
    .description("Stop the trigger loop of a scheduled task")
    .requiredOption("-t, --task <name>", "task name")
    .action(async (options: TaskOptions, command: Command) => {
      const tasks = scheduler(command);
      await tasks.deactivate(await latestTask(command, tasks, options.task));
      await describeTask(command, tasks, options.task);
    });

  // ---------------------------------------------------------------------------
  // import-dataset-group
  // ---------------------------------------------------------------------------
  program
    .command("import-dataset-group")
    .description("Create a configuration from an existing dataset group and upload it with its schedules")
    .requiredOption("-d, --dataset-group <name>", "dataset group name to import")
    .requiredOption("-p, --path <key>", "S3 key of the configuration, under train/", parseConfigPath)
    .addOption(new Option("-b, --bucket <name>", "data bucket").env("PERSONALIZE_BUCKET"))
    .addOption(new Option("--account <id>", "AWS account ID").env("AWS_ACCOUNT_ID"))
    .option("-i, --import-schedule <schedule>", "cron schedule for dataset import", parseSchedule)
    .option(
      "-f, --full-schedule <solution@schedule>",
      "cron schedule for FULL solution version training (repeatable)",
      collectSolutionSchedule,
      [],
    )
    .option(
      "-u, --update-schedule <solution@schedule>",
      "cron schedule for UPDATE solution version training (repeatable)",
      collectSolutionSchedule,
      [],
    )
    .action(async (options: ImportCommandOptions, command: Command) => {
      if (!options.bucket) command.error("a bucket is required (--bucket or PERSONALIZE_BUCKET)");
      if (!options.account) command.error("an account is required (--account or AWS_ACCOUNT_ID)");

      const importOptions: ImportOptions = {
        datasetGroup: options.datasetGroup,
        path: options.path,
        bucket: options.bucket,
        account: options.account,
        region: command.optsWithGlobals<SchedulerCliOptions>().region,
        schedules: buildExportSchedules(options.importSchedule, options.fullSchedule, options.updateSchedule),
      };

      let config: Record<string, unknown>;
      try {
        config = await deps.exportConfig(importOptions);
      } catch (err) {
        command.error(
          `could not generate configuration for ${options.datasetGroup}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }

      await deps.upload(importOptions, JSON.stringify(config, null, 2));
      print({ configuration: `s3://${importOptions.bucket}/${importOptions.path}` });
    });

  return program;
}

export function createSchedulerProgram(deps?: SchedulerCliDeps): Command {
  return registerSchedulerCli(new Command("personalize-scheduler"), deps);
}
