#!/usr/bin/env node
/**
 * personalize-scheduler
 *
 * Usage:
 *   personalize-scheduler --table schedules --state-machine <arn> list
 *   personalize-scheduler describe -t retail-import
 *   personalize-scheduler import-dataset-group -d retail -p train/retail/config.json -i "cron(0 12 * * ? *)"
 */

import { createSchedulerProgram } from "../src/cli/scheduler-cli.js";

await createSchedulerProgram().parseAsync(process.argv);
