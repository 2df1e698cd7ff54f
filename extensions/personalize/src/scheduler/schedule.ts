/**
 * Schedule validation
 *
 * A schedule is either `cron(...)` or `delete`. Validation happens when a
 * configuration or task is accepted, never while a loop is running.
 */

import {
  CRON_ANY_WILDCARD,
  CRON_FIELDS,
  CronSyntaxError,
  cronFields,
  parseCron,
  parseCronField,
  parseCronYears,
  type CronExpression,
} from "./cron.js";

export const DELETE_SCHEDULE = "delete";

export class ScheduleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleError";
  }
}

function detailOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Validate a schedule and return its canonical form.
 *
 * @throws ScheduleError listing every problem found, joined with `.`
 */
export function validateSchedule(expression: string | undefined): string {
  if (!expression) {
    throw new ScheduleError("Task is missing a schedule");
  }
  if (expression === DELETE_SCHEDULE) {
    return expression;
  }
  if (!expression.startsWith("cron(") || !expression.endsWith(")")) {
    throw new ScheduleError(
      `invalid schedule ${expression}. Use a cron() schedule or "delete" to remove a schedule that already exists`,
    );
  }

  const fields = cronFields(expression);
  if (!fields) {
    throw new ScheduleError(`invalid cron ScheduleExpression ${expression}. Should have 6 fields`);
  }

  const errors: string[] = [];
  const [, , dayOfMonth, , dayOfWeek] = fields;
  if (dayOfMonth !== CRON_ANY_WILDCARD && dayOfWeek !== CRON_ANY_WILDCARD) {
    errors.push(
      `invalid cron ScheduleExpression ${expression}. Do not specify day-of-month and day-of week in the same cron expression`,
    );
  }

  // minute through day-of-week report the first bad field; the year is checked on its own
  for (const [index, spec] of CRON_FIELDS.slice(0, 5).entries()) {
    try {
      parseCronField(spec, fields[index] ?? "");
    } catch (err) {
      errors.push(`invalid cron ScheduleExpression: ${detailOf(err)}`);
      break;
    }
  }

  try {
    parseCronYears(fields[5] ?? "");
  } catch (err) {
    errors.push(`invalid cron ScheduleExpression year: ${detailOf(err)}`);
  }

  if (errors.length === 0) {
    try {
      parseCron(fields);
    } catch (err) {
      errors.push(`invalid cron ScheduleExpression: ${detailOf(err)}`);
    }
  }
  if (errors.length > 0) {
    throw new ScheduleError(errors.join("."));
  }
  return `cron(${fields.join(" ")})`;
}

export function isDeleteSchedule(expression: string): boolean {
  return expression === DELETE_SCHEDULE;
}

/**
 * Parse a validated `cron(...)` schedule for next-fire computation.
 */
export function scheduleToCron(expression: string): CronExpression {
  const fields = cronFields(expression);
  if (!fields) {
    throw new ScheduleError(`invalid cron ScheduleExpression ${expression}. Should have 6 fields`);
  }
  try {
    return parseCron(fields);
  } catch (err) {
    if (err instanceof CronSyntaxError) {
      throw new ScheduleError(`invalid cron ScheduleExpression: ${err.message}`);
    }
    throw err;
  }
}
