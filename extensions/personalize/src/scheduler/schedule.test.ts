import { describe, it, expect } from "vitest";
import { ScheduleError, validateSchedule } from "./schedule.js";
import { nextTriggerTime } from "./trigger-loop.js";

function scheduleError(expression: string): string {
  try {
    validateSchedule(expression);
  } catch (err) {
    expect(err).toBeInstanceOf(ScheduleError);
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error(`expected ${expression} to be rejected`);
}

describe("validateSchedule", () => {
  it("should accept a weekly cron schedule", () => {
    expect(validateSchedule("cron(0 12 ? * MON *)")).toBe("cron(0 12 ? * MON *)");
  });

  it("should accept delete", () => {
    expect(validateSchedule("delete")).toBe("delete");
  });

  it("should require a schedule", () => {
    expect(scheduleError("")).toBe("Task is missing a schedule");
  });

  it("should reject non-cron schedules", () => {
    expect(scheduleError("rate(1 day)")).toBe(
      'invalid schedule rate(1 day). Use a cron() schedule or "delete" to remove a schedule that already exists',
    );
  });

  it("should reject the wrong number of fields", () => {
    expect(scheduleError("cron(5,35 14 * * ? * *)")).toBe(
      "invalid cron ScheduleExpression cron(5,35 14 * * ? * *). Should have 6 fields",
    );
  });

  it("should reject day-of-month and day-of-week together", () => {
    expect(scheduleError("cron(5,35 14 * * * *)")).toBe(
      "invalid cron ScheduleExpression cron(5,35 14 * * * *). Do not specify day-of-month and day-of week in the same cron expression",
    );
  });

  it("should reject years before 1970", () => {
    expect(scheduleError("cron(5,35 14 * * ? 1888)")).toBe(
      'invalid cron ScheduleExpression year: "1888" is out of range for year (1970-2199)',
    );
  });

  it("should report bad field values", () => {
    expect(scheduleError("cron(61 * * * ? *)")).toBe(
      'invalid cron ScheduleExpression: unrecognized minute value "61"',
    );
    expect(scheduleError("cron(0 ? * * ? *)")).toBe(
      'invalid cron ScheduleExpression: "?" is only allowed in day-of-month and day-of-week, not hour',
    );
  });

  it("should number the days of the week from Sunday as 1", () => {
    expect(scheduleError("cron(0 9 ? * 8 *)")).toBe(
      'invalid cron ScheduleExpression: "8" is out of range for day-of-week (1-7)',
    );
  });

  it("should reject a day that never falls in the month", () => {
    expect(scheduleError("cron(0 0 30 2 ? *)")).toBe(
      'invalid cron ScheduleExpression: day-of-month "30" never falls in month "2"',
    );
  });

  it("should join every problem with a period", () => {
    expect(scheduleError("cron(0 12 1 * MON 1888)")).toBe(
      "invalid cron ScheduleExpression cron(0 12 1 * MON 1888). Do not specify day-of-month and day-of week in the same cron expression" +
        '.invalid cron ScheduleExpression year: "1888" is out of range for year (1970-2199)',
    );
  });

  it("should accept the extended day forms", () => {
    expect(validateSchedule("cron(0 0 L * ? *)")).toBe("cron(0 0 L * ? *)");
    expect(validateSchedule("cron(0 0 15W * ? *)")).toBe("cron(0 0 15W * ? *)");
    expect(validateSchedule("cron(0 9 ? * 6#3 *)")).toBe("cron(0 9 ? * 6#3 *)");
    expect(validateSchedule("cron(0 9 ? * 2L 2030-2040)")).toBe("cron(0 9 ? * 2L 2030-2040)");
  });
});

describe("nextTriggerTime", () => {
  it("should find the next matching weekday", () => {
    // 2024-06-12 is a Wednesday
    expect(nextTriggerTime("cron(0 12 ? * MON *)", new Date("2024-06-12T08:00:00Z"))).toEqual(
      new Date("2024-06-17T12:00:00Z"),
    );
  });

  it("should be strictly after the base time", () => {
    expect(nextTriggerTime("cron(0 12 ? * MON *)", new Date("2024-06-17T12:00:00Z"))).toEqual(
      new Date("2024-06-24T12:00:00Z"),
    );
  });

  it("should honour minute steps", () => {
    expect(nextTriggerTime("cron(0/15 * * * ? *)", new Date("2024-01-01T00:07:30Z"))).toEqual(
      new Date("2024-01-01T00:15:00Z"),
    );
  });

  it("should skip weekends for a weekday range", () => {
    // Friday after the morning run
    expect(nextTriggerTime("cron(30 8 ? * MON-FRI *)", new Date("2024-06-14T09:00:00Z"))).toEqual(
      new Date("2024-06-17T08:30:00Z"),
    );
  });

  it("should resolve the last day of a leap February", () => {
    expect(nextTriggerTime("cron(0 0 L * ? *)", new Date("2024-02-10T00:00:00Z"))).toEqual(
      new Date("2024-02-29T00:00:00Z"),
    );
  });

  it("should resolve the nth weekday of the month", () => {
    expect(nextTriggerTime("cron(0 9 ? * 6#3 *)", new Date("2024-06-01T00:00:00Z"))).toEqual(
      new Date("2024-06-21T09:00:00Z"),
    );
  });

  it("should treat day-of-week 1 as Sunday", () => {
    expect(nextTriggerTime("cron(0 12 ? * 1 *)", new Date("2024-06-12T08:00:00Z"))).toEqual(
      new Date("2024-06-16T12:00:00Z"),
    );
  });

  it("should move a weekend W day to the nearest weekday", () => {
    // 2024-06-15 is a Saturday
    expect(nextTriggerTime("cron(0 0 15W * ? *)", new Date("2024-06-01T00:00:00Z"))).toEqual(
      new Date("2024-06-14T00:00:00Z"),
    );
  });

  it("should resolve the last weekday of the month", () => {
    // 2024-06-30 is a Sunday
    expect(nextTriggerTime("cron(0 18 LW * ? *)", new Date("2024-06-01T00:00:00Z"))).toEqual(
      new Date("2024-06-28T18:00:00Z"),
    );
  });

  it("should skip ahead to the first allowed year", () => {
    expect(nextTriggerTime("cron(0 0 1 1 ? 2030-2040)", new Date("2024-06-01T00:00:00Z"))).toEqual(
      new Date("2030-01-01T00:00:00Z"),
    );
  });

  it("should return undefined when every year has passed", () => {
    expect(nextTriggerTime("cron(0 0 1 1 ? 1971)", new Date("2024-01-01T00:00:00Z"))).toBeUndefined();
  });
});
