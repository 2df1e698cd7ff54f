/**
 * AWS cron expressions
 *
 * Six fields (minute hour day-of-month month day-of-week year), evaluated in UTC.
 * Minute through day-of-week are parsed and iterated by cron-parser. The year
 * field, AWS's day-of-week numbering (1 = Sunday) and the `W` day-of-month
 * forms are handled here.
 */

import cronParser from "cron-parser";

export const CRON_ANY_WILDCARD = "?";
export const CRON_MIN_YEAR = 1970;
export const CRON_MAX_YEAR = 2199;

export type CronFieldName = "minute" | "hour" | "dayOfMonth" | "month" | "dayOfWeek" | "year";

type FieldSpec = {
  name: CronFieldName;
  label: string;
};

export const CRON_FIELDS: readonly FieldSpec[] = [
  { name: "minute", label: "minute" },
  { name: "hour", label: "hour" },
  { name: "dayOfMonth", label: "day-of-month" },
  { name: "month", label: "month" },
  { name: "dayOfWeek", label: "day-of-week" },
  { name: "year", label: "year" },
];

/**
 * Raised for a malformed field. The message is the detail only, without the expression.
 */
export class CronSyntaxError extends Error {
  constructor(
    readonly field: CronFieldName,
    message: string,
  ) {
    super(message);
    this.name = "CronSyntaxError";
  }
}

/** Day-of-month `nW` (nearest weekday to n) or `LW` (last weekday) */
export type WeekdayRule = { kind: "nearest"; day: number } | { kind: "last" };

export type CronExpression = {
  /** Seconds-first expression for cron-parser, with the seconds pinned to 0 */
  expression: string;
  /** Allowed years; every year when absent */
  years?: ReadonlySet<number>;
  weekday?: WeekdayRule;
};

// =============================================================================
// Leading Fields
// =============================================================================

function weekdayRuleOf(text: string): WeekdayRule | undefined {
  const upper = text.toUpperCase();
  if (upper === "LW") return { kind: "last" };
  const nearest = /^(\d+)W$/.exec(upper);
  if (nearest?.[1] === undefined) return undefined;
  const day = Number.parseInt(nearest[1], 10);
  if (day < 1 || day > 31) {
    throw new CronSyntaxError("dayOfMonth", `"${text}" is out of range for day-of-month (1-31)`);
  }
  return { kind: "nearest", day };
}

/** AWS numbers Sunday..Saturday 1..7; cron-parser uses 0..6 */
function toParserDayOfWeek(text: string): string {
  return text.replace(/(^|[,-])(\d+)/g, (_match, prefix: string, digits: string) => {
    const day = Number.parseInt(digits, 10);
    if (day < 1 || day > 7) {
      throw new CronSyntaxError("dayOfWeek", `"${digits}" is out of range for day-of-week (1-7)`);
    }
    return `${prefix}${day - 1}`;
  });
}

function toParserField(spec: FieldSpec, text: string): string {
  if (text === CRON_ANY_WILDCARD) {
    if (spec.name !== "dayOfMonth" && spec.name !== "dayOfWeek") {
      throw new CronSyntaxError(spec.name, `"?" is only allowed in day-of-month and day-of-week, not ${spec.label}`);
    }
    return "*";
  }
  if (spec.name === "dayOfMonth" && weekdayRuleOf(text)) return "*";
  if (spec.name === "dayOfWeek") return toParserDayOfWeek(text);
  return text;
}

/**
 * Check one of the five leading fields and return its cron-parser form.
 */
export function parseCronField(spec: FieldSpec, text: string): string {
  const index = CRON_FIELDS.indexOf(spec);
  if (index < 0 || index > 4) {
    throw new CronSyntaxError(spec.name, `${spec.label} is not parsed as a leading field`);
  }
  const parserText = toParserField(spec, text);
  const fields = ["0", "*", "*", "*", "*", "*"];
  fields[index + 1] = parserText;
  try {
    cronParser.parseExpression(fields.join(" "), { utc: true });
  } catch {
    throw new CronSyntaxError(spec.name, `unrecognized ${spec.label} value "${text}"`);
  }
  return parserText;
}

// =============================================================================
// Year
// =============================================================================

function yearValue(atom: string, text: string): number {
  const year = Number.parseInt(text, 10);
  if (year < CRON_MIN_YEAR || year > CRON_MAX_YEAR) {
    throw new CronSyntaxError("year", `"${atom}" is out of range for year (${CRON_MIN_YEAR}-${CRON_MAX_YEAR})`);
  }
  return year;
}

/**
 * The years a year field selects, or `undefined` for `*`.
 */
export function parseCronYears(text: string): ReadonlySet<number> | undefined {
  if (text === "*") return undefined;

  const years = new Set<number>();
  for (const atom of text.split(",")) {
    const match = /^(\*|\d+)(?:-(\d+))?(?:\/(\d+))?$/.exec(atom);
    const base = match?.[1];
    if (!match || base === undefined || (base === "*" && match[2] !== undefined)) {
      throw new CronSyntaxError("year", `unrecognized year value "${atom}"`);
    }
    const [, , to, stepText] = match;

    const step = stepText === undefined ? 1 : Number.parseInt(stepText, 10);
    if (step === 0) {
      throw new CronSyntaxError("year", `invalid step in year value "${atom}"`);
    }
    const start = base === "*" ? CRON_MIN_YEAR : yearValue(atom, base);
    const end =
      to !== undefined ? yearValue(atom, to) : base === "*" || stepText !== undefined ? CRON_MAX_YEAR : start;
    if (start > end) {
      throw new CronSyntaxError("year", `invalid year range "${atom}"`);
    }
    for (let year = start; year <= end; year += step) {
      years.add(year);
    }
  }
  return years;
}

// =============================================================================
// Expressions
// =============================================================================

/**
 * Parse the six space-separated fields (the body of `cron(...)`).
 */
export function parseCron(fields: readonly string[]): CronExpression {
  if (fields.length !== CRON_FIELDS.length) {
    throw new Error(`expected ${CRON_FIELDS.length} cron fields but got ${fields.length}`);
  }

  const leading = CRON_FIELDS.slice(0, 5).map((spec, index) => parseCronField(spec, fields[index] ?? ""));
  const expression = `0 ${leading.join(" ")}`;
  try {
    cronParser.parseExpression(expression, { utc: true });
  } catch {
    throw new CronSyntaxError("dayOfMonth", `day-of-month "${fields[2]}" never falls in month "${fields[3]}"`);
  }

  return {
    expression,
    years: parseCronYears(fields[5] ?? ""),
    weekday: weekdayRuleOf(fields[2] ?? ""),
  };
}

/**
 * Split `cron(a b c d e f)` into its fields, or `undefined` when it is not a six-field cron().
 */
export function cronFields(expression: string): string[] | undefined {
  const match = /^cron\(([^ ]+) ([^ ]+) ([^ ]+) ([^ ]+) ([^ ]+) ([^ ]+)\)$/.exec(expression);
  return match ? match.slice(1, 7) : undefined;
}

// =============================================================================
// Next Fire Time
// =============================================================================

function isWeekend(year: number, month: number, day: number): boolean {
  const dow = new Date(Date.UTC(year, month, day)).getUTCDay();
  return dow === 0 || dow === 6;
}

function matchesWeekdayRule(rule: WeekdayRule, date: Date): boolean {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  const last = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  let target: number;
  if (rule.kind === "last") {
    target = last;
    while (isWeekend(year, month, target)) target--;
  } else {
    target = Math.min(rule.day, last);
    const dow = new Date(Date.UTC(year, month, target)).getUTCDay();
    // the nearest weekday never leaves the month
    if (dow === 6) target = target === 1 ? 3 : target - 1;
    else if (dow === 0) target = target === last ? target - 2 : target + 1;
  }
  return date.getUTCDate() === target;
}

/**
 * The first minute strictly after `after` that the expression selects, or
 * `undefined` when no such minute exists before the end of the supported years.
 */
export function nextFireTime(cron: CronExpression, after: Date): Date | undefined {
  const sortedYears = cron.years ? [...cron.years].sort((a, b) => a - b) : undefined;
  const lastYear = sortedYears?.[sortedYears.length - 1] ?? CRON_MAX_YEAR;

  let interval = cronParser.parseExpression(cron.expression, { currentDate: after, utc: true });
  for (;;) {
    const candidate = interval.next().toDate();
    const year = candidate.getUTCFullYear();
    if (year > lastYear) return undefined;

    if (sortedYears && !sortedYears.includes(year)) {
      const nextYear = sortedYears.find((allowed) => allowed > year);
      if (nextYear === undefined) return undefined;
      // restart just before midnight on January 1st of the next allowed year
      interval = cronParser.parseExpression(cron.expression, {
        currentDate: new Date(Date.UTC(nextYear, 0, 1) - 1000),
        utc: true,
      });
      continue;
    }
    if (candidate.getTime() <= after.getTime()) continue;
    if (cron.weekday && !matchesWeekdayRule(cron.weekday, candidate)) continue;
    return candidate;
  }
}
