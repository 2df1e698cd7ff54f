/**
 * Workflow parameter resolution
 *
 * Each resource kind declares where its create parameters come from: a dotted
 * path into the step event, or an environment variable. The table lives in
 * `parameters.json` beside this module.
 */

import { readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import type { ResourceKind } from "../resource/kinds.js";
import { schemaErrors } from "../personalize/schemas.js";
import { parseDuration } from "../config/duration.js";

// =============================================================================
// Table
// =============================================================================

/** Default that drops the parameter instead of failing when it is missing */
export const OMIT = "omit";

export const ParameterSpecSchema = Type.Object({
  source: Type.Union([Type.Literal("event"), Type.Literal("environment")]),
  path: Type.String({ minLength: 1 }),
  default: Type.Optional(Type.Unknown()),
  as: Type.Optional(
    Type.Union([Type.Literal("string"), Type.Literal("seconds"), Type.Literal("iso8601"), Type.Literal("int")]),
  ),
});

export const ParameterTableSchema = Type.Record(Type.String(), Type.Record(Type.String(), ParameterSpecSchema));

export type ParameterSpec = Static<typeof ParameterSpecSchema>;
export type ParameterFormat = NonNullable<ParameterSpec["as"]>;
export type ParameterTable = Record<ResourceKind, Record<string, ParameterSpec>>;

export class ParameterResolutionError extends Error {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(message);
    this.name = "ParameterResolutionError";
  }
}

/**
 * Read and check a parameter table, by default the one shipped beside this module.
 */
export function loadParameterTable(url: URL = new URL("./parameters.json", import.meta.url)): ParameterTable {
  const raw: unknown = JSON.parse(readFileSync(url, "utf-8"));
  if (!Check(ParameterTableSchema, raw)) {
    throw new Error(`invalid parameter table ${url.pathname}: ${schemaErrors(ParameterTableSchema, raw).join("; ")}`);
  }

  const entry = (kind: ResourceKind): Record<string, ParameterSpec> => {
    const specs = raw[kind];
    if (!specs) throw new Error(`parameter table ${url.pathname} has no entry for ${kind}`);
    return specs;
  };

  return {
    datasetGroup: entry("datasetGroup"),
    schema: entry("schema"),
    dataset: entry("dataset"),
    datasetImportJob: entry("datasetImportJob"),
    eventTracker: entry("eventTracker"),
    filter: entry("filter"),
    solution: entry("solution"),
    solutionVersion: entry("solutionVersion"),
    campaign: entry("campaign"),
    recommender: entry("recommender"),
    batchInferenceJob: entry("batchInferenceJob"),
    batchSegmentJob: entry("batchSegmentJob"),
  };
}

// =============================================================================
// Resolution
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function lookup(event: unknown, path: string): unknown {
  let current = event;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

export function formatParameter(key: string, format: ParameterFormat | undefined, value: unknown): unknown {
  const invalid = () =>
    new ParameterResolutionError(key, `invalid ${format} value for ${key}: ${JSON.stringify(value)}`);

  switch (format) {
    case undefined:
      return value;
    case "string":
      return typeof value === "string" ? value : JSON.stringify(value);
    case "seconds":
      if (typeof value !== "string" && typeof value !== "number") throw invalid();
      try {
        return parseDuration(value);
      } catch {
        throw invalid();
      }
    case "iso8601": {
      if (typeof value !== "string" && !(value instanceof Date)) throw invalid();
      const date = new Date(value);
      if (Number.isNaN(date.getTime())) throw invalid();
      return date;
    }
    case "int": {
      const parsed = typeof value === "number" ? Math.trunc(value) : Number.parseInt(String(value), 10);
      if (Number.isNaN(parsed)) throw invalid();
      return parsed;
    }
  }
}

export function resolveParameter(
  key: string,
  spec: ParameterSpec,
  event: unknown,
  env: Record<string, string | undefined> = process.env,
): unknown {
  let value = spec.source === "event" ? lookup(event, spec.path) : env[spec.path];

  if (isMissing(value)) {
    if (spec.default === OMIT) return undefined;
    if (spec.default === undefined) {
      throw new ParameterResolutionError(
        key,
        `missing configuration for ${key}, expected from ${spec.source} at path ${spec.path}`,
      );
    }
    value = spec.default;
  }
  return formatParameter(key, spec.as, value);
}

/**
 * Resolve every parameter of a kind, leaving out omitted ones.
 */
export function resolveParameters(
  specs: Record<string, ParameterSpec>,
  event: unknown,
  env: Record<string, string | undefined> = process.env,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, spec] of Object.entries(specs)) {
    const value = resolveParameter(key, spec, event, env);
    if (value !== undefined) resolved[key] = value;
  }
  return resolved;
}
