/**
 * Defaults and workflow stamps applied to an accepted configuration.
 */

import { DATASET_TYPES } from "./schema.js";

export type ConfigDocument = Record<string, unknown>;

export const DEFAULT_MAX_AGE = "365 days";

/** Resources whose completion is announced, and so need a start time */
const NOTIFYING_KEYS = new Set([
  "datasetGroup",
  "solutions",
  "solutionVersions",
  "recommenders",
  "campaigns",
  "batchInferenceJobs",
  "batchSegmentJobs",
  "filters",
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const pad = (value: number): string => String(value).padStart(2, "0");

/** `YYYY_MM_DD_HH_MM_SS` in UTC, the suffix of generated job names */
export function formatCurrentDate(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join("_");
}

/** ISO-8601 to the second, e.g. `2024-06-12T08:00:00Z` */
export function formatTimeStarted(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function child(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function ensureList(parent: Record<string, unknown>, key: string): void {
  if (!Array.isArray(parent[key])) parent[key] = [];
}

function ensureTags(resource: Record<string, unknown>): void {
  const serviceConfig = resource.serviceConfig;
  if (isRecord(serviceConfig) && !Array.isArray(serviceConfig.tags)) {
    serviceConfig.tags = [];
  }
}

function stampTimeStarted(value: unknown, timeStarted: string): void {
  if (Array.isArray(value)) {
    for (const item of value) stampTimeStarted(item, timeStarted);
    return;
  }
  if (!isRecord(value)) return;

  for (const [key, nested] of Object.entries(value)) {
    if (!NOTIFYING_KEYS.has(key)) {
      stampTimeStarted(nested, timeStarted);
      continue;
    }
    const resources = Array.isArray(nested) ? records(nested) : isRecord(nested) ? [nested] : [];
    for (const resource of resources) {
      child(resource, "workflowConfig").timeStarted = timeStarted;
      stampTimeStarted(resource, timeStarted);
    }
  }
}

/**
 * Return a copy of `config` with defaults filled in: the current date, the
 * dataset group maximum age, empty job and tag lists, full import and training
 * modes, and a `timeStarted` on every resource that notifies.
 */
export function applyDefaults(config: ConfigDocument, now: Date = new Date()): ConfigDocument {
  const result = structuredClone(config);
  result.currentDate = formatCurrentDate(now);

  if (isRecord(result.datasetGroup)) {
    const workflowConfig = child(result.datasetGroup, "workflowConfig");
    workflowConfig.maxAge ??= DEFAULT_MAX_AGE;
    ensureTags(result.datasetGroup);
  }

  if (isRecord(result.datasets)) {
    for (const type of DATASET_TYPES) {
      const dataset = result.datasets[type];
      if (!isRecord(dataset) || !isRecord(dataset.dataset)) continue;
      ensureTags(dataset.dataset);
      const importJob = child(dataset, "datasetImportJob");
      const serviceConfig = child(importJob, "serviceConfig");
      serviceConfig.importMode ??= "FULL";
    }
  }

  ensureList(result, "solutions");
  ensureList(result, "recommenders");
  if (isRecord(result.eventTracker)) ensureTags(result.eventTracker);
  for (const filter of records(result.filters)) ensureTags(filter);

  for (const solution of records(result.solutions)) {
    ensureTags(solution);
    for (const key of ["solutionVersions", "campaigns", "batchInferenceJobs", "batchSegmentJobs"]) {
      ensureList(solution, key);
    }
    for (const version of records(solution.solutionVersions)) {
      child(version, "serviceConfig").trainingMode ??= "FULL";
      ensureTags(version);
    }
    for (const key of ["campaigns", "batchInferenceJobs", "batchSegmentJobs"]) {
      for (const resource of records(solution[key])) ensureTags(resource);
    }
  }

  for (const recommender of records(result.recommenders)) {
    ensureTags(recommender);
    ensureList(recommender, "batchInferenceJobs");
    ensureList(recommender, "batchSegmentJobs");
    for (const key of ["batchInferenceJobs", "batchSegmentJobs"]) {
      for (const resource of records(recommender[key])) ensureTags(resource);
    }
  }

  stampTimeStarted(result, formatTimeStarted(now));
  return result;
}
