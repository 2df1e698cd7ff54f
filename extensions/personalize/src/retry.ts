/**
 * AWS Retry Runner
 *
 * Exponential backoff with jitter for the calls the workflow makes against its
 * own infrastructure: the schedules table, Step Functions, the configuration
 * bucket and the notification topic. Personalize calls made by the
 * reconciliation engine are not wrapped; the orchestrating state machine
 * retries those.
 */

import type { WorkflowLogger } from "./logging/index.js";
import { awsErrorName } from "./personalize/errors.js";

// =============================================================================
// Types
// =============================================================================

export type RetryConfig = {
  /** Total calls, including the first */
  attempts?: number;
  /** Delay before the first retry; doubles on each further retry */
  minDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay randomly added or removed, 0-1 */
  jitter?: number;
};

export type RetryInfo = {
  label: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Server-requested delay, which replaces the exponential step */
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

/**
 * Retry configuration for AWS calls when the caller gives none.
 */
export const AWS_RETRY_DEFAULTS: Readonly<Required<RetryConfig>> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * A one-line description of a thrown value, for logs and notifications.
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  if (err === null || typeof err !== "object") return String(err);
  try {
    return JSON.stringify(err);
  } catch {
    return "[unserializable error]";
  }
}

/**
 * Node system error code (`ECONNRESET`) or SDK `code`, as a string.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" || typeof code === "number" ? String(code) : undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

// =============================================================================
// Backoff
// =============================================================================

export function resolveRetryConfig(
  defaults: Readonly<Required<RetryConfig>>,
  overrides: RetryConfig = {},
): Required<RetryConfig> {
  const minDelayMs = Math.max(0, Math.round(overrides.minDelayMs ?? defaults.minDelayMs));
  return {
    attempts: Math.max(1, Math.round(overrides.attempts ?? defaults.attempts)),
    minDelayMs,
    maxDelayMs: Math.max(minDelayMs, Math.round(overrides.maxDelayMs ?? defaults.maxDelayMs)),
    jitter: Math.min(1, Math.max(0, overrides.jitter ?? defaults.jitter)),
  };
}

/**
 * Delay before retry number `attempt` (1-based), kept within the configured bounds.
 */
export function backoffDelay(
  attempt: number,
  config: Required<RetryConfig>,
  requestedMs?: number,
  random: () => number = Math.random,
): number {
  const base =
    requestedMs !== undefined && Number.isFinite(requestedMs) ? requestedMs : config.minDelayMs * 2 ** (attempt - 1);
  const spread = config.jitter > 0 ? base * config.jitter * (random() * 2 - 1) : 0;
  return Math.min(config.maxDelayMs, Math.max(config.minDelayMs, Math.round(base + spread)));
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Call `fn` until it resolves, `shouldRetry` declines, or the attempts run out.
 * The last error is rethrown.
 */
export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = resolveRetryConfig(AWS_RETRY_DEFAULTS, options);
  const sleep = options.sleep ?? wait;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const retryable = options.shouldRetry ? options.shouldRetry(err, attempt) : true;
      if (attempt >= config.attempts || !retryable) throw err;

      const delayMs = backoffDelay(attempt, config, options.retryAfterMs?.(err), options.random);
      options.onRetry?.({
        label: options.label ?? "operation",
        attempt,
        maxAttempts: config.attempts,
        delayMs,
        err,
      });
      await sleep(delayMs);
    }
  }
}

// =============================================================================
// AWS Classification
// =============================================================================

const TRANSIENT_AWS_ERRORS = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ProvisionedThroughputExceededException",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalServerError",
  "InternalServerErrorException",
  "RequestTimeout",
  "SlowDown",
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
]);

/**
 * Outcomes of a decision made by the service: a lost conditional write, a
 * duplicate or missing execution, a rejected request.
 */
const PERMANENT_AWS_ERRORS = new Set([
  "ConditionalCheckFailedException",
  "TransactionCanceledException",
  "ValidationException",
  "ExecutionAlreadyExists",
  "ExecutionDoesNotExist",
  "AccessDeniedException",
  "NoSuchKey",
  "NotFoundException",
]);

const TRANSIENT_MESSAGE = /throttl|rate exceeded|timed? ?out|socket hang up|connection reset/i;

export function shouldRetryAWSError(err: unknown): boolean {
  if (err === undefined || err === null) return false;

  const names = [awsErrorName(err), extractErrorCode(err)];
  if (names.some((name) => name !== undefined && PERMANENT_AWS_ERRORS.has(name))) return false;
  if (names.some((name) => name !== undefined && TRANSIENT_AWS_ERRORS.has(name))) return true;

  const status = httpStatusOf(err);
  if (status !== undefined && (status === 429 || status >= 500)) return true;

  return TRANSIENT_MESSAGE.test(formatErrorMessage(err));
}

/**
 * The `Retry-After` header of a throttled response, in milliseconds.
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$response" in err)) return undefined;
  const response = err.$response;
  if (typeof response !== "object" || response === null || !("headers" in response)) return undefined;
  const headers = response.headers;
  if (typeof headers !== "object" || headers === null || !("retry-after" in headers)) return undefined;
  const value = headers["retry-after"];
  const seconds = typeof value === "string" ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

export type AWSRetryOptions = {
  retry?: RetryConfig;
  label?: string;
  logger?: WorkflowLogger;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Run an AWS call, retrying throttling, 5xx and connection failures.
 *
 * @example
 * ```typescript
 * const item = await withAWSRetry(
 *   () => documentClient.send(new GetCommand({ TableName: table, Key: key })),
 *   { label: "GetItem", logger },
 * );
 * ```
 */
export async function withAWSRetry<T>(fn: () => Promise<T>, options: AWSRetryOptions = {}): Promise<T> {
  return retryAsync(fn, {
    ...options.retry,
    label: options.label,
    shouldRetry: options.shouldRetry ?? shouldRetryAWSError,
    retryAfterMs: getAWSRetryAfterMs,
    sleep: options.sleep,
    onRetry: (info) => {
      options.logger?.warn(`${info.label} failed, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`, {
        error: formatErrorMessage(info.err),
      });
      options.onRetry?.(info);
    },
  });
}
