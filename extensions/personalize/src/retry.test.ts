import { describe, it, expect, vi } from "vitest";
import {
  AWS_RETRY_DEFAULTS,
  backoffDelay,
  extractErrorCode,
  formatErrorMessage,
  getAWSRetryAfterMs,
  resolveRetryConfig,
  retryAsync,
  shouldRetryAWSError,
  withAWSRetry,
} from "./retry.js";
import { createWorkflowLogger, MemoryTransport } from "./logging/index.js";

function awsError(name: string, message = name, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(message), { name, ...extra });
}

const noSleep = async () => {};

describe("retryAsync", () => {
  it("should resolve once a later attempt succeeds", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("first")).mockResolvedValueOnce("ok");

    await expect(retryAsync(fn, { attempts: 3, sleep: noSleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should rethrow the last error when attempts run out", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(retryAsync(fn, { attempts: 2, sleep: noSleep })).rejects.toThrow("second");
  });

  it("should stop at the first error shouldRetry declines", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fatal"));

    await expect(retryAsync(fn, { attempts: 5, sleep: noSleep, shouldRetry: () => false })).rejects.toThrow(
      "fatal",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should double the delay between attempts", async () => {
    const delays: number[] = [];
    const fn = vi.fn().mockRejectedValue(new Error("x"));

    await expect(
      retryAsync(fn, { attempts: 4, minDelayMs: 100, jitter: 0, sleep: noSleep, onRetry: (i) => delays.push(i.delayMs) }),
    ).rejects.toThrow("x");
    expect(delays).toEqual([100, 200, 400]);
  });
});

describe("backoffDelay", () => {
  const config = resolveRetryConfig(AWS_RETRY_DEFAULTS, { minDelayMs: 100, maxDelayMs: 1_000, jitter: 0.5 });

  it("should spread the delay by the jitter fraction", () => {
    expect(backoffDelay(2, config, undefined, () => 1)).toBe(300);
    expect(backoffDelay(2, config, undefined, () => 0)).toBe(100);
  });

  it("should cap at the maximum delay", () => {
    expect(backoffDelay(8, config, undefined, () => 0.5)).toBe(1_000);
  });

  it("should prefer the requested delay", () => {
    expect(backoffDelay(1, config, 600, () => 0.5)).toBe(600);
  });
});

describe("resolveRetryConfig", () => {
  it("should clamp overrides into range", () => {
    expect(resolveRetryConfig(AWS_RETRY_DEFAULTS, { attempts: 0, jitter: 4, minDelayMs: -5 })).toEqual({
      attempts: 1,
      minDelayMs: 0,
      maxDelayMs: 30_000,
      jitter: 1,
    });
  });
});

describe("shouldRetryAWSError", () => {
  it("should retry throttling and 5xx responses", () => {
    expect(shouldRetryAWSError(awsError("ThrottlingException"))).toBe(true);
    expect(shouldRetryAWSError(awsError("Unknown", "oops", { $metadata: { httpStatusCode: 502 } }))).toBe(true);
    expect(shouldRetryAWSError(Object.assign(new Error("socket"), { code: "ECONNRESET" }))).toBe(true);
  });

  it("should never retry a lost conditional write", () => {
    expect(shouldRetryAWSError(awsError("ConditionalCheckFailedException", "request timed out"))).toBe(false);
    expect(shouldRetryAWSError(awsError("TransactionCanceledException"))).toBe(false);
  });

  it("should not retry unknown errors", () => {
    expect(shouldRetryAWSError(new Error("bad input"))).toBe(false);
    expect(shouldRetryAWSError(undefined)).toBe(false);
  });
});

describe("getAWSRetryAfterMs", () => {
  it("should read the retry-after header in seconds", () => {
    const err = awsError("TooManyRequestsException", "slow", { $response: { headers: { "retry-after": "3" } } });
    expect(getAWSRetryAfterMs(err)).toBe(3000);
  });

  it("should be undefined without the header", () => {
    expect(getAWSRetryAfterMs(awsError("X", "x", { $response: { headers: {} } }))).toBeUndefined();
    expect(getAWSRetryAfterMs("x")).toBeUndefined();
  });
});

describe("error helpers", () => {
  it("should extract string and numeric codes", () => {
    expect(extractErrorCode({ code: "ECONNRESET" })).toBe("ECONNRESET");
    expect(extractErrorCode({ code: 42 })).toBe("42");
    expect(extractErrorCode("nope")).toBeUndefined();
  });

  it("should format messages from any value", () => {
    expect(formatErrorMessage(new Error("m"))).toBe("m");
    expect(formatErrorMessage(awsError("ThrottlingException", ""))).toBe("ThrottlingException");
    expect(formatErrorMessage("s")).toBe("s");
    expect(formatErrorMessage({ a: 1 })).toBe('{"a":1}');
    expect(formatErrorMessage(undefined)).toBe("undefined");
  });
});

describe("withAWSRetry", () => {
  it("should retry transient failures and log each retry", async () => {
    const transport = new MemoryTransport();
    const logger = createWorkflowLogger("test", { transports: [transport], level: "trace" });
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(awsError("ServiceUnavailableException")).mockResolvedValueOnce(7);

    await expect(
      withAWSRetry(fn, { label: "GetItem", logger, onRetry, sleep: noSleep, retry: { jitter: 0 } }),
    ).resolves.toBe(7);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, maxAttempts: 3, label: "GetItem" }));
    expect(transport.messages("warn")).toEqual(["GetItem failed, retry 1/3 in 100ms"]);
  });

  it("should not retry a permanent error", async () => {
    const fn = vi.fn().mockRejectedValue(awsError("ExecutionAlreadyExists"));

    await expect(withAWSRetry(fn, { sleep: noSleep })).rejects.toThrow("ExecutionAlreadyExists");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
