/**
 * Task storage
 *
 * One row per task version, keyed by (`name`, `version`). The `v0` pointer row
 * holds `latest` plus a copy of the newest snapshot. Every write moves the
 * pointer and adds the next snapshot in one conditional transaction.
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DynamoDBDocumentClient,
  GetCommand,
  TransactWriteCommand,
  BatchWriteCommand,
  ScanCommand,
  type BatchWriteCommandInput,
} from "@aws-sdk/lib-dynamodb";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { withAWSRetry, type RetryConfig } from "../retry.js";
import { Task, TaskValidationError, versionKey, type TaskRecord, type TaskTarget } from "./task.js";

export const BATCH_WRITE_LIMIT = 25;

type WriteRequests = NonNullable<BatchWriteCommandInput["RequestItems"]>[string];

export type TaskVersionWrite = {
  name: string;
  /** `latest` as read from the pointer; 0 when the task does not exist */
  expectedLatest: number;
  schedule: string;
  target: TaskTarget;
};

export interface TaskStore {
  get(name: string, version: number): Promise<TaskRecord | undefined>;
  /** Compare-and-swap on the pointer. Throws ConcurrentTaskUpdateError when `latest` moved. */
  putVersion(write: TaskVersionWrite): Promise<number>;
  deleteVersions(name: string, latest: number): Promise<void>;
  /** Task names of every row, in scan order; a name repeats once per version row. */
  scanNames(): AsyncGenerator<string>;
}

export class ConcurrentTaskUpdateError extends Error {
  constructor(
    readonly taskName: string,
    readonly expectedLatest: number,
  ) {
    super(`task ${taskName} was modified concurrently (expected version ${expectedLatest})`);
    this.name = "ConcurrentTaskUpdateError";
  }
}

// =============================================================================
// Record Conversion
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toTaskRecord(item: Record<string, unknown>): TaskRecord {
  const { name, version, schedule, latest } = item;
  if (typeof name !== "string" || typeof version !== "string") {
    throw new TaskValidationError("task row is missing its name or version");
  }
  const record: TaskRecord = { name, version };
  if (typeof schedule === "string") record.schedule = schedule;
  if (typeof item.state_machine_arn === "string") record.state_machine_arn = item.state_machine_arn;
  if (isPlainObject(item.state_machine_input)) record.state_machine_input = item.state_machine_input;
  if (typeof latest === "number") record.latest = latest;
  return record;
}

// =============================================================================
// DynamoDB
// =============================================================================

export type DynamoTaskStoreConfig = {
  tableName: string;
  region?: string;
  client?: Pick<DynamoDBDocumentClient, "send">;
  retry?: RetryConfig;
  logger?: WorkflowLogger;
  sleep?: (ms: number) => Promise<void>;
  /** Rounds of resubmitting unprocessed deletes before giving up */
  unprocessedRetries?: number;
};

function isConditionFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "ConditionalCheckFailedException") return true;
  if (err.name !== "TransactionCanceledException") return false;
  const reasons = "CancellationReasons" in err ? err.CancellationReasons : undefined;
  if (!Array.isArray(reasons)) return true;
  return reasons.some((reason) => isPlainObject(reason) && reason.Code === "ConditionalCheckFailed");
}

export class DynamoTaskStore implements TaskStore {
  private client: Pick<DynamoDBDocumentClient, "send">;
  private logger: WorkflowLogger;

  constructor(private config: DynamoTaskStoreConfig) {
    this.client =
      config.client ??
      DynamoDBDocumentClient.from(new DynamoDBClient({ region: config.region || "us-east-1" }), {
        marshallOptions: { removeUndefinedValues: true },
      });
    this.logger = config.logger ?? getWorkflowLogger("scheduler/store");
  }

  async get(name: string, version: number): Promise<TaskRecord | undefined> {
    const response = await withAWSRetry(
      () =>
        this.client.send(
          new GetCommand({
            TableName: this.config.tableName,
            Key: Task.key(name, version),
            ConsistentRead: true,
          }),
        ),
      { retry: this.config.retry, label: "GetItem", logger: this.logger, sleep: this.config.sleep },
    );
    return response.Item ? toTaskRecord(response.Item) : undefined;
  }

  async putVersion(write: TaskVersionWrite): Promise<number> {
    const next = write.expectedLatest + 1;
    // the first version needs a missing pointer; later ones need the pointer the writer read
    const firstVersion = write.expectedLatest === 0;
    try {
      await withAWSRetry(
        () =>
          this.client.send(
            new TransactWriteCommand({
              TransactItems: [
                {
                  Update: {
                    TableName: this.config.tableName,
                    Key: Task.key(write.name, 0),
                    ConditionExpression: firstVersion ? "attribute_not_exists(#latest)" : "#latest = :latest",
                    UpdateExpression:
                      "SET #latest = :version_next, #schedule = :schedule, #state_machine_input = :state_machine_input, #state_machine_arn = :state_machine_arn",
                    ExpressionAttributeNames: {
                      "#latest": "latest",
                      "#schedule": "schedule",
                      "#state_machine_arn": "state_machine_arn",
                      "#state_machine_input": "state_machine_input",
                    },
                    ExpressionAttributeValues: {
                      ...(firstVersion ? {} : { ":latest": write.expectedLatest }),
                      ":version_next": next,
                      ":schedule": write.schedule,
                      ":state_machine_input": write.target.input,
                      ":state_machine_arn": write.target.arn,
                    },
                  },
                },
                {
                  Put: {
                    TableName: this.config.tableName,
                    Item: {
                      ...Task.key(write.name, next),
                      schedule: write.schedule,
                      state_machine_input: write.target.input,
                      state_machine_arn: write.target.arn,
                    },
                  },
                },
              ],
            }),
          ),
        { retry: this.config.retry, label: "TransactWriteItems", logger: this.logger, sleep: this.config.sleep },
      );
    } catch (err) {
      if (isConditionFailure(err)) {
        throw new ConcurrentTaskUpdateError(write.name, write.expectedLatest);
      }
      throw err;
    }
    return next;
  }

  async deleteVersions(name: string, latest: number): Promise<void> {
    const keys = Array.from({ length: latest + 1 }, (_, version) => Task.key(name, version));
    const rounds = this.config.unprocessedRetries ?? 5;

    for (let i = 0; i < keys.length; i += BATCH_WRITE_LIMIT) {
      let requests: WriteRequests = keys
        .slice(i, i + BATCH_WRITE_LIMIT)
        .map((key) => ({ DeleteRequest: { Key: key } }));

      for (let round = 0; requests.length > 0; round++) {
        if (round > rounds) {
          throw new Error(`unable to delete ${requests.length} row(s) of task ${name}`);
        }
        const batch = requests;
        const response = await withAWSRetry(
          () => this.client.send(new BatchWriteCommand({ RequestItems: { [this.config.tableName]: batch } })),
          { retry: this.config.retry, label: "BatchWriteItem", logger: this.logger, sleep: this.config.sleep },
        );
        requests = response.UnprocessedItems?.[this.config.tableName] ?? [];
        if (requests.length > 0) {
          this.logger.warn(`resubmitting ${requests.length} unprocessed delete(s) for ${name}`);
        }
      }
    }
  }

  async *scanNames(): AsyncGenerator<string> {
    let startKey: Record<string, unknown> | undefined;
    do {
      const exclusiveStartKey = startKey;
      const response = await withAWSRetry(
        () =>
          this.client.send(
            new ScanCommand({
              TableName: this.config.tableName,
              ProjectionExpression: "#name",
              ExpressionAttributeNames: { "#name": "name" },
              ExclusiveStartKey: exclusiveStartKey,
            }),
          ),
        { retry: this.config.retry, label: "Scan", logger: this.logger, sleep: this.config.sleep },
      );
      for (const item of response.Items ?? []) {
        if (typeof item.name === "string") yield item.name;
      }
      startKey = response.LastEvaluatedKey;
    } while (startKey);
  }
}

// =============================================================================
// In-Memory
// =============================================================================

/**
 * Process-local store with the same compare-and-swap semantics as the table.
 */
export class InMemoryTaskStore implements TaskStore {
  private rows = new Map<string, TaskRecord>();

  constructor(private options: { pageSize?: number } = {}) {}

  private rowKey(name: string, version: number): string {
    return `${name}\u0000${versionKey(version)}`;
  }

  async get(name: string, version: number): Promise<TaskRecord | undefined> {
    const row = this.rows.get(this.rowKey(name, version));
    return row ? structuredClone(row) : undefined;
  }

  async putVersion(write: TaskVersionWrite): Promise<number> {
    const pointer = this.rows.get(this.rowKey(write.name, 0));
    const current = write.expectedLatest === 0 ? undefined : write.expectedLatest;
    if (pointer?.latest !== current) {
      throw new ConcurrentTaskUpdateError(write.name, write.expectedLatest);
    }

    const next = write.expectedLatest + 1;
    const snapshot = {
      schedule: write.schedule,
      state_machine_arn: write.target.arn,
      state_machine_input: structuredClone(write.target.input),
    };
    this.rows.set(this.rowKey(write.name, 0), {
      ...pointer,
      ...Task.key(write.name, 0),
      ...snapshot,
      latest: next,
    });
    this.rows.set(this.rowKey(write.name, next), { ...Task.key(write.name, next), ...structuredClone(snapshot) });
    return next;
  }

  async deleteVersions(name: string, latest: number): Promise<void> {
    for (let version = 0; version <= latest; version++) {
      this.rows.delete(this.rowKey(name, version));
    }
  }

  async *scanNames(): AsyncGenerator<string> {
    const names = [...this.rows.values()].map((row) => row.name);
    const pageSize = this.options.pageSize ?? names.length;
    for (let i = 0; i < names.length; i += Math.max(1, pageSize)) {
      for (const name of names.slice(i, i + Math.max(1, pageSize))) {
        yield name;
      }
    }
  }

  get size(): number {
    return this.rows.size;
  }
}
