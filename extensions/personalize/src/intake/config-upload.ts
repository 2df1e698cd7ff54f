/**
 * Configuration intake
 *
 * A configuration file written to the data bucket is validated and, when it
 * holds no errors, handed to the main workflow as the input of a new
 * execution. Errors go to the notification topic instead.
 */

import { randomUUID } from "node:crypto";
import { posix } from "node:path";
import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import { validateConfiguration, type ConfigDocument } from "../config/index.js";
import type { MetricsRecorder } from "../metrics/recorder.js";
import type { ProtocolMessages, SnsPublisher } from "../notifications/sns.js";
import { SfnExecutionController, type ExecutionController } from "../scheduler/executions.js";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { withAWSRetry, type RetryConfig } from "../retry.js";
import type { S3Sender } from "../storage/s3-freshness.js";

// =============================================================================
// Types
// =============================================================================

export type ConfigIntakeConfig = {
  /** Main workflow state machine */
  stateMachineArn: string;
  /** Topic that receives configuration errors; errors are only logged without one */
  publisher?: SnsPublisher;
  solutionName: string;
  region?: string;
  s3?: S3Sender;
  executions?: ExecutionController;
  metrics?: MetricsRecorder;
  logger?: WorkflowLogger;
  clock?: () => Date;
  retry?: RetryConfig;
};

export type ConfigUploadResult =
  | { status: "started"; executionName: string; executionArn: string; config: ConfigDocument }
  | { status: "invalid"; errors: string[] };

/**
 * The parts of an S3 event notification the intake reads.
 */
export type S3UploadEvent = {
  Records: Array<{ s3: { bucket: { name: string }; object: { key: string } } }>;
};

// =============================================================================
// Messages
// =============================================================================

export function configurationErrorMessages(bucket: string, key: string, errors: string[]): ProtocolMessages {
  const summary = `There were ${errors.length} error(s) in the personalization job configuration s3://${bucket}/${key}`;

  let email = "There were errors detected when reading a personalization job configuration file:\n\n";
  for (const error of errors) {
    email += `   - ${error}\n`;
  }
  email += "\nPlease correct these errors and upload the configuration again.";

  return { default: summary, sms: summary, email };
}

/**
 * Key of an S3 event record, which arrives URL-encoded with `+` for spaces.
 */
export function decodeObjectKey(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, " "));
}

// =============================================================================
// Intake
// =============================================================================

export class ConfigIntake {
  private readonly s3: S3Sender;
  private readonly executions: ExecutionController;
  private readonly logger: WorkflowLogger;

  constructor(private readonly config: ConfigIntakeConfig) {
    this.logger = config.logger ?? getWorkflowLogger("intake");
    this.s3 = config.s3 ?? new S3Client({ region: config.region || "us-east-1" });
    this.executions =
      config.executions ?? new SfnExecutionController({ region: config.region, logger: this.logger });
  }

  async handleS3Event(event: S3UploadEvent): Promise<ConfigUploadResult[]> {
    const results: ConfigUploadResult[] = [];
    for (const record of event.Records) {
      results.push(await this.handleConfigUpload(record.s3.bucket.name, decodeObjectKey(record.s3.object.key)));
    }
    return results;
  }

  async handleConfigUpload(bucket: string, key: string): Promise<ConfigUploadResult> {
    this.logger.info(`processing configuration s3://${bucket}/${key}`);
    await this.config.metrics?.record("ConfigurationsProcessed");

    const content = await this.readObject(bucket, key);
    const result = validateConfiguration(content, { clock: this.config.clock, logger: this.logger });

    if (!result.valid || !result.config) {
      await this.config.metrics?.record("ConfigurationsProcessedFailures");
      await this.reportErrors(bucket, key, result.errors);
      return { status: "invalid", errors: result.errors };
    }

    const input: ConfigDocument = { ...result.config, bucket: { name: bucket, key: posix.dirname(key) } };
    const executionName = randomUUID();
    const executionArn = await this.executions.start({
      stateMachineArn: this.config.stateMachineArn,
      name: executionName,
      input,
    });

    await this.config.metrics?.record("ConfigurationsProcessedSuccesses");
    this.logger.info(`started workflow for dataset group ${result.datasetGroup}`, { executionArn });
    return { status: "started", executionName, executionArn, config: input };
  }

  private async readObject(bucket: string, key: string): Promise<string> {
    const response = await withAWSRetry(
      () => this.s3.send(new GetObjectCommand({ Bucket: bucket, Key: key })),
      { retry: this.config.retry, label: "GetObject", logger: this.logger },
    );
    if (!response.Body) {
      throw new Error(`s3://${bucket}/${key} has no content`);
    }
    return response.Body.transformToString("utf-8");
  }

  private async reportErrors(bucket: string, key: string, errors: string[]): Promise<void> {
    for (const error of errors) {
      this.logger.error(`personalization job configuration error: ${error}`);
    }
    if (!this.config.publisher) {
      this.logger.warn("no notification topic configured, configuration errors were not published");
      return;
    }
    await this.config.publisher.publishMultiProtocol(
      configurationErrorMessages(bucket, key, errors),
      `${this.config.solutionName} Notifications`,
    );
  }
}

export function createConfigIntake(config: ConfigIntakeConfig): ConfigIntake {
  return new ConfigIntake(config);
}

/**
 * Validate one uploaded configuration and start the workflow for it.
 */
export async function handleConfigUpload(
  bucket: string,
  key: string,
  config: ConfigIntakeConfig,
): Promise<ConfigUploadResult> {
  return new ConfigIntake(config).handleConfigUpload(bucket, key);
}
