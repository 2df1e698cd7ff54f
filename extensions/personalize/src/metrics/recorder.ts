/**
 * Workflow metrics
 *
 * Counters the workflow emits: one `<Kind>Created` per create call, scheduler
 * job counts, workflow outcomes and offline solution metrics. Publishing a
 * metric never fails the caller; a rejected `PutMetricData` is logged.
 */

import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";
import { getWorkflowLogger, type WorkflowLogger } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";

export type MetricDimensions = Record<string, string>;

export type MetricDatum = {
  name: string;
  value: number;
  unit: StandardUnit;
  dimensions: MetricDimensions;
};

export interface MetricsRecorder {
  record(name: string, value?: number, options?: { unit?: StandardUnit; dimensions?: MetricDimensions }): Promise<void>;
}

function toDatum(
  name: string,
  value: number | undefined,
  options: { unit?: StandardUnit; dimensions?: MetricDimensions } | undefined,
): MetricDatum {
  return {
    name,
    value: value ?? 1,
    unit: options?.unit ?? "Count",
    dimensions: options?.dimensions ?? {},
  };
}

// =============================================================================
// CloudWatch
// =============================================================================

export type CloudWatchMetricsConfig = {
  namespace: string;
  region?: string;
  client?: Pick<CloudWatchClient, "send">;
  logger?: WorkflowLogger;
};

export class CloudWatchMetricsRecorder implements MetricsRecorder {
  private client: Pick<CloudWatchClient, "send">;
  private namespace: string;
  private logger: WorkflowLogger;

  constructor(config: CloudWatchMetricsConfig) {
    this.namespace = config.namespace;
    this.client = config.client ?? new CloudWatchClient({ region: config.region || "us-east-1" });
    this.logger = config.logger ?? getWorkflowLogger("metrics");
  }

  async record(
    name: string,
    value?: number,
    options?: { unit?: StandardUnit; dimensions?: MetricDimensions },
  ): Promise<void> {
    const datum = toDatum(name, value, options);
    try {
      await this.client.send(
        new PutMetricDataCommand({
          Namespace: this.namespace,
          MetricData: [
            {
              MetricName: datum.name,
              Value: datum.value,
              Unit: datum.unit,
              Dimensions: Object.entries(datum.dimensions).map(([Name, Value]) => ({ Name, Value })),
            },
          ],
        }),
      );
    } catch (error) {
      this.logger.error(`failed to publish metric ${name}`, { error: formatErrorMessage(error) });
    }
  }
}

// =============================================================================
// In-Memory
// =============================================================================

export class InMemoryMetricsRecorder implements MetricsRecorder {
  readonly data: MetricDatum[] = [];

  async record(
    name: string,
    value?: number,
    options?: { unit?: StandardUnit; dimensions?: MetricDimensions },
  ): Promise<void> {
    this.data.push(toDatum(name, value, options));
  }

  /** Sum of every recorded value for `name` */
  total(name: string): number {
    return this.data.filter((d) => d.name === name).reduce((sum, d) => sum + d.value, 0);
  }

  clear(): void {
    this.data.length = 0;
  }
}
