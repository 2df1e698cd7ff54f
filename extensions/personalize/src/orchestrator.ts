/**
 * Component wiring
 *
 * Builds the workflow components from the runtime configuration. Components
 * that need an optional setting (the schedules table, the workflow state
 * machine, the notification topic) are built on first use and fail with a
 * `ConfigurationError` when it is unset.
 */

import type { PersonalizeClient } from "@aws-sdk/client-personalize";
import type { SFNClient } from "@aws-sdk/client-sfn";
import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { EventBridgeClient } from "@aws-sdk/client-eventbridge";
import type { SNSClient } from "@aws-sdk/client-sns";
import type { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { createWorkflowLogger, setGlobalWorkflowLogger, type LogTransport, type WorkflowLogger } from "./logging/index.js";
import { loadRuntimeConfig, requireSetting, type RuntimeConfig } from "./config/index.js";
import type { AWSContext } from "./resource/arn.js";
import { PersonalizeResourceProvider, type ResourceProvider } from "./personalize/provider.js";
import { CloudWatchMetricsRecorder, type MetricsRecorder } from "./metrics/recorder.js";
import { ReconciliationEngine } from "./reconciliation/engine.js";
import { S3DataSource, type S3Sender } from "./storage/s3-freshness.js";
import { EventBridgeNotifier } from "./notifications/eventbridge.js";
import { NotificationDispatcher } from "./notifications/dispatcher.js";
import type { Notifier } from "./notifications/notifier.js";
import { SnsPublisher } from "./notifications/sns.js";
import {
  publishWorkflowOutcome,
  type WorkflowOutcomeEvent,
  type WorkflowOutcomeMessage,
} from "./notifications/workflow-outcome.js";
import { ReconciliationPipeline } from "./pipeline/pipeline.js";
import { DynamoTaskStore } from "./scheduler/store.js";
import { SfnExecutionController } from "./scheduler/executions.js";
import { Scheduler } from "./scheduler/manager.js";
import { ConfigIntake } from "./intake/config-upload.js";

export type OrchestratorClients = {
  personalize?: Pick<PersonalizeClient, "send">;
  s3?: S3Sender;
  sfn?: Pick<SFNClient, "send">;
  dynamodb?: Pick<DynamoDBDocumentClient, "send">;
  eventbridge?: Pick<EventBridgeClient, "send">;
  sns?: Pick<SNSClient, "send">;
  cloudwatch?: Pick<CloudWatchClient, "send">;
};

export type OrchestratorOptions = {
  clients?: OrchestratorClients;
  /** Log transports; the console when empty */
  transports?: LogTransport[];
  /** Replaces the CloudWatch recorder */
  metrics?: MetricsRecorder;
  clock?: () => Date;
};

export class Orchestrator {
  readonly context: AWSContext;
  readonly logger: WorkflowLogger;
  readonly metrics: MetricsRecorder;
  readonly provider: ResourceProvider;
  readonly engine: ReconciliationEngine;
  readonly dispatcher: NotificationDispatcher;
  readonly pipeline: ReconciliationPipeline;

  private schedulerInstance?: Scheduler;
  private intakeInstance?: ConfigIntake;
  private publisherInstance?: SnsPublisher;

  constructor(
    readonly config: RuntimeConfig,
    private readonly options: OrchestratorOptions = {},
  ) {
    const clients = options.clients ?? {};
    this.context = { partition: config.partition, region: config.region, accountId: config.accountId };

    this.logger = createWorkflowLogger("core", { level: config.logLevel, transports: options.transports });
    setGlobalWorkflowLogger(this.logger);

    this.metrics =
      options.metrics ??
      new CloudWatchMetricsRecorder({
        namespace: config.metricsNamespace,
        region: config.region,
        client: clients.cloudwatch,
        logger: this.logger.child("metrics"),
      });

    this.provider = new PersonalizeResourceProvider({ region: config.region, client: clients.personalize });
    this.engine = new ReconciliationEngine({
      provider: this.provider,
      context: this.context,
      metrics: this.metrics,
      logger: this.logger.child("reconcile"),
      clock: options.clock,
      dataSource: clients.s3 ? (url) => new S3DataSource(url, clients.s3) : undefined,
    });

    const notifiers: Notifier[] = [];
    if (config.eventBusArn) {
      notifiers.push(
        new EventBridgeNotifier({
          eventBusName: config.eventBusArn,
          region: config.region,
          client: clients.eventbridge,
          logger: this.logger.child("notify/eventbridge"),
        }),
      );
    }
    this.dispatcher = new NotificationDispatcher(notifiers, { logger: this.logger.child("notify") });
    this.pipeline = new ReconciliationPipeline({
      engine: this.engine,
      dispatcher: this.dispatcher,
      logger: this.logger.child("pipeline"),
    });
  }

  get scheduler(): Scheduler {
    this.schedulerInstance ??= new Scheduler({
      store: new DynamoTaskStore({
        tableName: requireSetting(this.config, "schedulesTable"),
        region: this.config.region,
        client: this.options.clients?.dynamodb,
        logger: this.logger.child("scheduler/store"),
      }),
      executions: this.executions(),
      triggerStateMachineArn: requireSetting(this.config, "schedulerStateMachineArn"),
      metrics: this.metrics,
      logger: this.logger.child("scheduler"),
    });
    return this.schedulerInstance;
  }

  get intake(): ConfigIntake {
    this.intakeInstance ??= new ConfigIntake({
      stateMachineArn: requireSetting(this.config, "stateMachineArn"),
      publisher: this.config.snsTopicArn ? this.publisher : undefined,
      solutionName: this.config.solutionName,
      region: this.config.region,
      s3: this.options.clients?.s3,
      executions: this.executions(),
      metrics: this.metrics,
      logger: this.logger.child("intake"),
      clock: this.options.clock,
    });
    return this.intakeInstance;
  }

  get publisher(): SnsPublisher {
    this.publisherInstance ??= new SnsPublisher({
      topicArn: requireSetting(this.config, "snsTopicArn"),
      region: this.config.region,
      client: this.options.clients?.sns,
    });
    return this.publisherInstance;
  }

  /**
   * Announce a finished workflow execution on the notification topic.
   */
  async publishOutcome(event: WorkflowOutcomeEvent, traceId?: string): Promise<WorkflowOutcomeMessage> {
    return publishWorkflowOutcome(event, {
      publisher: this.publisher,
      solutionName: this.config.solutionName,
      context: { ...this.context, traceId },
      metrics: this.metrics,
      logger: this.logger.child("notify/outcome"),
    });
  }

  private executions(): SfnExecutionController {
    return new SfnExecutionController({
      region: this.config.region,
      client: this.options.clients?.sfn,
      logger: this.logger.child("scheduler/executions"),
    });
  }
}

/**
 * Wire the components for the environment, by default `process.env`.
 */
export function createOrchestrator(
  env: Record<string, string | undefined> = process.env,
  options?: OrchestratorOptions,
): Orchestrator {
  return new Orchestrator(loadRuntimeConfig(env), options);
}
