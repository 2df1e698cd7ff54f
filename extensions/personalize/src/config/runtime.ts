/**
 * Runtime configuration from environment variables.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import type { WorkflowLogLevel } from "../logging/index.js";

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_PARTITION = "aws";
export const DEFAULT_METRICS_NAMESPACE = "personalize-orchestrator";
export const DEFAULT_SOLUTION_NAME = "Maintaining Personalized Experiences";

const NonEmpty = Type.String({ minLength: 1 });

export const RuntimeEnvironmentSchema = Type.Object({
  AWS_REGION: Type.Optional(NonEmpty),
  AWS_PARTITION: Type.Optional(Type.Union([Type.Literal("aws"), Type.Literal("aws-cn"), Type.Literal("aws-us-gov")])),
  AWS_ACCOUNT_ID: Type.String({ pattern: "^[0-9]{12}$" }),
  DDB_SCHEDULES_TABLE: Type.Optional(NonEmpty),
  DDB_SCHEDULER_STEPFUNCTION: Type.Optional(NonEmpty),
  EVENT_BUS_ARN: Type.Optional(NonEmpty),
  SNS_TOPIC_ARN: Type.Optional(NonEmpty),
  STATE_MACHINE_ARN: Type.Optional(NonEmpty),
  METRICS_NAMESPACE: Type.Optional(NonEmpty),
  SOLUTION_NAME: Type.Optional(NonEmpty),
  LOG_LEVEL: Type.Optional(
    Type.Union([
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
    ]),
  ),
});

export type RuntimeEnvironment = Static<typeof RuntimeEnvironmentSchema>;

export type RuntimeConfig = {
  region: string;
  partition: string;
  accountId: string;
  schedulesTable?: string;
  schedulerStateMachineArn?: string;
  eventBusArn?: string;
  snsTopicArn?: string;
  stateMachineArn?: string;
  metricsNamespace: string;
  solutionName: string;
  logLevel: WorkflowLogLevel;
};

/** Environment variable behind each optional setting */
export const SETTING_VARIABLES = {
  schedulesTable: "DDB_SCHEDULES_TABLE",
  schedulerStateMachineArn: "DDB_SCHEDULER_STEPFUNCTION",
  eventBusArn: "EVENT_BUS_ARN",
  snsTopicArn: "SNS_TOPIC_ARN",
  stateMachineArn: "STATE_MACHINE_ARN",
} as const;

export type OptionalSetting = keyof typeof SETTING_VARIABLES;

export class ConfigurationError extends Error {
  constructor(readonly errors: string[]) {
    super(`invalid runtime configuration: ${errors.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export function loadRuntimeConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  // empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));

  if (!Check(RuntimeEnvironmentSchema, present)) {
    const errors = [...Errors(RuntimeEnvironmentSchema, present)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`,
    );
    throw new ConfigurationError(errors);
  }

  return {
    region: present.AWS_REGION ?? DEFAULT_REGION,
    partition: present.AWS_PARTITION ?? DEFAULT_PARTITION,
    accountId: present.AWS_ACCOUNT_ID,
    schedulesTable: present.DDB_SCHEDULES_TABLE,
    schedulerStateMachineArn: present.DDB_SCHEDULER_STEPFUNCTION,
    eventBusArn: present.EVENT_BUS_ARN,
    snsTopicArn: present.SNS_TOPIC_ARN,
    stateMachineArn: present.STATE_MACHINE_ARN,
    metricsNamespace: present.METRICS_NAMESPACE ?? DEFAULT_METRICS_NAMESPACE,
    solutionName: present.SOLUTION_NAME ?? DEFAULT_SOLUTION_NAME,
    logLevel: present.LOG_LEVEL ?? "info",
  };
}

/**
 * Read a setting only some components need, failing when it is unset.
 */
export function requireSetting(config: RuntimeConfig, setting: OptionalSetting): string {
  const value = config[setting];
  if (!value) {
    throw new ConfigurationError([`${SETTING_VARIABLES[setting]}: is required`]);
  }
  return value;
}
