/**
 * SNS publisher for per-protocol messages (`MessageStructure: "json"`).
 */

import { SNSClient, PublishCommand } from "@aws-sdk/client-sns";
import { withAWSRetry, type AWSRetryOptions } from "../retry.js";

export type ProtocolMessages = {
  default: string;
  sms?: string;
  email?: string;
  "email-json"?: string;
  sqs?: string;
};

export type SnsPublisherConfig = {
  topicArn: string;
  region?: string;
  client?: Pick<SNSClient, "send">;
  retryOptions?: AWSRetryOptions;
};

export class SnsPublisher {
  private client: Pick<SNSClient, "send">;

  constructor(private config: SnsPublisherConfig) {
    this.client = config.client ?? new SNSClient({ region: config.region || "us-east-1" });
  }

  get topicArn(): string {
    return this.config.topicArn;
  }

  /**
   * Publish one message per protocol and return the message ID.
   */
  async publishMultiProtocol(messages: ProtocolMessages, subject: string): Promise<string | undefined> {
    const response = await withAWSRetry(
      () =>
        this.client.send(
          new PublishCommand({
            TopicArn: this.config.topicArn,
            Message: JSON.stringify(messages),
            MessageStructure: "json",
            Subject: subject,
          }),
        ),
      { ...this.config.retryOptions, label: "Publish" },
    );
    return response.MessageId;
  }
}
