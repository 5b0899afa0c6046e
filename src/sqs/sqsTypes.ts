import type { MessageAttributes } from "../sns/snsTypes.ts";

export interface SqsMessage {
  messageId: string;
  body: string;
  messageAttributes: MessageAttributes;
  sentTimestamp: number;
  messageGroupId?: string;
  messageDeduplicationId?: string;
  sequenceNumber?: string;
}

/** What a topic hands to a queue for one delivery. */
export interface EnqueueRequest {
  queueName: string;
  region: string;
  accountId: string;
  body: string;
  messageAttributes?: MessageAttributes;
  messageGroupId?: string;
  messageDeduplicationId?: string;
}

export interface QueueInspection {
  name: string;
  arn: string;
  attributes: Record<string, string>;
  messages: SqsMessage[];
}

export const DEFAULT_QUEUE_ATTRIBUTES: Record<string, string> = {
  MaximumMessageSize: "262144",
  MessageRetentionPeriod: "345600",
};
