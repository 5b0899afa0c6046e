import type { CompiledFilterPolicy } from "./filterPolicy.ts";
import type { Mutex } from "../common/concurrency.ts";
import type { DeliveryOutcome } from "./dispatcher.ts";

export interface MessageAttributeValue {
  DataType: string;
  StringValue?: string;
  BinaryValue?: string;
}

export type MessageAttributes = Record<string, MessageAttributeValue>;

export interface PolicyStatement {
  Sid: string;
  Effect: string;
  Principal: unknown;
  Action: string | string[];
  Resource: string;
  Condition?: unknown;
}

export interface PolicyDocument {
  Version: string;
  Id: string;
  Statement: PolicyStatement[];
}

export interface TopicAttributes {
  displayName: string;
  deliveryPolicy: string;
  kmsMasterKeyId: string;
  signatureVersion: string;
  tracingConfig: string;
  fifoTopic: boolean;
  contentBasedDeduplication: boolean;
}

export interface SentMessage {
  messageId: string;
  message: string;
  subject?: string;
  messageAttributes: MessageAttributes;
  messageGroupId?: string;
  messageDeduplicationId?: string;
  sequenceNumber?: string;
  timestamp: number;
}

export interface SnsTopic {
  arn: string;
  name: string;
  attributes: TopicAttributes;
  policy: PolicyDocument;
  tags: Map<string, string>;
  subscriptionArns: string[];
  sentMessages: SentMessage[];
  deduplicationCache: Map<string, { messageId: string; sequenceNumber?: string; timestamp: number }>;
  sequenceCounter: number;
  /** Serializes fan-out of FIFO topics so deliveries keep publish order. */
  deliveryLock: Mutex;
}

export const SUBSCRIPTION_PROTOCOLS = ["sqs", "http", "https", "lambda", "sms"] as const;

export type SubscriptionProtocol = (typeof SUBSCRIPTION_PROTOCOLS)[number];

export interface SnsSubscription {
  arn: string;
  topicArn: string;
  protocol: SubscriptionProtocol;
  endpoint: string;
  attributes: Record<string, string>;
  filterPolicy?: CompiledFilterPolicy;
}

export interface PlatformApplication {
  arn: string;
  name: string;
  platform: string;
  attributes: Record<string, string>;
}

export interface PlatformEndpoint {
  arn: string;
  applicationArn: string;
  token: string;
  customUserData?: string;
  attributes: Record<string, string>;
  messages: SentMessage[];
}

export interface SmsMessage {
  messageId: string;
  phoneNumber: string;
  message: string;
  timestamp: number;
}

export interface PublishInput {
  topicArn?: string;
  targetArn?: string;
  phoneNumber?: string;
  message: string;
  subject?: string;
  messageStructure?: string;
  messageAttributes?: MessageAttributes;
  messageGroupId?: string;
  messageDeduplicationId?: string;
}

export interface PublishResult {
  messageId: string;
  sequenceNumber?: string;
  /** One outcome per subscription whose filter matched. */
  deliveries: DeliveryOutcome[];
}

export interface PublishBatchEntry {
  id: string;
  message: string;
  subject?: string;
  messageStructure?: string;
  messageAttributes?: MessageAttributes;
  messageGroupId?: string;
  messageDeduplicationId?: string;
}

export interface PublishBatchSuccess {
  id: string;
  messageId: string;
  sequenceNumber?: string;
}

export interface PublishBatchFailure {
  id: string;
  code: string;
  message: string;
  senderFault: boolean;
}

export interface PublishBatchResult {
  successful: PublishBatchSuccess[];
  failed: PublishBatchFailure[];
}
