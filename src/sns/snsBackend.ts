import { createHash, randomUUID } from "node:crypto";
import {
  platformApplicationArn,
  platformEndpointArn,
  snsSubscriptionArn,
  snsTopicArn,
} from "../common/arnHelper.ts";
import { Mutex } from "../common/concurrency.ts";
import {
  InvalidParameterError,
  NotFoundError,
  ResourceLimitExceededError,
  SnsError,
} from "../common/errors.ts";
import type { Page } from "../common/pagination.ts";
import { paginate } from "../common/pagination.ts";
import { SMS_MAX_MESSAGE_SIZE_BYTES, SNS_MAX_MESSAGE_SIZE_BYTES, isE164 } from "../common/types.ts";
import type { MessageSpy } from "../spy.ts";
import type { DeliveryDispatcher } from "./dispatcher.ts";
import type { Notification } from "./envelope.ts";
import {
  contentBasedDeduplicationId,
  normalizeSmsEndpoint,
  parseMessageStructure,
  validateMessageAttributes,
  validateMessageSize,
  validateSubject,
} from "./publishValidation.ts";
import type {
  MessageAttributes,
  PlatformApplication,
  PlatformEndpoint,
  PublishBatchEntry,
  PublishBatchResult,
  PublishInput,
  PublishResult,
  SentMessage,
  SmsMessage,
  SnsSubscription,
  SnsTopic,
  SubscriptionProtocol,
} from "./snsTypes.ts";
import { SUBSCRIPTION_PROTOCOLS } from "./snsTypes.ts";
import {
  applySubscriptionAttribute,
  prepareSubscriptionAttribute,
} from "./subscriptionAttributes.ts";
import {
  DEFAULT_EFFECTIVE_DELIVERY_POLICY,
  defaultTopicAttributes,
  describeTopicAttributes,
  setTopicAttribute,
} from "./topicAttributes.ts";
import { defaultTopicPolicy, withPermission, withoutPermission } from "./topicPolicy.ts";

const DEDUP_WINDOW_MS = 5 * 60 * 1000; // 5 minutes
const MAX_TAGS = 50;
const MAX_BATCH_ENTRIES = 10;
const TOPIC_NAME_PATTERN = /^[A-Za-z0-9_-]{1,256}$/;
const FIFO_TOPIC_NAME_PATTERN = /^[A-Za-z0-9_-]{1,256}\.fifo$/;
const BATCH_ENTRY_ID_PATTERN = /^[A-Za-z0-9_-]{1,80}$/;

// Every new backend starts with these numbers opted out of SMS
const SEEDED_OPT_OUT_NUMBERS = [
  "+447700900100",
  "+447700900101",
  "+447700900245",
  "+447700900318",
  "+447700900472",
  "+447700900550",
  "+447700900613",
  "+447700900907",
];

export interface SnsBackendOptions {
  accountId: string;
  region: string;
  dispatcher: DeliveryDispatcher;
  spy?: MessageSpy;
}

/** Publish payload after validation, shared by the topic, endpoint and phone paths. */
interface ValidatedMessage {
  message: string;
  subject?: string;
  messageAttributes: MessageAttributes;
  protocolMessages?: Record<string, string>;
  messageGroupId?: string;
  messageDeduplicationId?: string;
}

/**
 * All topics, subscriptions and platform resources of one account in one region.
 *
 * Every method that mutates state validates first and then mutates without
 * yielding, so each call is atomic with respect to the others. Only fan-out
 * awaits.
 */
export class SnsBackend {
  readonly accountId: string;
  readonly region: string;

  private readonly topics = new Map<string, SnsTopic>();
  private readonly subscriptions = new Map<string, SnsSubscription>();
  private readonly applications = new Map<string, PlatformApplication>();
  private readonly endpoints = new Map<string, PlatformEndpoint>();
  private readonly smsMessages = new Map<string, SmsMessage>();
  private readonly smsAttributes = new Map<string, string>();
  private readonly optOutNumbers = new Set<string>(SEEDED_OPT_OUT_NUMBERS);
  private readonly dispatcher: DeliveryDispatcher;
  private readonly spy?: MessageSpy;

  constructor(options: SnsBackendOptions) {
    this.accountId = options.accountId;
    this.region = options.region;
    this.dispatcher = options.dispatcher;
    this.spy = options.spy;
  }

  // Topics

  createTopic(
    name: string,
    attributes: Record<string, string> = {},
    tags: Record<string, string> = {},
  ): SnsTopic {
    const fifo = (attributes.FifoTopic ?? "").toLowerCase() === "true";
    const pattern = fifo ? FIFO_TOPIC_NAME_PATTERN : TOPIC_NAME_PATTERN;
    if (!pattern.test(name)) {
      throw new InvalidParameterError(
        fifo
          ? "Invalid parameter: Topic Name Reason: FIFO topic names must be made up of only uppercase and lowercase ASCII letters, numbers, underscores, and hyphens, must end with .fifo and must be between 1 and 256 characters long."
          : "Invalid parameter: Topic Name Reason: Topic names must be made up of only uppercase and lowercase ASCII letters, numbers, underscores, and hyphens, and must be between 1 and 256 characters long.",
      );
    }

    const arn = snsTopicArn(name, this.region, this.accountId);
    const candidate = this.newTopic(arn, name);
    for (const [key, value] of Object.entries(attributes)) {
      setTopicAttribute(candidate, key, value);
    }

    const existing = this.topics.get(arn);
    if (existing) return existing;

    const tagEntries = Object.entries(tags);
    if (tagEntries.length > MAX_TAGS) {
      throw new ResourceLimitExceededError(
        "TagLimitExceeded",
        "Could not complete request: tag quota of per resource exceeded",
      );
    }
    candidate.tags = new Map(tagEntries);

    this.topics.set(arn, candidate);
    return candidate;
  }

  getTopic(arn: string): SnsTopic {
    const topic = this.topics.get(arn);
    if (!topic) {
      throw new NotFoundError("Topic does not exist");
    }
    return topic;
  }

  deleteTopic(arn: string): void {
    const topic = this.getTopic(arn);
    for (const subscriptionArn of topic.subscriptionArns) {
      this.subscriptions.delete(subscriptionArn);
    }
    this.topics.delete(arn);
  }

  listTopics(nextToken?: string): Page<SnsTopic> {
    return paginate(this.topics.values(), nextToken);
  }

  getTopicAttributes(arn: string): Record<string, string> {
    const topic = this.getTopic(arn);
    return describeTopicAttributes(topic, this.accountId, topic.subscriptionArns.length);
  }

  setTopicAttribute(arn: string, name: string, value: string): void {
    setTopicAttribute(this.getTopic(arn), name, value);
  }

  tagResource(arn: string, tags: Record<string, string>): void {
    const topic = this.getTaggableTopic(arn);
    const merged = new Map(topic.tags);
    for (const [key, value] of Object.entries(tags)) {
      merged.set(key, value);
    }
    if (merged.size > MAX_TAGS) {
      throw new ResourceLimitExceededError(
        "TagLimitExceeded",
        "Could not complete request: tag quota of per resource exceeded",
      );
    }
    topic.tags = merged;
  }

  untagResource(arn: string, tagKeys: string[]): void {
    const topic = this.getTaggableTopic(arn);
    for (const key of tagKeys) {
      topic.tags.delete(key);
    }
  }

  listTagsForResource(arn: string): Map<string, string> {
    return new Map(this.getTaggableTopic(arn).tags);
  }

  addPermission(arn: string, label: string, accountIds: string[], actionNames: string[]): void {
    const topic = this.getTopic(arn);
    topic.policy = withPermission(topic.policy, topic.arn, label, accountIds, actionNames);
  }

  removePermission(arn: string, label: string): void {
    const topic = this.getTopic(arn);
    topic.policy = withoutPermission(topic.policy, label);
  }

  getTopicMessages(arn: string): SentMessage[] {
    return [...this.getTopic(arn).sentMessages];
  }

  // Subscriptions

  subscribe(
    topicArn: string,
    protocol: string,
    endpoint: string,
    attributes: Record<string, string> = {},
  ): SnsSubscription {
    if (!isSubscriptionProtocol(protocol)) {
      throw new InvalidParameterError(
        `Invalid parameter: Amazon SNS does not support this protocol string: ${protocol}`,
      );
    }
    validateEndpoint(protocol, endpoint);
    const topic = this.getTopic(topicArn);
    const prepared = Object.entries(attributes).map(([name, value]) =>
      prepareSubscriptionAttribute(name, value),
    );

    for (const subscriptionArn of topic.subscriptionArns) {
      const existing = this.subscriptions.get(subscriptionArn);
      if (existing && existing.protocol === protocol && existing.endpoint === endpoint) {
        return existing;
      }
    }

    const arn = snsSubscriptionArn(topicArn, randomUUID());
    const subscription: SnsSubscription = {
      arn,
      topicArn,
      protocol,
      endpoint,
      attributes: {
        PendingConfirmation: "false",
        ConfirmationWasAuthenticated: "true",
        Endpoint: endpoint,
        TopicArn: topicArn,
        Protocol: protocol,
        SubscriptionArn: arn,
        Owner: this.accountId,
        RawMessageDelivery: "false",
      },
    };
    if (protocol === "http" || protocol === "https") {
      subscription.attributes.EffectiveDeliveryPolicy = DEFAULT_EFFECTIVE_DELIVERY_POLICY;
    }
    for (const attribute of prepared) {
      applySubscriptionAttribute(subscription, attribute);
    }

    this.subscriptions.set(arn, subscription);
    topic.subscriptionArns.push(arn);
    return subscription;
  }

  unsubscribe(arn: string): void {
    const subscription = this.subscriptions.get(arn);
    if (!subscription) return;
    this.subscriptions.delete(arn);

    const topic = this.topics.get(subscription.topicArn);
    if (topic) {
      topic.subscriptionArns = topic.subscriptionArns.filter((a) => a !== arn);
    }
  }

  getSubscription(arn: string): SnsSubscription {
    const subscription = this.subscriptions.get(arn);
    if (!subscription) {
      throw new NotFoundError("Subscription does not exist");
    }
    return subscription;
  }

  listSubscriptions(nextToken?: string): Page<SnsSubscription> {
    return paginate(this.subscriptions.values(), nextToken);
  }

  listSubscriptionsByTopic(topicArn: string, nextToken?: string): Page<SnsSubscription> {
    const topic = this.getTopic(topicArn);
    return paginate(this.resolveSubscriptions(topic), nextToken);
  }

  getSubscriptionAttributes(arn: string): Record<string, string> {
    return { ...this.getSubscription(arn).attributes };
  }

  setSubscriptionAttribute(arn: string, name: string, value: string): void {
    const subscription = this.getSubscription(arn);
    applySubscriptionAttribute(subscription, prepareSubscriptionAttribute(name, value));
  }

  // Platform applications and endpoints

  createPlatformApplication(
    name: string,
    platform: string,
    attributes: Record<string, string> = {},
  ): PlatformApplication {
    const arn = platformApplicationArn(platform, name, this.region, this.accountId);
    const existing = this.applications.get(arn);
    if (existing) return existing;

    const application: PlatformApplication = { arn, name, platform, attributes: { ...attributes } };
    this.applications.set(arn, application);
    return application;
  }

  getPlatformApplication(arn: string): PlatformApplication {
    const application = this.applications.get(arn);
    if (!application) {
      throw new NotFoundError("PlatformApplication does not exist");
    }
    return application;
  }

  setPlatformApplicationAttributes(arn: string, attributes: Record<string, string>): void {
    const application = this.getPlatformApplication(arn);
    application.attributes = { ...application.attributes, ...attributes };
  }

  listPlatformApplications(nextToken?: string): Page<PlatformApplication> {
    return paginate(this.applications.values(), nextToken);
  }

  deletePlatformApplication(arn: string): void {
    for (const [endpointArn, endpoint] of this.endpoints) {
      if (endpoint.applicationArn === arn) {
        this.endpoints.delete(endpointArn);
      }
    }
    this.applications.delete(arn);
  }

  /**
   * Endpoint ids are derived from the application and the token, so registering
   * the same device twice resolves to the same endpoint.
   */
  createPlatformEndpoint(
    applicationArn: string,
    token: string,
    customUserData?: string,
    attributes: Record<string, string> = {},
  ): PlatformEndpoint {
    const application = this.getPlatformApplication(applicationArn);
    const enabled = (attributes.Enabled ?? "true").toLowerCase();
    const arn = platformEndpointArn(
      application.platform,
      application.name,
      endpointId(applicationArn, token),
      this.region,
      this.accountId,
    );

    const existing = this.endpoints.get(arn);
    if (existing) {
      if (existing.attributes.Enabled === enabled) return existing;
      throw new InvalidParameterError(
        `Invalid parameter: Token Reason: Duplicate endpoint token with different attributes: ${token}`,
      );
    }

    const endpoint: PlatformEndpoint = {
      arn,
      applicationArn,
      token,
      customUserData,
      attributes: { ...attributes, Token: attributes.Token ?? token, Enabled: enabled },
      messages: [],
    };
    if (customUserData !== undefined) {
      endpoint.attributes.CustomUserData = customUserData;
    }
    this.endpoints.set(arn, endpoint);
    return endpoint;
  }

  getEndpoint(arn: string): PlatformEndpoint {
    const endpoint = this.endpoints.get(arn);
    if (!endpoint) {
      throw new NotFoundError("Endpoint does not exist");
    }
    return endpoint;
  }

  findEndpoint(arn: string): PlatformEndpoint | undefined {
    return this.endpoints.get(arn);
  }

  setEndpointAttributes(arn: string, attributes: Record<string, string>): void {
    const endpoint = this.getEndpoint(arn);
    const next = { ...endpoint.attributes, ...attributes };
    if (attributes.Enabled !== undefined) {
      next.Enabled = attributes.Enabled.toLowerCase();
    }
    endpoint.attributes = next;
  }

  listEndpointsByPlatformApplication(
    applicationArn: string,
    nextToken?: string,
  ): Page<PlatformEndpoint> {
    this.getPlatformApplication(applicationArn);
    const endpoints = Array.from(this.endpoints.values()).filter(
      (endpoint) => endpoint.applicationArn === applicationArn,
    );
    return paginate(endpoints, nextToken);
  }

  deleteEndpoint(arn: string): void {
    if (!this.endpoints.delete(arn)) {
      throw new NotFoundError("Endpoint does not exist");
    }
  }

  // Publishing

  /**
   * Validates, records and fans out one message. Every rejection happens before
   * anything is recorded; delivery failures are reported in `deliveries`.
   */
  async publish(input: PublishInput): Promise<PublishResult> {
    const targets = [input.topicArn, input.targetArn, input.phoneNumber].filter(
      (target): target is string => target !== undefined && target !== "",
    );
    if (targets.length === 0) {
      throw new InvalidParameterError(
        "Invalid parameter: TopicArn or TargetArn Reason: no value for required parameter",
      );
    }
    if (targets.length > 1) {
      throw new InvalidParameterError(
        "Invalid parameter: Only one of TopicArn, TargetArn or PhoneNumber may be specified",
      );
    }
    if (input.message === "") {
      throw new InvalidParameterError("Invalid parameter: Empty message");
    }

    validateSubject(input.subject);

    if (input.phoneNumber) {
      validateMessageSize(input.message, SMS_MAX_MESSAGE_SIZE_BYTES);
      return this.publishSms(input.phoneNumber, input.message);
    }

    validateMessageSize(input.message, SNS_MAX_MESSAGE_SIZE_BYTES);
    const messageAttributes = input.messageAttributes ?? {};
    validateMessageAttributes(messageAttributes);
    const validated: ValidatedMessage = {
      message: input.message,
      subject: input.subject,
      messageAttributes,
      protocolMessages: parseMessageStructure(input.messageStructure, input.message),
      messageGroupId: input.messageGroupId,
      messageDeduplicationId: input.messageDeduplicationId,
    };

    const targetArn = targets[0];
    const topic = this.topics.get(targetArn);
    if (topic) {
      return this.publishToTopic(topic, validated);
    }
    const endpoint = this.endpoints.get(targetArn);
    if (endpoint) {
      return this.publishToEndpoint(endpoint, validated);
    }
    throw new NotFoundError(
      targetArn.includes(":endpoint/") ? "Endpoint does not exist" : "Topic does not exist",
    );
  }

  /**
   * Entries are published one after another, so they keep their order in the
   * topic's log. A rejected entry is reported and the rest still go out.
   */
  async publishBatch(topicArn: string, entries: PublishBatchEntry[]): Promise<PublishBatchResult> {
    const topic = this.getTopic(topicArn);

    if (entries.length === 0) {
      throw new InvalidParameterError(
        "The batch request doesn't contain any entries.",
        "EmptyBatchRequest",
      );
    }
    if (entries.length > MAX_BATCH_ENTRIES) {
      throw new InvalidParameterError(
        "The batch request contains more entries than permissible.",
        "TooManyEntriesInBatchRequest",
      );
    }
    const ids = new Set(entries.map((entry) => entry.id));
    if (ids.size !== entries.length) {
      throw new InvalidParameterError(
        "Two or more batch entries in the request have the same Id.",
        "BatchEntryIdsNotDistinct",
      );
    }
    if (entries.some((entry) => !BATCH_ENTRY_ID_PATTERN.test(entry.id))) {
      throw new InvalidParameterError(
        "The Id of a batch entry in a batch request doesn't abide by the specification.",
        "InvalidBatchEntryId",
      );
    }
    if (topic.attributes.fifoTopic && entries.some((entry) => !entry.messageGroupId)) {
      throw new InvalidParameterError(
        "Invalid parameter: The MessageGroupId parameter is required for FIFO topics",
      );
    }

    const result: PublishBatchResult = { successful: [], failed: [] };
    for (const entry of entries) {
      try {
        const published = await this.publish({
          topicArn,
          message: entry.message,
          subject: entry.subject,
          messageStructure: entry.messageStructure,
          messageAttributes: entry.messageAttributes,
          messageGroupId: entry.messageGroupId,
          messageDeduplicationId: entry.messageDeduplicationId,
        });
        result.successful.push({
          id: entry.id,
          messageId: published.messageId,
          sequenceNumber: published.sequenceNumber,
        });
      } catch (err) {
        if (!(err instanceof SnsError)) throw err;
        result.failed.push({
          id: entry.id,
          code: err.code,
          message: err.message,
          senderFault: err.senderFault,
        });
      }
    }
    return result;
  }

  recordSms(phoneNumber: string, message: string): string {
    const messageId = randomUUID();
    this.smsMessages.set(messageId, { messageId, phoneNumber, message, timestamp: Date.now() });
    return messageId;
  }

  getSmsMessages(): SmsMessage[] {
    return Array.from(this.smsMessages.values());
  }

  // SMS settings

  /** Merges into the account's SMS attributes; names not given keep their values. */
  setSmsAttributes(attributes: Record<string, string>): void {
    for (const [name, value] of Object.entries(attributes)) {
      this.smsAttributes.set(name, value);
    }
  }

  /** All attributes, or only the named ones that are set. */
  getSmsAttributes(names: string[] = []): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of this.smsAttributes) {
      if (names.length === 0 || names.includes(name)) {
        result[name] = value;
      }
    }
    return result;
  }

  checkIfPhoneNumberIsOptedOut(phoneNumber: string): boolean {
    requireE164(phoneNumber);
    return this.optOutNumbers.has(phoneNumber);
  }

  listPhoneNumbersOptedOut(nextToken?: string): Page<string> {
    return paginate(this.optOutNumbers, nextToken);
  }

  /** Removes the number from the opt-out list. Opting in a number that never opted out is a no-op. */
  optInPhoneNumber(phoneNumber: string): void {
    requireE164(phoneNumber);
    this.optOutNumbers.delete(phoneNumber);
  }

  purge(): void {
    this.topics.clear();
    this.subscriptions.clear();
    this.applications.clear();
    this.endpoints.clear();
    this.smsMessages.clear();
    this.smsAttributes.clear();
    this.optOutNumbers.clear();
    for (const phoneNumber of SEEDED_OPT_OUT_NUMBERS) {
      this.optOutNumbers.add(phoneNumber);
    }
  }

  private async publishToTopic(topic: SnsTopic, input: ValidatedMessage): Promise<PublishResult> {
    const fifo = topic.attributes.fifoTopic;
    let dedupId = input.messageDeduplicationId;

    if (fifo) {
      if (!input.messageGroupId) {
        throw new InvalidParameterError(
          "The request must contain the parameter MessageGroupId.",
          "MissingParameter",
        );
      }
      if (!dedupId) {
        if (!topic.attributes.contentBasedDeduplication) {
          throw new InvalidParameterError(
            "Invalid parameter: The topic should either have ContentBasedDeduplication enabled or MessageDeduplicationId provided explicitly",
          );
        }
        dedupId = contentBasedDeduplicationId(input.message);
      }

      const duplicate = checkDeduplication(topic, dedupId);
      if (duplicate) {
        return { messageId: duplicate.messageId, sequenceNumber: duplicate.sequenceNumber, deliveries: [] };
      }
    } else if (input.messageGroupId || dedupId) {
      const param = input.messageGroupId ? "MessageGroupId" : "MessageDeduplicationId";
      throw new InvalidParameterError(
        `Invalid parameter: ${param} Reason: The request includes ${param} parameter that is not valid for this topic type`,
      );
    }

    const messageId = randomUUID();
    const timestamp = Date.now();
    const sequenceNumber = fifo ? nextSequenceNumber(topic) : undefined;
    topic.sentMessages.push({
      messageId,
      message: input.message,
      subject: input.subject,
      messageAttributes: input.messageAttributes,
      messageGroupId: input.messageGroupId,
      messageDeduplicationId: dedupId,
      sequenceNumber,
      timestamp,
    });
    if (fifo && dedupId) {
      topic.deduplicationCache.set(dedupId, { messageId, sequenceNumber, timestamp });
    }
    this.spy?.addMessage({
      service: "sns",
      targetArn: topic.arn,
      topicName: topic.name,
      messageId,
      body: input.message,
      messageAttributes: input.messageAttributes,
      status: "published",
      timestamp,
    });

    const notification: Notification = {
      messageId,
      topicArn: topic.arn,
      message: input.message,
      subject: input.subject,
      messageAttributes: input.messageAttributes,
      protocolMessages: input.protocolMessages,
      messageGroupId: input.messageGroupId,
      messageDeduplicationId: dedupId,
      sequenceNumber,
      timestamp,
    };
    const subscriptions = this.resolveSubscriptions(topic);
    const fanOut = () => this.dispatcher.dispatch(notification, subscriptions);
    const deliveries = fifo ? await topic.deliveryLock.runExclusive(fanOut) : await fanOut();

    return { messageId, sequenceNumber, deliveries };
  }

  private publishToEndpoint(endpoint: PlatformEndpoint, input: ValidatedMessage): PublishResult {
    if (endpoint.attributes.Enabled === "false") {
      throw new SnsError("EndpointDisabled", "Endpoint is disabled");
    }

    const messageId = randomUUID();
    const timestamp = Date.now();
    endpoint.messages.push({
      messageId,
      message: input.protocolMessages?.default ?? input.message,
      subject: input.subject,
      messageAttributes: input.messageAttributes,
      timestamp,
    });
    this.spy?.addMessage({
      service: "sns",
      targetArn: endpoint.arn,
      messageId,
      body: input.message,
      messageAttributes: input.messageAttributes,
      status: "published",
      timestamp,
    });
    return { messageId, deliveries: [] };
  }

  private publishSms(phoneNumber: string, message: string): PublishResult {
    requireE164(phoneNumber);
    const messageId = this.recordSms(phoneNumber, message);
    this.spy?.addMessage({
      service: "sns",
      targetArn: phoneNumber,
      messageId,
      body: message,
      messageAttributes: {},
      status: "published",
      timestamp: Date.now(),
    });
    return { messageId, deliveries: [] };
  }

  private resolveSubscriptions(topic: SnsTopic): SnsSubscription[] {
    const resolved: SnsSubscription[] = [];
    for (const arn of topic.subscriptionArns) {
      const subscription = this.subscriptions.get(arn);
      if (subscription) resolved.push(subscription);
    }
    return resolved;
  }

  private getTaggableTopic(arn: string): SnsTopic {
    const topic = this.topics.get(arn);
    if (!topic) {
      throw new NotFoundError("Resource does not exist", "ResourceNotFound");
    }
    return topic;
  }

  private newTopic(arn: string, name: string): SnsTopic {
    return {
      arn,
      name,
      attributes: defaultTopicAttributes(),
      policy: defaultTopicPolicy(arn, this.accountId),
      tags: new Map(),
      subscriptionArns: [],
      sentMessages: [],
      deduplicationCache: new Map(),
      sequenceCounter: 0,
      deliveryLock: new Mutex(),
    };
  }
}

function isSubscriptionProtocol(protocol: string): protocol is SubscriptionProtocol {
  return SUBSCRIPTION_PROTOCOLS.some((known) => known === protocol);
}

function validateEndpoint(protocol: SubscriptionProtocol, endpoint: string): void {
  switch (protocol) {
    case "sms": {
      const phoneNumber = normalizeSmsEndpoint(endpoint);
      if (phoneNumber === undefined || !isE164(phoneNumber)) {
        throw new InvalidParameterError(`Invalid SMS endpoint: ${endpoint}`);
      }
      return;
    }
    case "http":
    case "https":
      if (!endpoint.startsWith(`${protocol}://`)) {
        throw new InvalidParameterError(
          "Invalid parameter: Endpoint Reason: Endpoint must match the specified protocol",
        );
      }
      return;
    case "sqs":
      if (!endpoint.startsWith("arn:aws:sqs:")) {
        throw new InvalidParameterError("Invalid parameter: SQS endpoint ARN");
      }
      return;
    case "lambda":
      if (endpoint === "") {
        throw new InvalidParameterError("Invalid parameter: Endpoint Reason: empty endpoint");
      }
      return;
  }
}

function requireE164(phoneNumber: string): void {
  if (!isE164(phoneNumber)) {
    throw new InvalidParameterError(
      `Invalid parameter: PhoneNumber Reason: ${phoneNumber} does not meet the E164 format`,
    );
  }
}

function checkDeduplication(
  topic: SnsTopic,
  dedupId: string,
): { messageId: string; sequenceNumber?: string } | undefined {
  const now = Date.now();
  for (const [key, entry] of topic.deduplicationCache) {
    if (now - entry.timestamp > DEDUP_WINDOW_MS) {
      topic.deduplicationCache.delete(key);
    }
  }
  return topic.deduplicationCache.get(dedupId);
}

function nextSequenceNumber(topic: SnsTopic): string {
  topic.sequenceCounter++;
  return String(topic.sequenceCounter).padStart(20, "0");
}

/** UUID-shaped, derived from the application and the device token. */
function endpointId(applicationArn: string, token: string): string {
  const hash = createHash("sha256").update(`${applicationArn}${token}`).digest("hex");
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-${hash.slice(12, 16)}-${hash.slice(16, 20)}-${hash.slice(20, 32)}`;
}
