import { InvalidParameterError } from "../common/errors.ts";
import type { SnsTopic, TopicAttributes } from "./snsTypes.ts";
import { parsePolicyDocument } from "./topicPolicy.ts";

export const DEFAULT_EFFECTIVE_DELIVERY_POLICY = JSON.stringify({
  http: {
    defaultHealthyRetryPolicy: {
      minDelayTarget: 20,
      maxDelayTarget: 20,
      numRetries: 3,
      numMaxDelayRetries: 0,
      numNoDelayRetries: 0,
      numMinDelayRetries: 0,
      backoffFunction: "linear",
    },
    disableSubscriptionOverrides: false,
  },
});

export const SETTABLE_TOPIC_ATTRIBUTES = [
  "DisplayName",
  "Policy",
  "DeliveryPolicy",
  "KmsMasterKeyId",
  "FifoTopic",
  "ContentBasedDeduplication",
  "SignatureVersion",
  "TracingConfig",
] as const;

export type SettableTopicAttribute = (typeof SETTABLE_TOPIC_ATTRIBUTES)[number];

const SETTABLE_NAMES: ReadonlySet<string> = new Set(SETTABLE_TOPIC_ATTRIBUTES);

export function defaultTopicAttributes(): TopicAttributes {
  return {
    displayName: "",
    deliveryPolicy: "",
    kmsMasterKeyId: "",
    signatureVersion: "1",
    tracingConfig: "PassThrough",
    fifoTopic: false,
    contentBasedDeduplication: false,
  };
}

export function isSettableTopicAttribute(name: string): name is SettableTopicAttribute {
  return SETTABLE_NAMES.has(name);
}

/**
 * One setter per recognised attribute. Each validates its value before touching the topic.
 */
const TOPIC_ATTRIBUTE_SETTERS: Record<
  SettableTopicAttribute,
  (topic: SnsTopic, value: string) => void
> = {
  DisplayName: (topic, value) => {
    topic.attributes.displayName = value;
  },
  Policy: (topic, value) => {
    topic.policy = parsePolicyDocument(value);
  },
  DeliveryPolicy: (topic, value) => {
    if (value !== "") assertJson("DeliveryPolicy", value);
    topic.attributes.deliveryPolicy = value;
  },
  KmsMasterKeyId: (topic, value) => {
    topic.attributes.kmsMasterKeyId = value;
  },
  FifoTopic: (topic, value) => {
    topic.attributes.fifoTopic = parseBoolean("FifoTopic", value);
  },
  ContentBasedDeduplication: (topic, value) => {
    topic.attributes.contentBasedDeduplication = parseBoolean("ContentBasedDeduplication", value);
  },
  SignatureVersion: (topic, value) => {
    if (value !== "1" && value !== "2") {
      throw new InvalidParameterError(
        "Invalid parameter: SignatureVersion Reason: must be one of 1 or 2",
      );
    }
    topic.attributes.signatureVersion = value;
  },
  TracingConfig: (topic, value) => {
    if (value !== "PassThrough" && value !== "Active") {
      throw new InvalidParameterError(
        "Invalid parameter: TracingConfig Reason: must be one of PassThrough or Active",
      );
    }
    topic.attributes.tracingConfig = value;
  },
};

export function setTopicAttribute(topic: SnsTopic, name: string, value: string): void {
  if (!isSettableTopicAttribute(name)) {
    throw new InvalidParameterError(`Invalid parameter: AttributeName Reason: Invalid attribute name: ${name}`);
  }
  TOPIC_ATTRIBUTE_SETTERS[name](topic, value);
}

/** The attribute map reported by GetTopicAttributes. */
export function describeTopicAttributes(
  topic: SnsTopic,
  owner: string,
  subscriptionCount: number,
): Record<string, string> {
  const { attributes } = topic;
  const result: Record<string, string> = {
    TopicArn: topic.arn,
    Owner: owner,
    Policy: JSON.stringify(topic.policy),
    DisplayName: attributes.displayName,
    SubscriptionsConfirmed: String(subscriptionCount),
    SubscriptionsPending: "0",
    SubscriptionsDeleted: "0",
    EffectiveDeliveryPolicy: attributes.deliveryPolicy || DEFAULT_EFFECTIVE_DELIVERY_POLICY,
    SignatureVersion: attributes.signatureVersion,
    TracingConfig: attributes.tracingConfig,
  };
  if (attributes.deliveryPolicy) result.DeliveryPolicy = attributes.deliveryPolicy;
  if (attributes.kmsMasterKeyId) result.KmsMasterKeyId = attributes.kmsMasterKeyId;
  if (attributes.fifoTopic) {
    result.FifoTopic = "true";
    result.ContentBasedDeduplication = String(attributes.contentBasedDeduplication);
  }
  return result;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  throw new InvalidParameterError(
    `Invalid parameter: Attributes Reason: ${name} must be either true or false`,
  );
}

function assertJson(name: string, value: string): void {
  try {
    JSON.parse(value);
  } catch {
    throw new InvalidParameterError(`Invalid parameter: ${name} Reason: failed to parse JSON`);
  }
}
