import { parseArn } from "../common/arnHelper.ts";
import { DEFAULT_REGION } from "../common/types.ts";
import type { MessageAttributes, SnsSubscription, SubscriptionProtocol } from "./snsTypes.ts";

/** A message accepted by a topic, ready to be fanned out. */
export interface Notification {
  messageId: string;
  topicArn: string;
  message: string;
  subject?: string;
  messageAttributes: MessageAttributes;
  /** Per-protocol bodies of a `MessageStructure=json` publish. */
  protocolMessages?: Record<string, string>;
  messageGroupId?: string;
  messageDeduplicationId?: string;
  sequenceNumber?: string;
  timestamp: number;
}

export interface EnvelopeAttribute {
  Type: string;
  Value: string;
}

export interface NotificationEnvelope {
  Type: "Notification";
  MessageId: string;
  TopicArn: string;
  Subject?: string;
  Message: string;
  Timestamp: string;
  SignatureVersion: string;
  Signature: string;
  SigningCertURL: string;
  UnsubscribeURL: string;
  MessageAttributes?: Record<string, EnvelopeAttribute>;
  SequenceNumber?: string;
}

export function messageForProtocol(notification: Notification, protocol: SubscriptionProtocol): string {
  const messages = notification.protocolMessages;
  if (!messages) return notification.message;
  return messages[protocol] ?? messages.default ?? notification.message;
}

export function formatEnvelopeAttributes(
  attributes: MessageAttributes,
): Record<string, EnvelopeAttribute> {
  const result: Record<string, EnvelopeAttribute> = {};
  for (const [name, attr] of Object.entries(attributes)) {
    result[name] = {
      Type: attr.DataType,
      Value: attr.DataType.startsWith("Binary") ? (attr.BinaryValue ?? "") : (attr.StringValue ?? ""),
    };
  }
  return result;
}

/**
 * The JSON notification a non-raw subscriber receives. `Subject` and
 * `MessageAttributes` only appear when the publish carried them.
 */
export function buildEnvelope(
  notification: Notification,
  subscription: SnsSubscription,
): NotificationEnvelope {
  const region = parseArn(notification.topicArn)?.region ?? DEFAULT_REGION;
  const envelope: NotificationEnvelope = {
    Type: "Notification",
    MessageId: notification.messageId,
    TopicArn: notification.topicArn,
    Message: messageForProtocol(notification, subscription.protocol),
    Timestamp: new Date(notification.timestamp).toISOString(),
    SignatureVersion: "1",
    Signature: "EXAMPLE",
    SigningCertURL: `https://sns.${region}.amazonaws.com/SimpleNotificationService-0000000000000000000000.pem`,
    UnsubscribeURL: `https://sns.${region}.amazonaws.com/?Action=Unsubscribe&SubscriptionArn=${subscription.arn}`,
  };
  if (notification.subject !== undefined) {
    envelope.Subject = notification.subject;
  }
  if (Object.keys(notification.messageAttributes).length > 0) {
    envelope.MessageAttributes = formatEnvelopeAttributes(notification.messageAttributes);
  }
  if (notification.sequenceNumber !== undefined) {
    envelope.SequenceNumber = notification.sequenceNumber;
  }
  return envelope;
}

/** The event a function subscriber is invoked with. */
export function buildFunctionEvent(notification: Notification, subscription: SnsSubscription): string {
  const envelope = buildEnvelope(notification, subscription);
  return JSON.stringify({
    Records: [
      {
        EventVersion: "1.0",
        EventSubscriptionArn: subscription.arn,
        EventSource: "aws:sns",
        Sns: {
          ...envelope,
          Subject: envelope.Subject ?? null,
          MessageAttributes: envelope.MessageAttributes ?? {},
        },
      },
    ],
  });
}
