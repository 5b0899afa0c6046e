import { parseArn } from "../../common/arnHelper.ts";
import { DeliveryFailureError } from "../../common/errors.ts";
import type { EnqueueRequest } from "../../sqs/sqsTypes.ts";
import { buildEnvelope, messageForProtocol } from "../envelope.ts";
import { isRawDelivery } from "../subscriptionAttributes.ts";
import type { Delivery, Transport } from "./transport.ts";

export interface QueueEnqueuer {
  enqueue(request: EnqueueRequest): void;
}

export class SqsTransport implements Transport {
  private readonly queues: QueueEnqueuer;

  constructor(queues: QueueEnqueuer) {
    this.queues = queues;
  }

  async deliver({ subscription, notification }: Delivery): Promise<void> {
    const target = parseArn(subscription.endpoint);
    if (!target || target.service !== "sqs") {
      throw new DeliveryFailureError(subscription.arn, `Invalid queue endpoint: ${subscription.endpoint}`);
    }

    const raw = isRawDelivery(subscription);
    this.queues.enqueue({
      queueName: target.resource,
      region: target.region,
      accountId: target.accountId,
      body: raw
        ? messageForProtocol(notification, "sqs")
        : JSON.stringify(buildEnvelope(notification, subscription)),
      messageAttributes: raw ? notification.messageAttributes : undefined,
      messageGroupId: notification.messageGroupId,
      messageDeduplicationId: notification.messageDeduplicationId,
    });
  }
}
