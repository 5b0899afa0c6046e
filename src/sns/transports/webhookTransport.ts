import { DeliveryFailureError } from "../../common/errors.ts";
import { buildEnvelope, messageForProtocol } from "../envelope.ts";
import { isRawDelivery } from "../subscriptionAttributes.ts";
import type { Delivery, Transport } from "./transport.ts";

/**
 * POSTs notifications to http and https subscribers. Anything but a 2xx answer
 * counts as a failed delivery.
 */
export class WebhookTransport implements Transport {
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs: number }) {
    this.timeoutMs = options.timeoutMs;
  }

  async deliver({ subscription, notification }: Delivery): Promise<void> {
    const raw = isRawDelivery(subscription);
    const headers: Record<string, string> = {
      "x-amz-sns-message-type": "Notification",
      "x-amz-sns-message-id": notification.messageId,
      "x-amz-sns-topic-arn": notification.topicArn,
      "x-amz-sns-subscription-arn": subscription.arn,
      "content-type": "text/plain; charset=UTF-8",
    };
    if (raw) {
      headers["x-amz-sns-rawdelivery"] = "true";
    }

    const body = raw
      ? messageForProtocol(notification, subscription.protocol)
      : JSON.stringify(buildEnvelope(notification, subscription));

    const response = await fetch(subscription.endpoint, {
      method: "POST",
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    // Drain so the connection can be reused
    await response.arrayBuffer();

    if (!response.ok) {
      throw new DeliveryFailureError(
        subscription.arn,
        `Endpoint ${subscription.endpoint} responded with status ${response.status}`,
      );
    }
  }
}
