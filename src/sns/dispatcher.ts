import type { FastifyBaseLogger } from "fastify";
import { mapWithConcurrency, withTimeout } from "../common/concurrency.ts";
import { DeliveryFailureError } from "../common/errors.ts";
import type { MessageSpy } from "../spy.ts";
import type { Notification } from "./envelope.ts";
import { matchesFilterPolicy } from "./filter.ts";
import type { SnsSubscription, SubscriptionProtocol } from "./snsTypes.ts";
import type { Transport } from "./transports/transport.ts";

export const DEFAULT_DELIVERY_TIMEOUT_MS = 5_000;
export const DEFAULT_DELIVERY_CONCURRENCY = 8;

export interface DeliveryOutcome {
  subscriptionArn: string;
  protocol: SubscriptionProtocol;
  status: "delivered" | "failed";
  error?: DeliveryFailureError;
}

export interface DeliveryDispatcherOptions {
  transports: Record<SubscriptionProtocol, Transport>;
  logger: FastifyBaseLogger;
  timeoutMs?: number;
  concurrency?: number;
  spy?: MessageSpy;
}

/**
 * Fans a notification out to the subscriptions whose filter policy matches.
 * Deliveries run on a bounded pool, each under its own deadline. A failing
 * subscriber is logged and reported in the outcomes, never thrown.
 */
export class DeliveryDispatcher {
  private readonly transports: Record<SubscriptionProtocol, Transport>;
  private readonly logger: FastifyBaseLogger;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly spy?: MessageSpy;

  constructor(options: DeliveryDispatcherOptions) {
    this.transports = options.transports;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
    this.concurrency = options.concurrency ?? DEFAULT_DELIVERY_CONCURRENCY;
    this.spy = options.spy;
  }

  async dispatch(
    notification: Notification,
    subscriptions: readonly SnsSubscription[],
  ): Promise<DeliveryOutcome[]> {
    const matching = subscriptions.filter((subscription) =>
      matchesFilterPolicy(subscription.filterPolicy, notification.messageAttributes),
    );
    if (matching.length === 0) return [];

    return mapWithConcurrency(matching, this.concurrency, (subscription) =>
      this.deliverOne(subscription, notification),
    );
  }

  private async deliverOne(
    subscription: SnsSubscription,
    notification: Notification,
  ): Promise<DeliveryOutcome> {
    const transport = this.transports[subscription.protocol];
    try {
      await withTimeout(
        transport.deliver({ subscription, notification }),
        this.timeoutMs,
        `Delivery to ${subscription.endpoint}`,
      );
    } catch (err) {
      const failure =
        err instanceof DeliveryFailureError
          ? err
          : new DeliveryFailureError(
              subscription.arn,
              err instanceof Error ? err.message : String(err),
              { cause: err },
            );
      this.logger.warn(
        {
          err: failure,
          subscriptionArn: subscription.arn,
          protocol: subscription.protocol,
          messageId: notification.messageId,
        },
        "Delivery failed",
      );
      this.record(subscription, notification, "failed", failure.message);
      return {
        subscriptionArn: subscription.arn,
        protocol: subscription.protocol,
        status: "failed",
        error: failure,
      };
    }

    this.logger.debug(
      { subscriptionArn: subscription.arn, messageId: notification.messageId },
      "Delivered",
    );
    this.record(subscription, notification, "delivered");
    return { subscriptionArn: subscription.arn, protocol: subscription.protocol, status: "delivered" };
  }

  private record(
    subscription: SnsSubscription,
    notification: Notification,
    status: "delivered" | "failed",
    error?: string,
  ): void {
    this.spy?.addMessage({
      service: "delivery",
      subscriptionArn: subscription.arn,
      protocol: subscription.protocol,
      endpoint: subscription.endpoint,
      messageId: notification.messageId,
      status,
      error,
      timestamp: Date.now(),
    });
  }
}
