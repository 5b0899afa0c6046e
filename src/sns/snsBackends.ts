import type { FastifyBaseLogger } from "fastify";
import { DEFAULT_ACCOUNT_ID, DEFAULT_REGION } from "../common/types.ts";
import type { MessageSpy } from "../spy.ts";
import { DEFAULT_DELIVERY_TIMEOUT_MS, DeliveryDispatcher } from "./dispatcher.ts";
import { SnsBackend } from "./snsBackend.ts";
import type { FunctionInvoker } from "./transports/lambdaTransport.ts";
import { LambdaTransport } from "./transports/lambdaTransport.ts";
import { SmsTransport } from "./transports/smsTransport.ts";
import type { QueueEnqueuer } from "./transports/sqsTransport.ts";
import { SqsTransport } from "./transports/sqsTransport.ts";
import { WebhookTransport } from "./transports/webhookTransport.ts";

export interface SnsBackendsOptions {
  logger: FastifyBaseLogger;
  queues: QueueEnqueuer;
  functions: FunctionInvoker;
  deliveryTimeoutMs?: number;
  deliveryConcurrency?: number;
  spy?: MessageSpy;
}

/**
 * Owns one {@link SnsBackend} per account and region. Backends are created on
 * first use and share a single dispatcher.
 */
export class SnsBackends {
  private readonly backends = new Map<string, SnsBackend>();
  private readonly dispatcher: DeliveryDispatcher;
  private readonly spy?: MessageSpy;

  constructor(options: SnsBackendsOptions) {
    this.spy = options.spy;
    const webhook = new WebhookTransport({
      timeoutMs: options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS,
    });
    this.dispatcher = new DeliveryDispatcher({
      transports: {
        sqs: new SqsTransport(options.queues),
        http: webhook,
        https: webhook,
        lambda: new LambdaTransport(options.functions),
        sms: new SmsTransport((accountId, region) => this.get(accountId, region)),
      },
      logger: options.logger,
      timeoutMs: options.deliveryTimeoutMs,
      concurrency: options.deliveryConcurrency,
      spy: options.spy,
    });
  }

  get(accountId: string = DEFAULT_ACCOUNT_ID, region: string = DEFAULT_REGION): SnsBackend {
    const key = `${accountId}/${region}`;
    let backend = this.backends.get(key);
    if (!backend) {
      backend = new SnsBackend({ accountId, region, dispatcher: this.dispatcher, spy: this.spy });
      this.backends.set(key, backend);
    }
    return backend;
  }

  all(): SnsBackend[] {
    return Array.from(this.backends.values());
  }

  purgeAll(): void {
    for (const backend of this.backends.values()) {
      backend.purge();
    }
    this.backends.clear();
  }
}
