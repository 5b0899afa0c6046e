import { randomUUID } from "node:crypto";
import { sqsQueueArn } from "../common/arnHelper.ts";
import { QueueDoesNotExistError, SqsError } from "../common/errors.ts";
import { DEFAULT_ACCOUNT_ID, DEFAULT_REGION } from "../common/types.ts";
import { contentBasedDeduplicationId } from "../sns/publishValidation.ts";
import type { QueueEnqueuer } from "../sns/transports/sqsTransport.ts";
import type { MessageSpy } from "../spy.ts";
import type { EnqueueRequest, QueueInspection, SqsMessage } from "./sqsTypes.ts";
import { DEFAULT_QUEUE_ATTRIBUTES } from "./sqsTypes.ts";

const DEDUP_WINDOW_MS = 5 * 60 * 1000; // 5 minutes

export class SqsQueue {
  readonly name: string;
  readonly arn: string;
  attributes: Record<string, string>;
  messages: SqsMessage[] = [];
  spy?: MessageSpy;

  deduplicationCache: Map<
    string,
    { messageId: string; timestamp: number; sequenceNumber?: string }
  > = new Map();
  sequenceCounter = 0;

  constructor(name: string, arn: string, attributes?: Record<string, string>) {
    this.name = name;
    this.arn = arn;
    this.attributes = { ...DEFAULT_QUEUE_ATTRIBUTES, ...attributes };
  }

  isFifo(): boolean {
    return this.attributes.FifoQueue === "true";
  }

  enqueue(msg: SqsMessage): void {
    this.messages.push(msg);
    this.spy?.addMessage({
      service: "sqs",
      queueName: this.name,
      messageId: msg.messageId,
      body: msg.body,
      messageAttributes: msg.messageAttributes,
      status: "published",
      timestamp: msg.sentTimestamp,
    });
  }

  /** Removes and returns up to `maxMessages` messages, oldest first. */
  receive(maxMessages: number = 10): SqsMessage[] {
    return this.messages.splice(0, maxMessages);
  }

  checkDeduplication(dedupId: string): SqsMessage["messageId"] | undefined {
    const now = Date.now();
    for (const [key, entry] of this.deduplicationCache) {
      if (now - entry.timestamp > DEDUP_WINDOW_MS) {
        this.deduplicationCache.delete(key);
      }
    }
    return this.deduplicationCache.get(dedupId)?.messageId;
  }

  recordDeduplication(dedupId: string, messageId: string, sequenceNumber?: string): void {
    this.deduplicationCache.set(dedupId, { messageId, timestamp: Date.now(), sequenceNumber });
  }

  nextSequenceNumber(): string {
    this.sequenceCounter++;
    return String(this.sequenceCounter).padStart(20, "0");
  }
}

/**
 * In-memory queues that topics deliver into. Keyed by ARN so that several
 * accounts and regions can share one store.
 */
export class SqsStore implements QueueEnqueuer {
  private queuesByArn = new Map<string, SqsQueue>();
  spy?: MessageSpy;

  createQueue(
    name: string,
    options: { region?: string; accountId?: string; attributes?: Record<string, string> } = {},
  ): SqsQueue {
    const arn = sqsQueueArn(name, options.region ?? DEFAULT_REGION, options.accountId ?? DEFAULT_ACCOUNT_ID);
    const existing = this.queuesByArn.get(arn);
    if (existing) return existing;

    const attributes = { ...options.attributes };
    const fifo = attributes.FifoQueue === "true";
    if (fifo !== name.endsWith(".fifo")) {
      throw new SqsError(
        "InvalidParameterValue",
        "The name of a FIFO queue can only include alphanumeric characters, hyphens, or underscores, must end with .fifo suffix and be 1 to 80 in length.",
      );
    }

    const queue = new SqsQueue(name, arn, attributes);
    if (this.spy) {
      queue.spy = this.spy;
    }
    this.queuesByArn.set(arn, queue);
    return queue;
  }

  deleteQueue(arn: string): boolean {
    return this.queuesByArn.delete(arn);
  }

  getQueue(
    name: string,
    region: string = DEFAULT_REGION,
    accountId: string = DEFAULT_ACCOUNT_ID,
  ): SqsQueue | undefined {
    return this.queuesByArn.get(sqsQueueArn(name, region, accountId));
  }

  getQueueByArn(arn: string): SqsQueue | undefined {
    return this.queuesByArn.get(arn);
  }

  listQueues(): SqsQueue[] {
    return Array.from(this.queuesByArn.values());
  }

  /**
   * Accepts one delivery. FIFO queues require a group id and drop messages whose
   * deduplication id was seen within the last five minutes.
   */
  enqueue(request: EnqueueRequest): void {
    const queue = this.getQueue(request.queueName, request.region, request.accountId);
    if (!queue) {
      throw new QueueDoesNotExistError(request.queueName);
    }

    const message = SqsStore.createMessage(request.body, request.messageAttributes);

    if (!queue.isFifo()) {
      queue.enqueue(message);
      return;
    }

    if (!request.messageGroupId) {
      throw new SqsError("MissingParameter", "The request must contain the parameter MessageGroupId.");
    }
    const dedupId =
      request.messageDeduplicationId ??
      (queue.attributes.ContentBasedDeduplication === "true"
        ? contentBasedDeduplicationId(request.body)
        : undefined);
    if (!dedupId) {
      throw new SqsError(
        "InvalidParameterValue",
        "The queue should either have ContentBasedDeduplication enabled or MessageDeduplicationId provided explicitly",
      );
    }
    if (queue.checkDeduplication(dedupId) !== undefined) {
      return;
    }

    message.messageGroupId = request.messageGroupId;
    message.messageDeduplicationId = dedupId;
    message.sequenceNumber = queue.nextSequenceNumber();
    queue.recordDeduplication(dedupId, message.messageId, message.sequenceNumber);
    queue.enqueue(message);
  }

  inspectQueue(
    name: string,
    region: string = DEFAULT_REGION,
    accountId: string = DEFAULT_ACCOUNT_ID,
  ): QueueInspection | undefined {
    const queue = this.getQueue(name, region, accountId);
    if (!queue) return undefined;
    return {
      name: queue.name,
      arn: queue.arn,
      attributes: { ...queue.attributes },
      messages: [...queue.messages],
    };
  }

  purgeAll(): void {
    this.queuesByArn.clear();
  }

  static createMessage(body: string, messageAttributes: SqsMessage["messageAttributes"] = {}): SqsMessage {
    return {
      messageId: randomUUID(),
      body,
      messageAttributes,
      sentTimestamp: Date.now(),
    };
  }
}
