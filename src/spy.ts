import type { MessageAttributes, SubscriptionProtocol } from "./sns/snsTypes.ts";

/** A message accepted by a topic, a platform endpoint or a phone number. */
export interface PublishSpyMessage {
  service: "sns";
  /** Topic ARN, endpoint ARN or phone number the message was published to. */
  targetArn: string;
  topicName?: string;
  messageId: string;
  body: string;
  messageAttributes: MessageAttributes;
  status: "published";
  timestamp: number;
}

/** Outcome of handing one published message to one subscriber. */
export interface DeliverySpyEvent {
  service: "delivery";
  subscriptionArn: string;
  protocol: SubscriptionProtocol;
  endpoint: string;
  messageId: string;
  status: "delivered" | "failed";
  error?: string;
  timestamp: number;
}

/** A message landing in an in-memory queue. */
export interface QueueSpyMessage {
  service: "sqs";
  queueName: string;
  messageId: string;
  body: string;
  messageAttributes: MessageAttributes;
  status: "published";
  timestamp: number;
}

export type SpyMessage = PublishSpyMessage | DeliverySpyEvent | QueueSpyMessage;

/**
 * Either a predicate or a partial object whose fields are deep-compared against each message.
 */
export type MessageSpyFilter = ((msg: SpyMessage) => boolean) | Record<string, unknown>;

export interface MessageSpyParams {
  /** Oldest entries are evicted past this size. Defaults to 100. */
  bufferSize?: number;
}

const DEFAULT_BUFFER_SIZE = 100;

interface PendingWaiter {
  matcher: (msg: SpyMessage) => boolean;
  resolve: (msg: SpyMessage) => void;
  reject: (err: Error) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function objectMatches(matcher: Record<string, unknown>, target: Record<string, unknown>): boolean {
  for (const key of Object.keys(matcher)) {
    const matchVal = matcher[key];
    const targetVal = target[key];

    if (isRecord(matchVal) && isRecord(targetVal)) {
      if (!objectMatches(matchVal, targetVal)) return false;
    } else if (matchVal !== targetVal) {
      return false;
    }
  }
  return true;
}

function buildMatcher(filter: MessageSpyFilter, status?: string): (msg: SpyMessage) => boolean {
  const filterFn =
    typeof filter === "function"
      ? filter
      : (msg: SpyMessage) => objectMatches(filter, { ...msg });

  if (!status) return filterFn;

  return (msg: SpyMessage) => msg.status === status && filterFn(msg);
}

/**
 * Read-only view of the spy handed to callers of the programmatic API.
 */
export interface MessageSpyReader {
  /**
   * Resolves with the first buffered match, or with the next matching message to arrive.
   */
  waitForMessage(filter: MessageSpyFilter, status?: string): Promise<SpyMessage>;

  waitForMessageWithId(messageId: string, status?: string): Promise<SpyMessage>;

  checkForMessage(filter: MessageSpyFilter, status?: string): SpyMessage | undefined;

  /** Oldest first. */
  getAllMessages(): SpyMessage[];

  /** Empties the buffer and rejects all pending waiters. */
  clear(): void;
}

/**
 * Ring buffer of publish, delivery and queue events. Stores and the dispatcher
 * record into it; tests wait on it.
 */
export class MessageSpy implements MessageSpyReader {
  private buffer: SpyMessage[] = [];
  private readonly bufferSize: number;
  private pendingWaiters: PendingWaiter[] = [];

  constructor(params?: MessageSpyParams) {
    this.bufferSize = params?.bufferSize ?? DEFAULT_BUFFER_SIZE;
  }

  addMessage(message: SpyMessage): void {
    this.buffer.push(message);
    while (this.buffer.length > this.bufferSize) {
      this.buffer.shift();
    }

    const stillPending: PendingWaiter[] = [];
    for (const waiter of this.pendingWaiters) {
      if (waiter.matcher(message)) {
        waiter.resolve(message);
      } else {
        stillPending.push(waiter);
      }
    }
    this.pendingWaiters = stillPending;
  }

  waitForMessage(filter: MessageSpyFilter, status?: string): Promise<SpyMessage> {
    const matcher = buildMatcher(filter, status);

    const existing = this.buffer.find(matcher);
    if (existing) return Promise.resolve(existing);

    return new Promise<SpyMessage>((resolve, reject) => {
      this.pendingWaiters.push({ matcher, resolve, reject });
    });
  }

  waitForMessageWithId(messageId: string, status?: string): Promise<SpyMessage> {
    return this.waitForMessage((msg) => msg.messageId === messageId, status);
  }

  checkForMessage(filter: MessageSpyFilter, status?: string): SpyMessage | undefined {
    return this.buffer.find(buildMatcher(filter, status));
  }

  getAllMessages(): SpyMessage[] {
    return [...this.buffer];
  }

  clear(): void {
    this.buffer = [];
    const waiters = this.pendingWaiters;
    this.pendingWaiters = [];
    for (const waiter of waiters) {
      waiter.reject(new Error("MessageSpy cleared"));
    }
  }
}
