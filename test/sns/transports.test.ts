import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { DeliveryFailureError } from "../../src/common/errors.ts";
import { LambdaStore } from "../../src/lambda/lambdaStore.ts";
import { SqsStore } from "../../src/sqs/sqsStore.ts";
import type { Notification } from "../../src/sns/envelope.ts";
import type { SnsSubscription, SubscriptionProtocol } from "../../src/sns/snsTypes.ts";
import { LambdaTransport, parseFunctionEndpoint } from "../../src/sns/transports/lambdaTransport.ts";
import { SmsTransport } from "../../src/sns/transports/smsTransport.ts";
import { SqsTransport } from "../../src/sns/transports/sqsTransport.ts";
import { WebhookTransport } from "../../src/sns/transports/webhookTransport.ts";
import { startWebhookReceiver, type WebhookReceiver } from "../helpers/setup.ts";

const TOPIC_ARN = "arn:aws:sns:us-east-1:000000000000:orders";

function subscription(
  protocol: SubscriptionProtocol,
  endpoint: string,
  attributes: Record<string, string> = {},
): SnsSubscription {
  return {
    arn: `${TOPIC_ARN}:sub-1`,
    topicArn: TOPIC_ARN,
    protocol,
    endpoint,
    attributes: { RawMessageDelivery: "false", ...attributes },
  };
}

const notification: Notification = {
  messageId: "msg-1",
  topicArn: TOPIC_ARN,
  message: "hello",
  subject: "greeting",
  messageAttributes: { color: { DataType: "String", StringValue: "red" } },
  timestamp: 0,
};

describe("SqsTransport", () => {
  it("enqueues the JSON envelope", async () => {
    const queues = new SqsStore();
    queues.createQueue("q");
    const transport = new SqsTransport(queues);

    await transport.deliver({
      subscription: subscription("sqs", "arn:aws:sqs:us-east-1:000000000000:q"),
      notification,
    });

    const [message] = queues.inspectQueue("q")?.messages ?? [];
    const body: unknown = JSON.parse(message.body);
    expect(body).toMatchObject({ Type: "Notification", Message: "hello", Subject: "greeting" });
    expect(message.messageAttributes).toEqual({});
  });

  it("enqueues the bare message and its attributes in raw mode", async () => {
    const queues = new SqsStore();
    queues.createQueue("q");
    const transport = new SqsTransport(queues);

    await transport.deliver({
      subscription: subscription("sqs", "arn:aws:sqs:us-east-1:000000000000:q", {
        RawMessageDelivery: "true",
      }),
      notification,
    });

    const [message] = queues.inspectQueue("q")?.messages ?? [];
    expect(message.body).toBe("hello");
    expect(message.messageAttributes).toEqual(notification.messageAttributes);
  });

  it("rejects endpoints that are not queue ARNs", async () => {
    const transport = new SqsTransport(new SqsStore());
    await expect(
      transport.deliver({ subscription: subscription("sqs", "arn:aws:sns:us-east-1:0:x"), notification }),
    ).rejects.toThrow(DeliveryFailureError);
  });
});

describe("LambdaTransport", () => {
  it("parses plain and qualified function ARNs", () => {
    expect(parseFunctionEndpoint("arn:aws:lambda:eu-west-1:111122223333:function:fn")).toEqual({
      region: "eu-west-1",
      accountId: "111122223333",
      functionName: "fn",
      qualifier: undefined,
    });
    expect(parseFunctionEndpoint("arn:aws:lambda:eu-west-1:111122223333:function:fn:live")?.qualifier).toBe(
      "live",
    );
    expect(parseFunctionEndpoint("fn")).toBeUndefined();
    expect(parseFunctionEndpoint("arn:aws:lambda:eu-west-1:111122223333:layer:fn")).toBeUndefined();
  });

  it("invokes the function with an event record", async () => {
    const functions = new LambdaStore();
    const fn = functions.registerFunction("fn");
    const transport = new LambdaTransport(functions);

    await transport.deliver({
      subscription: subscription("lambda", "arn:aws:lambda:us-east-1:000000000000:function:fn"),
      notification,
    });

    expect(fn.invocations).toHaveLength(1);
    expect(fn.invocations[0].subject).toBe("greeting");
    const event: unknown = JSON.parse(fn.invocations[0].payload);
    expect(event).toMatchObject({
      Records: [{ EventSource: "aws:sns", Sns: { Message: "hello", Subject: "greeting" } }],
    });
  });

  it("fails for a function name that is not an ARN", async () => {
    const transport = new LambdaTransport(new LambdaStore());
    await expect(
      transport.deliver({ subscription: subscription("lambda", "fn"), notification }),
    ).rejects.toThrow("Invalid function endpoint: fn");
  });
});

describe("SmsTransport", () => {
  it("records into the log of the subscription's owner", async () => {
    const recorded: Array<[string, string, string, string]> = [];
    const transport = new SmsTransport((accountId, region) => ({
      recordSms(phoneNumber, message) {
        recorded.push([accountId, region, phoneNumber, message]);
        return "sms-1";
      },
    }));

    await transport.deliver({ subscription: subscription("sms", "+1-555-0100"), notification });

    expect(recorded).toEqual([["000000000000", "us-east-1", "+15550100", "hello"]]);
  });
});

describe("WebhookTransport", () => {
  let receiver: WebhookReceiver;

  beforeEach(async () => {
    receiver = await startWebhookReceiver();
  });

  afterEach(async () => {
    await receiver.close();
  });

  it("posts the envelope with notification headers", async () => {
    const transport = new WebhookTransport({ timeoutMs: 1_000 });
    await transport.deliver({ subscription: subscription("http", receiver.url), notification });

    expect(receiver.received).toHaveLength(1);
    const [request] = receiver.received;
    expect(request.headers["x-amz-sns-message-type"]).toBe("Notification");
    expect(request.headers["x-amz-sns-message-id"]).toBe("msg-1");
    expect(request.headers["x-amz-sns-topic-arn"]).toBe(TOPIC_ARN);
    expect(request.headers["x-amz-sns-rawdelivery"]).toBeUndefined();
    const body: unknown = JSON.parse(request.body);
    expect(body).toMatchObject({ Message: "hello", Subject: "greeting" });
  });

  it("posts the bare message in raw mode", async () => {
    const transport = new WebhookTransport({ timeoutMs: 1_000 });
    await transport.deliver({
      subscription: subscription("http", receiver.url, { RawMessageDelivery: "true" }),
      notification,
    });

    expect(receiver.received[0].body).toBe("hello");
    expect(receiver.received[0].headers["x-amz-sns-rawdelivery"]).toBe("true");
  });

  it("fails on a non-2xx answer", async () => {
    receiver.respondWith = 503;
    const transport = new WebhookTransport({ timeoutMs: 1_000 });
    await expect(
      transport.deliver({ subscription: subscription("http", receiver.url), notification }),
    ).rejects.toThrow(`Endpoint ${receiver.url} responded with status 503`);
  });
});
