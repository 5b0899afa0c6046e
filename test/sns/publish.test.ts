import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
  CreateTopicCommand,
  PublishBatchCommand,
  PublishCommand,
  SubscribeCommand,
} from "@aws-sdk/client-sns";
import { createSnsClient } from "../helpers/clients.ts";
import { createTestServer, type TestServer } from "../helpers/setup.ts";

describe("SNS Publish", () => {
  let server: TestServer;
  let sns: ReturnType<typeof createSnsClient>;

  beforeAll(async () => {
    server = await createTestServer();
    sns = createSnsClient(server.port);
  });

  afterAll(async () => {
    sns.destroy();
    await server.app.close();
  });

  async function topicWithQueue(
    name: string,
    options: { fifo?: boolean; subscriptionAttributes?: Record<string, string> } = {},
  ): Promise<string> {
    const queueName = options.fifo ? `${name}-queue.fifo` : `${name}-queue`;
    const queue = server.stores.sqs.createQueue(queueName, {
      attributes: options.fifo ? { FifoQueue: "true" } : undefined,
    });
    const topic = await sns.send(
      new CreateTopicCommand({
        Name: options.fifo ? `${name}.fifo` : name,
        Attributes: options.fifo ? { FifoTopic: "true", ContentBasedDeduplication: "true" } : undefined,
      }),
    );
    await sns.send(
      new SubscribeCommand({
        TopicArn: topic.TopicArn,
        Protocol: "sqs",
        Endpoint: queue.arn,
        Attributes: options.subscriptionAttributes,
      }),
    );
    return topic.TopicArn!;
  }

  function queueBodies(queueName: string): string[] {
    return (server.stores.sqs.inspectQueue(queueName)?.messages ?? []).map((m) => m.body);
  }

  it("delivers the notification envelope to a queue", async () => {
    const topicArn = await topicWithQueue("pub-envelope");

    const result = await sns.send(
      new PublishCommand({
        TopicArn: topicArn,
        Message: "hello",
        Subject: "s",
        MessageAttributes: { color: { DataType: "String", StringValue: "red" } },
      }),
    );
    expect(result.MessageId).toBeTruthy();

    const [body] = queueBodies("pub-envelope-queue");
    const envelope: unknown = JSON.parse(body);
    expect(envelope).toMatchObject({
      Type: "Notification",
      MessageId: result.MessageId,
      TopicArn: topicArn,
      Message: "hello",
      Subject: "s",
      MessageAttributes: { color: { Type: "String", Value: "red" } },
    });
  });

  it("delivers the bare message with raw delivery", async () => {
    await topicWithQueue("pub-raw", { subscriptionAttributes: { RawMessageDelivery: "true" } });
    const topicArn = "arn:aws:sns:us-east-1:000000000000:pub-raw";

    await sns.send(
      new PublishCommand({
        TopicArn: topicArn,
        Message: "raw body",
        MessageAttributes: { n: { DataType: "Number", StringValue: "7" } },
      }),
    );

    const [message] = server.stores.sqs.inspectQueue("pub-raw-queue")?.messages ?? [];
    expect(message.body).toBe("raw body");
    expect(message.messageAttributes).toEqual({ n: { DataType: "Number", StringValue: "7" } });
  });

  it("applies subscription filter policies", async () => {
    const topicArn = await topicWithQueue("pub-filter", {
      subscriptionAttributes: { FilterPolicy: '{"price":[{"numeric":[">",100]}]}', RawMessageDelivery: "true" },
    });

    for (const price of ["50", "150"]) {
      await sns.send(
        new PublishCommand({
          TopicArn: topicArn,
          Message: `price ${price}`,
          MessageAttributes: { price: { DataType: "Number", StringValue: price } },
        }),
      );
    }

    expect(queueBodies("pub-filter-queue")).toEqual(["price 150"]);
  });

  it("records messages on the topic even without subscribers", async () => {
    const { TopicArn } = await sns.send(new CreateTopicCommand({ Name: "pub-lonely" }));
    await sns.send(new PublishCommand({ TopicArn, Message: "anyone?" }));

    const [message] = server.stores.sns.get().getTopicMessages(TopicArn!);
    expect(message.message).toBe("anyone?");
  });

  it("returns sequence numbers for FIFO topics and drops duplicates", async () => {
    const topicArn = await topicWithQueue("pub-fifo", { fifo: true });

    const first = await sns.send(
      new PublishCommand({ TopicArn: topicArn, Message: "one", MessageGroupId: "g" }),
    );
    const duplicate = await sns.send(
      new PublishCommand({ TopicArn: topicArn, Message: "one", MessageGroupId: "g" }),
    );
    const second = await sns.send(
      new PublishCommand({ TopicArn: topicArn, Message: "two", MessageGroupId: "g" }),
    );

    expect(first.SequenceNumber).toBe("00000000000000000001");
    expect(duplicate.MessageId).toBe(first.MessageId);
    expect(second.SequenceNumber).toBe("00000000000000000002");

    const messages = server.stores.sqs.inspectQueue("pub-fifo-queue.fifo")?.messages ?? [];
    expect(messages.map((m) => m.messageGroupId)).toEqual(["g", "g"]);
  });

  it("requires a group id on FIFO topics", async () => {
    const topicArn = await topicWithQueue("pub-fifo-nogroup", { fifo: true });
    await expect(sns.send(new PublishCommand({ TopicArn: topicArn, Message: "x" }))).rejects.toThrow(
      "The request must contain the parameter MessageGroupId.",
    );
  });

  it("rejects publishing to a missing topic", async () => {
    await expect(
      sns.send(
        new PublishCommand({
          TopicArn: "arn:aws:sns:us-east-1:000000000000:pub-missing",
          Message: "x",
        }),
      ),
    ).rejects.toThrow("Topic does not exist");
  });

  it("sends per-protocol bodies with a json message structure", async () => {
    const topicArn = await topicWithQueue("pub-structure", {
      subscriptionAttributes: { RawMessageDelivery: "true" },
    });
    await sns.send(
      new PublishCommand({
        TopicArn: topicArn,
        MessageStructure: "json",
        Message: JSON.stringify({ default: "fallback", sqs: "for queues" }),
      }),
    );
    expect(queueBodies("pub-structure-queue")).toEqual(["for queues"]);
  });

  it("publishes batches and reports failed entries", async () => {
    const topicArn = await topicWithQueue("pub-batch", {
      subscriptionAttributes: { RawMessageDelivery: "true" },
    });

    const result = await sns.send(
      new PublishBatchCommand({
        TopicArn: topicArn,
        PublishBatchRequestEntries: [
          { Id: "1", Message: "first" },
          { Id: "2", Message: "x".repeat(262_145) },
          { Id: "3", Message: "third" },
        ],
      }),
    );

    expect(result.Successful?.map((s) => s.Id)).toEqual(["1", "3"]);
    expect(result.Failed).toEqual([
      {
        Id: "2",
        Code: "InvalidParameter",
        Message: "Invalid parameter: Message too long",
        SenderFault: true,
      },
    ]);
    expect(queueBodies("pub-batch-queue")).toEqual(["first", "third"]);
  });

  it("rejects batches with repeated ids", async () => {
    const topicArn = await topicWithQueue("pub-batch-dup");
    await expect(
      sns.send(
        new PublishBatchCommand({
          TopicArn: topicArn,
          PublishBatchRequestEntries: [
            { Id: "same", Message: "a" },
            { Id: "same", Message: "b" },
          ],
        }),
      ),
    ).rejects.toThrow("Two or more batch entries in the request have the same Id.");
  });

  it("invokes function subscribers", async () => {
    const fn = server.stores.lambda.registerFunction("pub-fn");
    const { TopicArn } = await sns.send(new CreateTopicCommand({ Name: "pub-lambda" }));
    await sns.send(new SubscribeCommand({ TopicArn, Protocol: "lambda", Endpoint: fn.arn }));

    await sns.send(new PublishCommand({ TopicArn, Message: "to a function" }));

    expect(fn.invocations).toHaveLength(1);
    const event: unknown = JSON.parse(fn.invocations[0].payload);
    expect(event).toMatchObject({
      Records: [{ EventSource: "aws:sns", Sns: { TopicArn, Message: "to a function" } }],
    });
  });

  it("does not fail the publish when a subscriber fails", async () => {
    const topicArn = await topicWithQueue("pub-isolated", {
      subscriptionAttributes: { RawMessageDelivery: "true" },
    });
    await sns.send(
      new SubscribeCommand({
        TopicArn: topicArn,
        Protocol: "lambda",
        Endpoint: "arn:aws:lambda:us-east-1:000000000000:function:pub-not-registered",
      }),
    );

    const result = await sns.send(new PublishCommand({ TopicArn: topicArn, Message: "still here" }));

    expect(result.MessageId).toBeTruthy();
    expect(queueBodies("pub-isolated-queue")).toEqual(["still here"]);
    expect(
      server.stores.spy.checkForMessage({ service: "delivery", protocol: "lambda", messageId: result.MessageId }),
    ).toMatchObject({
      status: "failed",
      error: "Function not found: arn:aws:lambda:us-east-1:000000000000:function:pub-not-registered",
    });
  });

  it("records SMS messages sent to a phone number", async () => {
    const result = await sns.send(new PublishCommand({ PhoneNumber: "+15550100200", Message: "code" }));
    expect(server.stores.sns.get().getSmsMessages()).toContainEqual(
      expect.objectContaining({ messageId: result.MessageId, phoneNumber: "+15550100200", message: "code" }),
    );
  });
});
