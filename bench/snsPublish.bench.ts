import { pino } from "pino";
import { Bench } from "tinybench";
import { LambdaStore } from "../src/lambda/lambdaStore.ts";
import { SnsBackends } from "../src/sns/snsBackends.ts";
import { SqsStore } from "../src/sqs/sqsStore.ts";

const messageBody = JSON.stringify({
  orderId: "abc-123",
  customer: { id: "cust-1", tier: "gold" },
  items: [{ sku: "sku-1", qty: 2 }],
});

function setup(subscriptionCount: number, options: { rawDelivery: boolean; filtered: boolean }) {
  const queues = new SqsStore();
  const backends = new SnsBackends({
    logger: pino({ enabled: false }),
    queues,
    functions: new LambdaStore(),
  });
  const backend = backends.get();
  const topic = backend.createTopic("bench-topic");

  for (let i = 0; i < subscriptionCount; i++) {
    const queue = queues.createQueue(`bench-queue-${i}`);
    const attributes: Record<string, string> = {
      RawMessageDelivery: String(options.rawDelivery),
    };
    if (options.filtered) {
      attributes.FilterPolicy = JSON.stringify({ tier: [i % 2 === 0 ? "gold" : "silver"] });
    }
    backend.subscribe(topic.arn, "sqs", queue.arn, attributes);
  }

  return { backend, queues, topicArn: topic.arn };
}

async function run() {
  const subscriptionCount = 20;

  for (const options of [
    { rawDelivery: false, filtered: false },
    { rawDelivery: true, filtered: false },
    { rawDelivery: false, filtered: true },
  ]) {
    const { backend, queues, topicArn } = setup(subscriptionCount, options);
    const bench = new Bench({ warmupIterations: 200 });
    const label = `publish to ${subscriptionCount} queues (raw=${options.rawDelivery}, filtered=${options.filtered})`;

    bench.add(label, async () => {
      await backend.publish({
        topicArn,
        message: messageBody,
        messageAttributes: { tier: { DataType: "String", StringValue: "gold" } },
      });
    });

    await bench.run();
    console.log(`\n--- ${label} ---`);
    console.table(bench.table());

    // Queues are never drained; keep memory flat between runs
    for (const queue of queues.listQueues()) {
      queue.receive(Number.MAX_SAFE_INTEGER);
    }
  }
}

await run();
