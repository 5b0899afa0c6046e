import { Bench } from "tinybench";
import { matchesFilterPolicy } from "../src/sns/filter.ts";
import { parseFilterPolicy } from "../src/sns/filterPolicy.ts";
import type { MessageAttributes } from "../src/sns/snsTypes.ts";

const policyJson = JSON.stringify({
  eventType: ["OrderCreated", "OrderUpdated", { prefix: "Order" }],
  price: [{ numeric: [">=", 10, "<", 500] }],
  region: [{ "anything-but": ["eu-north-1", "ap-south-1"] }],
  tags: ["priority"],
  trace: [{ exists: false }],
});

const matching: MessageAttributes = {
  eventType: { DataType: "String", StringValue: "OrderUpdated" },
  price: { DataType: "Number", StringValue: "99.5" },
  region: { DataType: "String", StringValue: "us-east-1" },
  tags: { DataType: "String.Array", StringValue: '["bulk","priority"]' },
};

const rejected: MessageAttributes = {
  ...matching,
  price: { DataType: "Number", StringValue: "1000" },
};

async function run() {
  const policy = parseFilterPolicy(policyJson);
  const bench = new Bench({ warmupIterations: 1000 });

  bench.add("parse + compile policy", () => {
    parseFilterPolicy(policyJson);
  });
  bench.add("match (all fields pass)", () => {
    matchesFilterPolicy(policy, matching);
  });
  bench.add("match (numeric range fails)", () => {
    matchesFilterPolicy(policy, rejected);
  });

  await bench.run();
  console.log("\n--- Filter policy compile and match ---");
  console.table(bench.table());
}

await run();
