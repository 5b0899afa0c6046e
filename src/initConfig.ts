import { readFileSync } from "node:fs";
import * as v from "valibot";
import { lambdaFunctionArn, snsTopicArn, sqsQueueArn } from "./common/arnHelper.ts";
import { DEFAULT_ACCOUNT_ID } from "./common/types.ts";
import type { FanoutStores } from "./app.ts";
import { SUBSCRIPTION_PROTOCOLS } from "./sns/snsTypes.ts";

const StringRecordSchema = v.record(v.string(), v.string());

const QueueSchema = v.object({
  name: v.string(),
  region: v.optional(v.string()),
  attributes: v.optional(StringRecordSchema),
});

const FunctionSchema = v.object({
  name: v.string(),
  region: v.optional(v.string()),
});

const TopicSchema = v.object({
  name: v.string(),
  region: v.optional(v.string()),
  attributes: v.optional(StringRecordSchema),
  tags: v.optional(StringRecordSchema),
});

// Either `queue` (a queue name in the same region) or `protocol` + `endpoint`
const SubscriptionSchema = v.pipe(
  v.object({
    topic: v.string(),
    queue: v.optional(v.string()),
    protocol: v.optional(v.picklist(SUBSCRIPTION_PROTOCOLS)),
    endpoint: v.optional(v.string()),
    region: v.optional(v.string()),
    attributes: v.optional(StringRecordSchema),
  }),
  v.check(
    (s) => s.queue !== undefined || (s.protocol !== undefined && s.endpoint !== undefined),
    "A subscription needs either a queue or a protocol and an endpoint",
  ),
);

const PlatformApplicationSchema = v.object({
  name: v.string(),
  platform: v.string(),
  region: v.optional(v.string()),
  attributes: v.optional(StringRecordSchema),
});

const InitConfigSchema = v.object({
  region: v.optional(v.string()),
  queues: v.optional(v.array(QueueSchema)),
  functions: v.optional(v.array(FunctionSchema)),
  topics: v.optional(v.array(TopicSchema)),
  subscriptions: v.optional(v.array(SubscriptionSchema)),
  platformApplications: v.optional(v.array(PlatformApplicationSchema)),
});

export type FanoutInitConfig = v.InferOutput<typeof InitConfigSchema>;

export function validateInitConfig(data: unknown): FanoutInitConfig {
  return v.parse(InitConfigSchema, data);
}

export function loadInitConfig(path: string): FanoutInitConfig {
  const content = readFileSync(path, "utf-8");
  return validateInitConfig(JSON.parse(content));
}

/**
 * Creates the declared resources in dependency order. Safe to apply twice:
 * every create is idempotent.
 */
export function applyInitConfig(
  config: FanoutInitConfig,
  stores: FanoutStores,
  context: { region: string },
): void {
  // Top-level region overrides the server default; each resource may override both
  const defaultRegion = config.region ?? context.region;

  for (const q of config.queues ?? []) {
    stores.sqs.createQueue(q.name, { region: q.region ?? defaultRegion, attributes: q.attributes });
  }

  for (const f of config.functions ?? []) {
    stores.lambda.registerFunction(f.name, { region: f.region ?? defaultRegion });
  }

  for (const t of config.topics ?? []) {
    stores.sns.get(DEFAULT_ACCOUNT_ID, t.region ?? defaultRegion).createTopic(t.name, t.attributes, t.tags);
  }

  for (const s of config.subscriptions ?? []) {
    const region = s.region ?? defaultRegion;
    const topicArn = snsTopicArn(s.topic, region);
    const backend = stores.sns.get(DEFAULT_ACCOUNT_ID, region);
    if (s.queue !== undefined) {
      backend.subscribe(topicArn, "sqs", sqsQueueArn(s.queue, region), s.attributes);
    } else if (s.protocol !== undefined && s.endpoint !== undefined) {
      const endpoint =
        s.protocol === "lambda" && !s.endpoint.startsWith("arn:")
          ? lambdaFunctionArn(s.endpoint, region)
          : s.endpoint;
      backend.subscribe(topicArn, s.protocol, endpoint, s.attributes);
    }
  }

  for (const p of config.platformApplications ?? []) {
    stores.sns
      .get(DEFAULT_ACCOUNT_ID, p.region ?? defaultRegion)
      .createPlatformApplication(p.name, p.platform, p.attributes);
  }
}
