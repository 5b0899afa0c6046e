import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { lambdaFunctionArn, snsTopicArn, sqsQueueArn } from "./common/arnHelper.ts";
import { DEFAULT_ACCOUNT_ID, DEFAULT_REGION } from "./common/types.ts";
import type { FanoutOptions } from "./config.ts";
import { resolveConfig } from "./config.ts";
import type { FanoutInitConfig } from "./initConfig.ts";
import { applyInitConfig, loadInitConfig } from "./initConfig.ts";
import type { FunctionHandler, FunctionInvocation } from "./lambda/lambdaTypes.ts";
import { LambdaStore } from "./lambda/lambdaStore.ts";
import {
  createPlatformApplication,
  deletePlatformApplication,
  getPlatformApplicationAttributes,
  listPlatformApplications,
  setPlatformApplicationAttributes,
} from "./sns/actions/platformApplications.ts";
import {
  createPlatformEndpoint,
  deleteEndpoint,
  getEndpointAttributes,
  listEndpointsByPlatformApplication,
  setEndpointAttributes,
} from "./sns/actions/platformEndpoints.ts";
import { createTopic } from "./sns/actions/createTopic.ts";
import { deleteTopic } from "./sns/actions/deleteTopic.ts";
import { getSubscriptionAttributes } from "./sns/actions/getSubscriptionAttributes.ts";
import { getTopicAttributes } from "./sns/actions/getTopicAttributes.ts";
import { listSubscriptions, listSubscriptionsByTopic } from "./sns/actions/listSubscriptions.ts";
import { listTopics } from "./sns/actions/listTopics.ts";
import { addPermission, removePermission } from "./sns/actions/permissions.ts";
import { publish, publishBatch } from "./sns/actions/publish.ts";
import { setSubscriptionAttributes } from "./sns/actions/setSubscriptionAttributes.ts";
import { setTopicAttributes } from "./sns/actions/setTopicAttributes.ts";
import {
  checkIfPhoneNumberIsOptedOut,
  getSmsAttributes,
  listPhoneNumbersOptedOut,
  optInPhoneNumber,
  setSmsAttributes,
} from "./sns/actions/smsSettings.ts";
import { subscribe } from "./sns/actions/subscribe.ts";
import { listTagsForResource, tagResource, untagResource } from "./sns/actions/tagResource.ts";
import { unsubscribe } from "./sns/actions/unsubscribe.ts";
import { SnsBackends } from "./sns/snsBackends.ts";
import { SnsRouter } from "./sns/snsRouter.ts";
import type { SentMessage, SmsMessage, SubscriptionProtocol } from "./sns/snsTypes.ts";
import type { MessageSpyReader } from "./spy.ts";
import { MessageSpy } from "./spy.ts";
import { SqsStore } from "./sqs/sqsStore.ts";
import type { QueueInspection } from "./sqs/sqsTypes.ts";

export type { FanoutOptions } from "./config.ts";
export type { FanoutInitConfig } from "./initConfig.ts";
export type { MessageSpyReader, SpyMessage } from "./spy.ts";

/** Everything the HTTP surface and the programmatic API operate on. */
export interface FanoutStores {
  sns: SnsBackends;
  sqs: SqsStore;
  lambda: LambdaStore;
  spy: MessageSpy;
}

export interface BuildAppOptions {
  logger?: boolean;
  defaultRegion?: string;
  deliveryTimeoutMs?: number;
  deliveryConcurrency?: number;
}

export function buildApp(options?: BuildAppOptions): { app: FastifyInstance; stores: FanoutStores } {
  const app = Fastify({
    logger: options?.logger ?? true,
    bodyLimit: 2 * 1_048_576, // 2 MiB, so oversize messages reach the size check
    forceCloseConnections: true,
  });

  const spy = new MessageSpy();
  const sqs = new SqsStore();
  sqs.spy = spy;
  const lambda = new LambdaStore();
  const sns = new SnsBackends({
    logger: app.log,
    queues: sqs,
    functions: lambda,
    deliveryTimeoutMs: options?.deliveryTimeoutMs,
    deliveryConcurrency: options?.deliveryConcurrency,
    spy,
  });

  const snsRouter = new SnsRouter(sns, options?.defaultRegion ?? DEFAULT_REGION);
  snsRouter.register("CreateTopic", createTopic);
  snsRouter.register("DeleteTopic", deleteTopic);
  snsRouter.register("ListTopics", listTopics);
  snsRouter.register("GetTopicAttributes", getTopicAttributes);
  snsRouter.register("SetTopicAttributes", setTopicAttributes);
  snsRouter.register("Subscribe", subscribe);
  snsRouter.register("Unsubscribe", unsubscribe);
  snsRouter.register("ListSubscriptions", listSubscriptions);
  snsRouter.register("ListSubscriptionsByTopic", listSubscriptionsByTopic);
  snsRouter.register("GetSubscriptionAttributes", getSubscriptionAttributes);
  snsRouter.register("SetSubscriptionAttributes", setSubscriptionAttributes);
  snsRouter.register("Publish", publish);
  snsRouter.register("PublishBatch", publishBatch);
  snsRouter.register("TagResource", tagResource);
  snsRouter.register("UntagResource", untagResource);
  snsRouter.register("ListTagsForResource", listTagsForResource);
  snsRouter.register("AddPermission", addPermission);
  snsRouter.register("RemovePermission", removePermission);
  snsRouter.register("CreatePlatformApplication", createPlatformApplication);
  snsRouter.register("GetPlatformApplicationAttributes", getPlatformApplicationAttributes);
  snsRouter.register("SetPlatformApplicationAttributes", setPlatformApplicationAttributes);
  snsRouter.register("ListPlatformApplications", listPlatformApplications);
  snsRouter.register("DeletePlatformApplication", deletePlatformApplication);
  snsRouter.register("CreatePlatformEndpoint", createPlatformEndpoint);
  snsRouter.register("GetEndpointAttributes", getEndpointAttributes);
  snsRouter.register("SetEndpointAttributes", setEndpointAttributes);
  snsRouter.register("ListEndpointsByPlatformApplication", listEndpointsByPlatformApplication);
  snsRouter.register("DeleteEndpoint", deleteEndpoint);
  snsRouter.register("SetSMSAttributes", setSmsAttributes);
  snsRouter.register("GetSMSAttributes", getSmsAttributes);
  snsRouter.register("CheckIfPhoneNumberIsOptedOut", checkIfPhoneNumberIsOptedOut);
  snsRouter.register("ListPhoneNumbersOptedOut", listPhoneNumbersOptedOut);
  snsRouter.register("OptInPhoneNumber", optInPhoneNumber);

  // Query protocol
  app.addContentTypeParser(
    "application/x-www-form-urlencoded",
    { parseAs: "string" },
    (_req, body, done) => {
      const result: Record<string, string> = {};
      for (const [key, value] of new URLSearchParams(body.toString())) {
        result[key] = value;
      }
      done(null, result);
    },
  );

  app.get("/health", async () => {
    return { status: "ok" };
  });

  app.post("/", async (request, reply) => {
    const contentType = request.headers["content-type"] ?? "";

    if (contentType.includes("application/x-www-form-urlencoded")) {
      return snsRouter.handle(request, reply);
    }

    reply.status(400);
    return { error: "Unsupported content type" };
  });

  return { app, stores: { sns, sqs, lambda, spy } };
}

export interface SubscribeOptions {
  /** Topic name. */
  topic: string;
  /** Queue name in the same region; shorthand for an sqs subscription. */
  queue?: string;
  protocol?: SubscriptionProtocol;
  endpoint?: string;
  region?: string;
  attributes?: Record<string, string>;
}

export interface FanoutServer {
  readonly port: number;
  readonly address: string;
  readonly spy: MessageSpyReader;
  /** Returns the topic ARN. */
  createTopic(
    name: string,
    options?: { region?: string; attributes?: Record<string, string>; tags?: Record<string, string> },
  ): string;
  /** Returns the queue ARN. */
  createQueue(name: string, options?: { region?: string; attributes?: Record<string, string> }): string;
  /** Returns the function ARN. */
  registerFunction(name: string, options?: { region?: string; handler?: FunctionHandler }): string;
  /** Returns the subscription ARN. */
  subscribe(options: SubscribeOptions): string;
  inspectQueue(name: string, region?: string): QueueInspection | undefined;
  getTopicMessages(topicName: string, region?: string): SentMessage[];
  getEndpointMessages(endpointArn: string): SentMessage[];
  getSmsMessages(region?: string): SmsMessage[];
  getFunctionInvocations(name: string, region?: string): FunctionInvocation[];
  setup(config: FanoutInitConfig): void;
  purgeAll(): void;
  stop(): Promise<void>;
}

export async function startFanout(options?: FanoutOptions): Promise<FanoutServer> {
  const config = resolveConfig(options);
  const { app, stores } = buildApp({
    logger: config.logger,
    defaultRegion: config.defaultRegion,
    deliveryTimeoutMs: config.deliveryTimeoutMs,
    deliveryConcurrency: config.deliveryConcurrency,
  });

  const defaultRegion = config.defaultRegion;
  const backend = (region?: string) => stores.sns.get(DEFAULT_ACCOUNT_ID, region ?? defaultRegion);

  if (config.init) {
    const initConfig = typeof config.init === "string" ? loadInitConfig(config.init) : config.init;
    applyInitConfig(initConfig, stores, { region: defaultRegion });
  }

  const listenAddress = await app.listen({ port: config.port, host: config.host });
  const url = new URL(listenAddress);

  return {
    get port() {
      return parseInt(url.port);
    },
    get address() {
      return listenAddress;
    },
    get spy() {
      return stores.spy;
    },
    createTopic(name, topicOptions) {
      return backend(topicOptions?.region).createTopic(name, topicOptions?.attributes, topicOptions?.tags).arn;
    },
    createQueue(name, queueOptions) {
      return stores.sqs.createQueue(name, {
        region: queueOptions?.region ?? defaultRegion,
        attributes: queueOptions?.attributes,
      }).arn;
    },
    registerFunction(name, functionOptions) {
      return stores.lambda.registerFunction(name, {
        region: functionOptions?.region ?? defaultRegion,
        handler: functionOptions?.handler,
      }).arn;
    },
    subscribe(subscribeOptions) {
      const region = subscribeOptions.region ?? defaultRegion;
      const topicArn = snsTopicArn(subscribeOptions.topic, region);
      if (subscribeOptions.queue !== undefined) {
        return backend(region).subscribe(
          topicArn,
          "sqs",
          sqsQueueArn(subscribeOptions.queue, region),
          subscribeOptions.attributes,
        ).arn;
      }
      if (subscribeOptions.protocol === undefined || subscribeOptions.endpoint === undefined) {
        throw new Error("subscribe needs either a queue or a protocol and an endpoint");
      }
      const endpoint =
        subscribeOptions.protocol === "lambda" && !subscribeOptions.endpoint.startsWith("arn:")
          ? lambdaFunctionArn(subscribeOptions.endpoint, region)
          : subscribeOptions.endpoint;
      return backend(region).subscribe(
        topicArn,
        subscribeOptions.protocol,
        endpoint,
        subscribeOptions.attributes,
      ).arn;
    },
    inspectQueue(name, region) {
      return stores.sqs.inspectQueue(name, region ?? defaultRegion);
    },
    getTopicMessages(topicName, region) {
      const resolvedRegion = region ?? defaultRegion;
      return backend(resolvedRegion).getTopicMessages(snsTopicArn(topicName, resolvedRegion));
    },
    getEndpointMessages(endpointArn) {
      for (const candidate of stores.sns.all()) {
        const endpoint = candidate.findEndpoint(endpointArn);
        if (endpoint) return [...endpoint.messages];
      }
      return [];
    },
    getSmsMessages(region) {
      return backend(region).getSmsMessages();
    },
    getFunctionInvocations(name, region) {
      return [...(stores.lambda.getFunction(name, region ?? defaultRegion)?.invocations ?? [])];
    },
    setup(initConfig) {
      applyInitConfig(initConfig, stores, { region: defaultRegion });
    },
    purgeAll() {
      stores.sns.purgeAll();
      stores.sqs.purgeAll();
      stores.lambda.purgeAll();
      stores.spy.clear();
    },
    stop() {
      return app.close();
    },
  };
}
