import { DEFAULT_ACCOUNT_ID, DEFAULT_REGION } from "./types.ts";

export function snsTopicArn(
  topicName: string,
  region: string = DEFAULT_REGION,
  accountId: string = DEFAULT_ACCOUNT_ID,
): string {
  return `arn:aws:sns:${region}:${accountId}:${topicName}`;
}

export function snsSubscriptionArn(topicArn: string, id: string): string {
  return `${topicArn}:${id}`;
}

export function platformApplicationArn(
  platform: string,
  name: string,
  region: string,
  accountId: string,
): string {
  return `arn:aws:sns:${region}:${accountId}:app/${platform}/${name}`;
}

export function platformEndpointArn(
  platform: string,
  applicationName: string,
  id: string,
  region: string,
  accountId: string,
): string {
  return `arn:aws:sns:${region}:${accountId}:endpoint/${platform}/${applicationName}/${id}`;
}

export function sqsQueueArn(
  queueName: string,
  region: string = DEFAULT_REGION,
  accountId: string = DEFAULT_ACCOUNT_ID,
): string {
  return `arn:aws:sqs:${region}:${accountId}:${queueName}`;
}

export function lambdaFunctionArn(
  functionName: string,
  region: string = DEFAULT_REGION,
  accountId: string = DEFAULT_ACCOUNT_ID,
): string {
  return `arn:aws:lambda:${region}:${accountId}:function:${functionName}`;
}

export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  accountId: string;
  resource: string;
}

export function parseArn(arn: string): ParsedArn | undefined {
  const parts = arn.split(":");
  if (parts.length < 6 || parts[0] !== "arn") return undefined;
  return {
    partition: parts[1],
    service: parts[2],
    region: parts[3],
    accountId: parts[4],
    resource: parts.slice(5).join(":"),
  };
}
