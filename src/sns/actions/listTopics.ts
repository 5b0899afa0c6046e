import type { ListTopicsResponse, Topic } from "@aws-sdk/client-sns";
import { escapeXml, nextTokenXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { optionalParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function listTopics(params: QueryParams, backend: SnsBackend): string {
  const page = backend.listTopics(optionalParam(params, "NextToken"));

  const topics = page.items.map((t) => ({ TopicArn: t.arn }) satisfies Topic);
  const result = { Topics: topics, NextToken: page.nextToken } satisfies ListTopicsResponse;

  const membersXml = topics
    .map((t) => `<member><TopicArn>${escapeXml(t.TopicArn)}</TopicArn></member>`)
    .join("\n    ");

  return snsSuccessResponse(
    "ListTopics",
    `<Topics>${membersXml}</Topics>${nextTokenXml(result.NextToken)}`,
  );
}
