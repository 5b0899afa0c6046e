import type { CreateTopicResponse } from "@aws-sdk/client-sns";
import { escapeXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { parseEntryMap, parseTags, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function createTopic(params: QueryParams, backend: SnsBackend): string {
  const name = requireParam(params, "Name");
  const topic = backend.createTopic(
    name,
    parseEntryMap(params, "Attributes"),
    parseTags(params),
  );

  const result = { TopicArn: topic.arn } satisfies CreateTopicResponse;
  return snsSuccessResponse("CreateTopic", `<TopicArn>${escapeXml(result.TopicArn)}</TopicArn>`);
}
