import { snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function setTopicAttributes(params: QueryParams, backend: SnsBackend): string {
  const topicArn = requireParam(params, "TopicArn");
  const attributeName = requireParam(params, "AttributeName");
  backend.setTopicAttribute(topicArn, attributeName, params.AttributeValue ?? "");
  return snsSuccessResponse("SetTopicAttributes", "");
}
