import { attributesXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function getTopicAttributes(params: QueryParams, backend: SnsBackend): string {
  const attributes = backend.getTopicAttributes(requireParam(params, "TopicArn"));
  return snsSuccessResponse("GetTopicAttributes", `<Attributes>${attributesXml(attributes)}</Attributes>`);
}
