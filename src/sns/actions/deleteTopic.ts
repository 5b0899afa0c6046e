import { snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function deleteTopic(params: QueryParams, backend: SnsBackend): string {
  backend.deleteTopic(requireParam(params, "TopicArn"));
  return snsSuccessResponse("DeleteTopic", "");
}
