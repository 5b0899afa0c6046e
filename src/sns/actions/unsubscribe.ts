import { snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function unsubscribe(params: QueryParams, backend: SnsBackend): string {
  backend.unsubscribe(requireParam(params, "SubscriptionArn"));
  return snsSuccessResponse("Unsubscribe", "");
}
