import { snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function setSubscriptionAttributes(params: QueryParams, backend: SnsBackend): string {
  backend.setSubscriptionAttribute(
    requireParam(params, "SubscriptionArn"),
    requireParam(params, "AttributeName"),
    params.AttributeValue ?? "",
  );
  return snsSuccessResponse("SetSubscriptionAttributes", "");
}
