import { attributesXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function getSubscriptionAttributes(params: QueryParams, backend: SnsBackend): string {
  const attributes = backend.getSubscriptionAttributes(requireParam(params, "SubscriptionArn"));
  return snsSuccessResponse(
    "GetSubscriptionAttributes",
    `<Attributes>${attributesXml(attributes)}</Attributes>`,
  );
}
