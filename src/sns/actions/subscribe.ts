import type { SubscribeResponse } from "@aws-sdk/client-sns";
import { escapeXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { parseEntryMap, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function subscribe(params: QueryParams, backend: SnsBackend): string {
  const subscription = backend.subscribe(
    requireParam(params, "TopicArn"),
    requireParam(params, "Protocol"),
    params.Endpoint ?? "",
    parseEntryMap(params, "Attributes"),
  );

  const result = { SubscriptionArn: subscription.arn } satisfies SubscribeResponse;
  return snsSuccessResponse(
    "Subscribe",
    `<SubscriptionArn>${escapeXml(result.SubscriptionArn)}</SubscriptionArn>`,
  );
}
