import type { Subscription } from "@aws-sdk/client-sns";
import type { Page } from "../../common/pagination.ts";
import { escapeXml, nextTokenXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { optionalParam, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";
import type { SnsSubscription } from "../snsTypes.ts";

export function listSubscriptions(params: QueryParams, backend: SnsBackend): string {
  const page = backend.listSubscriptions(optionalParam(params, "NextToken"));
  return formatSubscriptionList("ListSubscriptions", page, backend.accountId);
}

export function listSubscriptionsByTopic(params: QueryParams, backend: SnsBackend): string {
  const page = backend.listSubscriptionsByTopic(
    requireParam(params, "TopicArn"),
    optionalParam(params, "NextToken"),
  );
  return formatSubscriptionList("ListSubscriptionsByTopic", page, backend.accountId);
}

function formatSubscriptionList(
  action: string,
  page: Page<SnsSubscription>,
  owner: string,
): string {
  const membersXml = page.items
    .map((s) => {
      const sub = {
        SubscriptionArn: s.arn,
        TopicArn: s.topicArn,
        Protocol: s.protocol,
        Endpoint: s.endpoint,
        Owner: owner,
      } satisfies Subscription;
      return `<member>
        <SubscriptionArn>${escapeXml(sub.SubscriptionArn)}</SubscriptionArn>
        <TopicArn>${escapeXml(sub.TopicArn)}</TopicArn>
        <Protocol>${escapeXml(sub.Protocol)}</Protocol>
        <Endpoint>${escapeXml(sub.Endpoint)}</Endpoint>
        <Owner>${sub.Owner}</Owner>
      </member>`;
    })
    .join("\n    ");

  return snsSuccessResponse(
    action,
    `<Subscriptions>${membersXml}</Subscriptions>${nextTokenXml(page.nextToken)}`,
  );
}
