import type { Tag } from "@aws-sdk/client-sns";
import { escapeXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { parseMemberList, parseTags, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function tagResource(params: QueryParams, backend: SnsBackend): string {
  backend.tagResource(requireParam(params, "ResourceArn"), parseTags(params));
  return snsSuccessResponse("TagResource", "");
}

export function untagResource(params: QueryParams, backend: SnsBackend): string {
  backend.untagResource(requireParam(params, "ResourceArn"), parseMemberList(params, "TagKeys"));
  return snsSuccessResponse("UntagResource", "");
}

export function listTagsForResource(params: QueryParams, backend: SnsBackend): string {
  const tags = backend.listTagsForResource(requireParam(params, "ResourceArn"));

  const membersXml = Array.from(tags.entries())
    .map(([key, value]) => {
      const tag = { Key: key, Value: value } satisfies Tag;
      return `<member><Key>${escapeXml(tag.Key)}</Key><Value>${escapeXml(tag.Value)}</Value></member>`;
    })
    .join("\n    ");

  return snsSuccessResponse("ListTagsForResource", `<Tags>${membersXml}</Tags>`);
}
