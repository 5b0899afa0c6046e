import { snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { parseMemberList, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function addPermission(params: QueryParams, backend: SnsBackend): string {
  backend.addPermission(
    requireParam(params, "TopicArn"),
    requireParam(params, "Label"),
    parseMemberList(params, "AWSAccountId"),
    parseMemberList(params, "ActionName"),
  );
  return snsSuccessResponse("AddPermission", "");
}

export function removePermission(params: QueryParams, backend: SnsBackend): string {
  backend.removePermission(requireParam(params, "TopicArn"), requireParam(params, "Label"));
  return snsSuccessResponse("RemovePermission", "");
}
