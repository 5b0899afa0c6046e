import type {
  CheckIfPhoneNumberIsOptedOutResponse,
  GetSMSAttributesResponse,
  ListPhoneNumbersOptedOutResponse,
} from "@aws-sdk/client-sns";
import { attributesXml, escapeXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { optionalParam, parseEntryMap, parseMemberList, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function setSmsAttributes(params: QueryParams, backend: SnsBackend): string {
  backend.setSmsAttributes(parseEntryMap(params, "attributes"));
  return snsSuccessResponse("SetSMSAttributes", "");
}

export function getSmsAttributes(params: QueryParams, backend: SnsBackend): string {
  const result = {
    attributes: backend.getSmsAttributes(parseMemberList(params, "attributes")),
  } satisfies GetSMSAttributesResponse;
  return snsSuccessResponse(
    "GetSMSAttributes",
    `<attributes>${attributesXml(result.attributes)}</attributes>`,
  );
}

export function checkIfPhoneNumberIsOptedOut(params: QueryParams, backend: SnsBackend): string {
  const result = {
    isOptedOut: backend.checkIfPhoneNumberIsOptedOut(requireParam(params, "phoneNumber")),
  } satisfies CheckIfPhoneNumberIsOptedOutResponse;
  return snsSuccessResponse(
    "CheckIfPhoneNumberIsOptedOut",
    `<isOptedOut>${String(result.isOptedOut)}</isOptedOut>`,
  );
}

// This action spells its token in lower camel case
export function listPhoneNumbersOptedOut(params: QueryParams, backend: SnsBackend): string {
  const page = backend.listPhoneNumbersOptedOut(optionalParam(params, "nextToken"));
  const result = {
    phoneNumbers: page.items,
    nextToken: page.nextToken,
  } satisfies ListPhoneNumbersOptedOutResponse;

  const membersXml = result.phoneNumbers
    .map((phoneNumber) => `<member>${escapeXml(phoneNumber)}</member>`)
    .join("\n    ");
  const tokenXml = result.nextToken ? `<nextToken>${escapeXml(result.nextToken)}</nextToken>` : "";

  return snsSuccessResponse(
    "ListPhoneNumbersOptedOut",
    `<phoneNumbers>${membersXml}</phoneNumbers>${tokenXml}`,
  );
}

export function optInPhoneNumber(params: QueryParams, backend: SnsBackend): string {
  backend.optInPhoneNumber(requireParam(params, "phoneNumber"));
  return snsSuccessResponse("OptInPhoneNumber", "");
}
