import type {
  CreatePlatformApplicationResponse,
  PlatformApplication as SdkPlatformApplication,
} from "@aws-sdk/client-sns";
import { attributesXml, escapeXml, nextTokenXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { optionalParam, parseEntryMap, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function createPlatformApplication(params: QueryParams, backend: SnsBackend): string {
  const application = backend.createPlatformApplication(
    requireParam(params, "Name"),
    requireParam(params, "Platform"),
    parseEntryMap(params, "Attributes"),
  );

  const result = {
    PlatformApplicationArn: application.arn,
  } satisfies CreatePlatformApplicationResponse;
  return snsSuccessResponse(
    "CreatePlatformApplication",
    `<PlatformApplicationArn>${escapeXml(result.PlatformApplicationArn)}</PlatformApplicationArn>`,
  );
}

export function getPlatformApplicationAttributes(params: QueryParams, backend: SnsBackend): string {
  const application = backend.getPlatformApplication(requireParam(params, "PlatformApplicationArn"));
  return snsSuccessResponse(
    "GetPlatformApplicationAttributes",
    `<Attributes>${attributesXml(application.attributes)}</Attributes>`,
  );
}

export function setPlatformApplicationAttributes(params: QueryParams, backend: SnsBackend): string {
  backend.setPlatformApplicationAttributes(
    requireParam(params, "PlatformApplicationArn"),
    parseEntryMap(params, "Attributes"),
  );
  return snsSuccessResponse("SetPlatformApplicationAttributes", "");
}

export function listPlatformApplications(params: QueryParams, backend: SnsBackend): string {
  const page = backend.listPlatformApplications(optionalParam(params, "NextToken"));

  const membersXml = page.items
    .map((a) => {
      const app = {
        PlatformApplicationArn: a.arn,
        Attributes: a.attributes,
      } satisfies SdkPlatformApplication;
      return `<member><PlatformApplicationArn>${escapeXml(app.PlatformApplicationArn)}</PlatformApplicationArn><Attributes>${attributesXml(app.Attributes)}</Attributes></member>`;
    })
    .join("\n    ");

  return snsSuccessResponse(
    "ListPlatformApplications",
    `<PlatformApplications>${membersXml}</PlatformApplications>${nextTokenXml(page.nextToken)}`,
  );
}

export function deletePlatformApplication(params: QueryParams, backend: SnsBackend): string {
  backend.deletePlatformApplication(requireParam(params, "PlatformApplicationArn"));
  return snsSuccessResponse("DeletePlatformApplication", "");
}
