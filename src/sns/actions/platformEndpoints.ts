import type { CreateEndpointResponse, Endpoint } from "@aws-sdk/client-sns";
import { attributesXml, escapeXml, nextTokenXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import { optionalParam, parseEntryMap, requireParam } from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export function createPlatformEndpoint(params: QueryParams, backend: SnsBackend): string {
  const endpoint = backend.createPlatformEndpoint(
    requireParam(params, "PlatformApplicationArn"),
    requireParam(params, "Token"),
    optionalParam(params, "CustomUserData"),
    parseEntryMap(params, "Attributes"),
  );

  const result = { EndpointArn: endpoint.arn } satisfies CreateEndpointResponse;
  return snsSuccessResponse(
    "CreatePlatformEndpoint",
    `<EndpointArn>${escapeXml(result.EndpointArn)}</EndpointArn>`,
  );
}

export function getEndpointAttributes(params: QueryParams, backend: SnsBackend): string {
  const endpoint = backend.getEndpoint(requireParam(params, "EndpointArn"));
  return snsSuccessResponse(
    "GetEndpointAttributes",
    `<Attributes>${attributesXml(endpoint.attributes)}</Attributes>`,
  );
}

export function setEndpointAttributes(params: QueryParams, backend: SnsBackend): string {
  backend.setEndpointAttributes(
    requireParam(params, "EndpointArn"),
    parseEntryMap(params, "Attributes"),
  );
  return snsSuccessResponse("SetEndpointAttributes", "");
}

export function listEndpointsByPlatformApplication(params: QueryParams, backend: SnsBackend): string {
  const page = backend.listEndpointsByPlatformApplication(
    requireParam(params, "PlatformApplicationArn"),
    optionalParam(params, "NextToken"),
  );

  const membersXml = page.items
    .map((e) => {
      const endpoint = { EndpointArn: e.arn, Attributes: e.attributes } satisfies Endpoint;
      return `<member><EndpointArn>${escapeXml(endpoint.EndpointArn)}</EndpointArn><Attributes>${attributesXml(endpoint.Attributes)}</Attributes></member>`;
    })
    .join("\n    ");

  return snsSuccessResponse(
    "ListEndpointsByPlatformApplication",
    `<Endpoints>${membersXml}</Endpoints>${nextTokenXml(page.nextToken)}`,
  );
}

export function deleteEndpoint(params: QueryParams, backend: SnsBackend): string {
  backend.deleteEndpoint(requireParam(params, "EndpointArn"));
  return snsSuccessResponse("DeleteEndpoint", "");
}
