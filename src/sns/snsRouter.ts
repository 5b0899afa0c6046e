import type { FastifyReply, FastifyRequest } from "fastify";
import { SnsError } from "../common/errors.ts";
import { accountIdFromAuth, DEFAULT_ACCOUNT_ID, regionFromAuth } from "../common/types.ts";
import { snsErrorResponse } from "../common/xml.ts";
import type { QueryParams } from "./queryParams.ts";
import { toQueryParams } from "./queryParams.ts";
import type { SnsBackend } from "./snsBackend.ts";
import type { SnsBackends } from "./snsBackends.ts";

export type SnsActionHandler = (
  params: QueryParams,
  backend: SnsBackend,
) => string | Promise<string>;

/**
 * Dispatches query-protocol actions to the backend of the caller's account and region.
 */
export class SnsRouter {
  private handlers = new Map<string, SnsActionHandler>();
  private backends: SnsBackends;
  private defaultRegion: string;

  constructor(backends: SnsBackends, defaultRegion: string) {
    this.backends = backends;
    this.defaultRegion = defaultRegion;
  }

  register(action: string, handler: SnsActionHandler): void {
    this.handlers.set(action, handler);
  }

  async handle(request: FastifyRequest, reply: FastifyReply): Promise<string> {
    const params = toQueryParams(request.body);
    const action = params.Action;
    reply.header("content-type", "text/xml");

    if (!action) {
      reply.status(400);
      return snsErrorResponse("MissingAction", "Missing Action parameter");
    }

    const handler = this.handlers.get(action);
    if (!handler) {
      reply.status(400);
      return snsErrorResponse("InvalidAction", `Unknown action: ${action}`);
    }

    const authorization = request.headers.authorization;
    const backend = this.backends.get(
      accountIdFromAuth(authorization) ?? DEFAULT_ACCOUNT_ID,
      regionFromAuth(authorization) ?? this.defaultRegion,
    );

    try {
      return await handler(params, backend);
    } catch (err) {
      if (err instanceof SnsError) {
        request.log.debug({ code: err.code, action }, err.message);
        reply.status(err.statusCode);
        return snsErrorResponse(err.code, err.message, err.senderFault ? "Sender" : "Receiver");
      }
      throw err;
    }
  }
}
