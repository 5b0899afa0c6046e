import { DeliveryFailureError } from "../../common/errors.ts";
import type { InvokeRequest } from "../../lambda/lambdaTypes.ts";
import { buildFunctionEvent } from "../envelope.ts";
import type { Delivery, Transport } from "./transport.ts";

export interface FunctionInvoker {
  invoke(request: InvokeRequest): Promise<void>;
}

export interface FunctionEndpoint {
  functionName: string;
  region: string;
  accountId: string;
  qualifier?: string;
}

/**
 * `arn:aws:lambda:{region}:{account}:function:{name}[:{qualifier}]`
 */
export function parseFunctionEndpoint(endpoint: string): FunctionEndpoint | undefined {
  const parts = endpoint.split(":");
  if (parts.length !== 7 && parts.length !== 8) return undefined;
  if (parts[0] !== "arn" || parts[2] !== "lambda" || parts[5] !== "function" || !parts[6]) {
    return undefined;
  }
  return {
    region: parts[3],
    accountId: parts[4],
    functionName: parts[6],
    qualifier: parts.length === 8 ? parts[7] : undefined,
  };
}

export class LambdaTransport implements Transport {
  private readonly functions: FunctionInvoker;

  constructor(functions: FunctionInvoker) {
    this.functions = functions;
  }

  async deliver({ subscription, notification }: Delivery): Promise<void> {
    const target = parseFunctionEndpoint(subscription.endpoint);
    if (!target) {
      throw new DeliveryFailureError(
        subscription.arn,
        `Invalid function endpoint: ${subscription.endpoint}`,
      );
    }

    await this.functions.invoke({
      ...target,
      payload: buildFunctionEvent(notification, subscription),
      subject: notification.subject,
    });
  }
}
