import { lambdaFunctionArn } from "../common/arnHelper.ts";
import { LambdaError } from "../common/errors.ts";
import { DEFAULT_ACCOUNT_ID, DEFAULT_REGION } from "../common/types.ts";
import type { FunctionInvoker } from "../sns/transports/lambdaTransport.ts";
import type { FunctionHandler, FunctionInvocation, InvokeRequest, LambdaFunction } from "./lambdaTypes.ts";

/**
 * Registry of functions that topics can invoke. Every invocation is recorded;
 * a registered handler, when present, runs with the event payload.
 */
export class LambdaStore implements FunctionInvoker {
  private functions = new Map<string, LambdaFunction>();

  registerFunction(
    name: string,
    options: { region?: string; accountId?: string; handler?: FunctionHandler } = {},
  ): LambdaFunction {
    const arn = lambdaFunctionArn(name, options.region ?? DEFAULT_REGION, options.accountId ?? DEFAULT_ACCOUNT_ID);
    const existing = this.functions.get(arn);
    if (existing) {
      if (options.handler) existing.handler = options.handler;
      return existing;
    }

    const fn: LambdaFunction = { name, arn, handler: options.handler, invocations: [] };
    this.functions.set(arn, fn);
    return fn;
  }

  getFunction(
    name: string,
    region: string = DEFAULT_REGION,
    accountId: string = DEFAULT_ACCOUNT_ID,
  ): LambdaFunction | undefined {
    return this.functions.get(lambdaFunctionArn(name, region, accountId));
  }

  async invoke(request: InvokeRequest): Promise<void> {
    const fn = this.getFunction(request.functionName, request.region, request.accountId);
    if (!fn) {
      throw new LambdaError(
        "ResourceNotFoundException",
        `Function not found: ${lambdaFunctionArn(request.functionName, request.region, request.accountId)}`,
      );
    }

    const invocation: FunctionInvocation = {
      functionName: fn.name,
      qualifier: request.qualifier,
      payload: request.payload,
      subject: request.subject,
      timestamp: Date.now(),
    };
    fn.invocations.push(invocation);

    if (fn.handler) {
      await fn.handler(request.payload);
    }
  }

  purgeAll(): void {
    this.functions.clear();
  }
}
