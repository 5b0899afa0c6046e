/** Receives the SNS event JSON of one delivery. */
export type FunctionHandler = (payload: string) => void | Promise<void>;

export interface FunctionInvocation {
  functionName: string;
  qualifier?: string;
  payload: string;
  subject?: string;
  timestamp: number;
}

export interface LambdaFunction {
  name: string;
  arn: string;
  handler?: FunctionHandler;
  invocations: FunctionInvocation[];
}

export interface InvokeRequest {
  functionName: string;
  region: string;
  accountId: string;
  qualifier?: string;
  payload: string;
  subject?: string;
}
