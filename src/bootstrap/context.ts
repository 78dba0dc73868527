import type { Context } from "aws-lambda";
import type { NextInvocation } from "./runtime-client.js";

export type LambdaContextOptions = {
  functionName: string;
  functionVersion?: string;
  memorySizeMb?: number;
};

export function createLambdaContext(invocation: NextInvocation, options: LambdaContextOptions): Context {
  const { functionName } = options;
  const date = new Date().toISOString().slice(0, 10).split("-").join("/");

  return {
    callbackWaitsForEmptyEventLoop: true,
    functionName,
    functionVersion: options.functionVersion ?? "$LATEST",
    invokedFunctionArn: invocation.invokedFunctionArn,
    memoryLimitInMB: String(options.memorySizeMb ?? 128),
    awsRequestId: invocation.requestId,
    logGroupName: `/aws/lambda/${functionName}`,
    logStreamName: `${date}/[$LATEST]${invocation.requestId}`,
    getRemainingTimeInMillis: () => Math.max(0, invocation.deadlineMs - Date.now()),
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
  };
}
