export {
  createLambdaApplication,
  type InitHook,
  type LambdaApplication,
  type LambdaApplicationOptions,
  type LambdaHandler,
  type ShutdownHook,
} from "./application.js";
export { createLambdaContext, type LambdaContextOptions } from "./context.js";
export {
  DEFAULT_RUNTIME_API,
  RUNTIME_API_VERSION,
  RuntimeApiClient,
  toErrorResponse,
  type NextInvocation,
  type RuntimeApiClientOptions,
} from "./runtime-client.js";
