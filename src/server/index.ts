export { createLambdaTestServer } from "./test-server.js";
export { matchRoute, type RouteMatch } from "./routes.js";
export { errorResponseSchema } from "./responses.js";
export {
  InitStatus,
  RequestType,
  ServerState,
  type CancellationReason,
  type ErrorCause,
  type ErrorResponse,
  type InitResponse,
  type InvocationCompletion,
  type InvocationResponse,
  type InvokeOptions,
  type JsonConvention,
  type LambdaEntryPoint,
  type LambdaServerOptions,
  type LambdaTestServer,
  type RuntimeFetch,
  type TypedInvokeOptions,
} from "./types.js";
