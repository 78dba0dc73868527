export * from "./server/index.js";
export * from "./bootstrap/index.js";
export { parseServerEnv, resolveServerOptions, type ResolvedServerOptions, type ServerEnvConfig } from "./config.js";
export { createLogger, SILENT_LOG_LEVEL, type Logger } from "./logger.js";
export {
  CancelledError,
  ChannelClosedError,
  InitErrorAfterStartError,
  InvalidServerStateError,
  LambdaTestServerError,
  RuntimeApiError,
  UnexpectedRequestError,
  UnknownRequestIdError,
} from "./errors.js";
