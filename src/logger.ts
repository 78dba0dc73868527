import { createLogger as createWinstonLogger, format, transports, type Logger } from "winston";

export type { Logger };

export const SILENT_LOG_LEVEL = "silent";

/** Console logger for the test server and the captured application. Level `silent` drops everything. */
export function createLogger(level: string): Logger {
  const silent = level === SILENT_LOG_LEVEL;
  return createWinstonLogger({
    level: silent ? "error" : level,
    silent,
    format: format.combine(format.label({ label: "lambda-test-server" }), format.simple()),
    transports: [new transports.Console()],
  });
}
