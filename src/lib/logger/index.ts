export { createLogger, toError, type Logger, type LoggerConfig } from "./logger";

export type { LogLevel } from "./schema";
