export { createLogger, isLogLevel, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
