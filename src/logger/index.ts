export { MemoryLogger, createLogger, parseLogLevel } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
