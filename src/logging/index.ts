export { log } from "./logger.ts";
export type { LogLevel, LogContext, LogEntry } from "./types.ts";
