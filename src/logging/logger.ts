import type { LogLevel, LogContext, LogEntry } from "./types.ts";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;
const threshold = LOG_LEVELS.indexOf(isLogLevel(envLevel) ? envLevel : "info");

// Warnings and errors go to stderr.
function write(level: LogLevel, tag: string, msg: string, ctx?: LogContext): void {
  if (LOG_LEVELS.indexOf(level) < threshold) return;

  const entry: LogEntry = { ts: new Date().toISOString(), level, tag, msg, ...ctx };
  const line = JSON.stringify(entry);
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function errorContext(err: unknown): LogContext {
  if (err instanceof Error) return { error: err.message, error_stack: err.stack };
  if (typeof err === "string") return { error: err };
  if (err === undefined || err === null) return {};
  return { error: JSON.stringify(err) };
}

export const log = {
  debug: (tag: string, msg: string, ctx?: LogContext): void => write("debug", tag, msg, ctx),
  info: (tag: string, msg: string, ctx?: LogContext): void => write("info", tag, msg, ctx),
  warn: (tag: string, msg: string, ctx?: LogContext): void => write("warn", tag, msg, ctx),
  error: (tag: string, msg: string, err?: unknown, ctx?: LogContext): void =>
    write("error", tag, msg, { ...ctx, ...errorContext(err) }),
};
