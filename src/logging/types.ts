export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  // Asset context
  file?: string;
  asset?: string;
  media_type?: string;
  parser?: string;

  // Resource context
  href?: string;
  source?: string;

  // Assembly context
  epub_version?: number;
  strategy?: string;
  reading_order?: number;
  resources?: number;
  navigation_roles?: string[];
  encrypted?: number;
  options?: number;
  duration_ms?: number;

  // Error context
  error?: string;
  error_stack?: string;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}
