export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingOptions {
  serviceName: string;
  /** Entries below this level are dropped. Defaults to `info`. */
  logLevel?: LogLevel;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId?: string;
  /** Set on entries written by `StructuredLogger.profile`. */
  durationMs?: number;
  context?: Record<string, unknown>;
}

/** Receives every entry that passes the level filter, already rendered as one JSON line. */
export type LogSink = (line: string, entry: LogEntry) => void;
