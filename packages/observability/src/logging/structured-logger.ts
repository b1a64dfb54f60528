import { currentCorrelationId } from "./correlation";
import { LOG_LEVELS, LogEntry, LogLevel, LogSink, LoggingOptions } from "./interfaces";

type Context = Record<string, unknown>;

export class StructuredLogger {
  private readonly threshold: number;

  constructor(
    private readonly options: LoggingOptions,
    private readonly sink: LogSink,
    private readonly bindings: Context = {},
  ) {
    this.threshold = LOG_LEVELS.indexOf(options.logLevel ?? "info");
  }

  /** A logger that adds `bindings` to the context of every entry. */
  child(bindings: Context): StructuredLogger {
    return new StructuredLogger(this.options, this.sink, { ...this.bindings, ...bindings });
  }

  debug(message: string, context?: Context): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Context): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Context): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Context): void {
    this.write("error", message, context);
  }

  /** Times `fn`: a debug entry when it settles, an error entry (and the rethrown error) when it fails. */
  async profile<T>(label: string, fn: () => Promise<T> | T, context?: Context): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      this.write("debug", `${label} completed`, context, Date.now() - startedAt);
      return result;
    } catch (error) {
      this.write("error", `${label} failed`, { ...context, error }, Date.now() - startedAt);
      throw error;
    }
  }

  private write(level: LogLevel, message: string, context?: Context, durationMs?: number): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }
    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.options.serviceName,
      message,
      correlationId: currentCorrelationId(),
      durationMs,
      context: Object.keys(merged).length ? serializeErrors(merged) : undefined,
    };
    this.sink(JSON.stringify(entry), entry);
  }
}

const serializeErrors = (context: Context): Context =>
  Object.fromEntries(
    Object.entries(context).map(([key, value]) =>
      value instanceof Error ? [key, { name: value.name, message: value.message, stack: value.stack }] : [key, value],
    ),
  );
