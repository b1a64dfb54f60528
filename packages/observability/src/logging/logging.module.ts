import { Module } from "@vitrine/core";
import { StructuredLogger } from "./structured-logger";
import { LOGGING_OPTIONS, LOG_SINK, LOGGER } from "./tokens";
import { LogEntry, LogSink, LoggingOptions } from "./interfaces";

export const consoleSink: LogSink = (payload, entry) => {
  if (entry.level === "error" || entry.level === "warn") {
    console.error(payload);
    return;
  }
  console.log(payload);
};

/** Collects entries in memory; tests assert on what was logged. */
export const createMemorySink = (): LogSink & { entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  const sink: LogSink = (_payload, entry) => {
    entries.push(entry);
  };
  return Object.assign(sink, { entries });
};

@Module({
  providers: [
    {
      token: LOGGING_OPTIONS,
      useValue: {
        serviceName: "vitrine",
        logLevel: "info",
      } satisfies LoggingOptions,
    },
    {
      token: LOG_SINK,
      useValue: consoleSink,
    },
    {
      token: LOGGER,
      useFactory: ({ container }) =>
        new StructuredLogger(container.resolve(LOGGING_OPTIONS), container.resolve(LOG_SINK)),
    },
  ],
})
export class LoggingModule {}
