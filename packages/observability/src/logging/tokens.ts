import { createToken } from "@vitrine/core";
import type { LogSink, LoggingOptions } from "./interfaces";
import type { StructuredLogger } from "./structured-logger";

export const LOGGING_OPTIONS = createToken<LoggingOptions>("VITRINE_LOGGING_OPTIONS");
export const LOG_SINK = createToken<LogSink>("VITRINE_LOG_SINK");
export const LOGGER = createToken<StructuredLogger>("VITRINE_LOGGER");
