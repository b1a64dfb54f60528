export * from "./logging/interfaces";
export * from "./logging/correlation";
export * from "./logging/structured-logger";
export * from "./logging/tokens";
export * from "./logging/logging.module";
