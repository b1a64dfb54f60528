export * from "./interfaces";
export * from "./memory-store";
export * from "./cache-manager";
export * from "./response-cache";
export * from "./tokens";
export * from "./cache.module";
