export * from "./storage-client";
export * from "./image-store";
export * from "./tokens";
export * from "./storage.module";
