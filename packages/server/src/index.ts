export * from "./types";
export * from "./errors";
export * from "./decorators";
export * from "./express-adapter";
