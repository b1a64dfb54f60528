export * from "./metadata";
export * from "./decorators";
export * from "./relations";
export * from "./errors";
export * from "./query/criteria";
export * from "./drivers/interfaces";
export * from "./drivers/base";
export * from "./drivers/memory";
export * from "./drivers/json";
export * from "./schema/utils";
export * from "./repository";
export * from "./connection";
export * from "./standalone";
