export * from "./di/types";
export * from "./di/container";
export * from "./di/decorators";
export * from "./application/module";
export * from "./application/controller";
export * from "./routing/enhancers";
export * from "./routing/routes";
export * from "./routing/router";
export * from "./validation/schema";
export * from "./validation/validator";
export * from "./validation/rules";
export * from "./config/env";
