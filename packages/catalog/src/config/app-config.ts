import { InferEnv, defineEnvSchema, env, loadConfig } from "@vitrine/core";
import { LOG_LEVELS } from "@vitrine/observability";

const schema = defineEnvSchema({
  PORT: env.integer({ default: 3000, min: 0 }),
  LOG_LEVEL: env.oneOf(LOG_LEVELS, { default: "info" }),
  API_PREFIX: env.string({ default: "/api" }),
  DATA_DRIVER: env.oneOf<"memory" | "json">(["memory", "json"] as const, { default: "json" }),
  DATA_FILE: env.string({ default: "catalog-data.json" }),
  MEDIA_ROOT: env.string({ default: "media" }),
  MEDIA_URL: env.string({ default: "/media/" }),
  MAX_UPLOAD_BYTES: env.integer({ default: 5 * 1024 * 1024, min: 1 }),
  PRODUCT_LIST_TTL_SECONDS: env.integer({ default: 300, min: 1 }),
  CATEGORY_LIST_TTL_SECONDS: env.integer({ default: 900, min: 1 }),
  TYPE_LIST_TTL_SECONDS: env.integer({ default: 600, min: 1 }),
});

export type AppConfig = InferEnv<typeof schema.fields>;

export const loadAppConfig = (source?: Record<string, string | undefined>): AppConfig => loadConfig(schema, source);
