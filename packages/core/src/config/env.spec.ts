import test from "node:test";
import assert from "node:assert/strict";
import { ConfigError, defineEnvSchema, env, loadConfig } from "./env";

const schema = defineEnvSchema({
  PORT: env.integer({ default: 3000, min: 0 }),
  DATA_DRIVER: env.oneOf(["memory", "json"] as const, { default: "memory" }),
  MEDIA_URL: env.string({ default: "/media/" }),
  DATA_FILE: env.string(),
});

test("applies defaults for absent or empty variables", () => {
  assert.deepEqual(loadConfig(schema, { PORT: "", DATA_FILE: "catalog.json" }), {
    PORT: 3000,
    DATA_DRIVER: "memory",
    MEDIA_URL: "/media/",
    DATA_FILE: "catalog.json",
  });
});

test("parses provided values", () => {
  const config = loadConfig(schema, {
    PORT: "8080",
    DATA_DRIVER: "json",
    MEDIA_URL: "https://cdn.test/",
    DATA_FILE: "shop.json",
  });
  assert.equal(config.PORT, 8080);
  assert.equal(config.DATA_DRIVER, "json");
  assert.equal(config.MEDIA_URL, "https://cdn.test/");
});

test("reports every invalid variable at once", () => {
  assert.throws(
    () => loadConfig(schema, { PORT: "80.5", DATA_DRIVER: "redis" }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.problems, [
        "Environment variable PORT must be an integer",
        "Environment variable DATA_DRIVER must be one of: memory, json",
        "Environment variable DATA_FILE is required",
      ]);
      return true;
    },
  );
});
