import test from "node:test";
import assert from "node:assert/strict";
import { ConfigError } from "@vitrine/core";
import { loadAppConfig } from "./app-config";

test("falls back to defaults for unset variables", () => {
  const config = loadAppConfig({});

  assert.deepEqual(config, {
    PORT: 3000,
    LOG_LEVEL: "info",
    API_PREFIX: "/api",
    DATA_DRIVER: "json",
    DATA_FILE: "catalog-data.json",
    MEDIA_ROOT: "media",
    MEDIA_URL: "/media/",
    MAX_UPLOAD_BYTES: 5 * 1024 * 1024,
    PRODUCT_LIST_TTL_SECONDS: 300,
    CATEGORY_LIST_TTL_SECONDS: 900,
    TYPE_LIST_TTL_SECONDS: 600,
  });
});

test("reports every invalid variable at once", () => {
  assert.throws(
    () => loadAppConfig({ LOG_LEVEL: "loud", DATA_DRIVER: "postgres", PRODUCT_LIST_TTL_SECONDS: "0" }),
    (error) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.problems, [
        "Environment variable LOG_LEVEL must be one of: debug, info, warn, error",
        "Environment variable DATA_DRIVER must be one of: memory, json",
        "Environment variable PRODUCT_LIST_TTL_SECONDS must be at least 1",
      ]);
      return true;
    },
  );
});
