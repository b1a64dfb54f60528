import { LOGGER } from "@vitrine/observability";
import { createCatalogApplication } from "./bootstrap";

async function main() {
  const { adapter, config } = await createCatalogApplication();
  const logger = adapter.getContainer().resolve(LOGGER);
  await adapter.listen(config.PORT);

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    adapter.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  console.error("Catalog server failed to start", error);
  process.exit(1);
});
