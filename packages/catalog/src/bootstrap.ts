import path from "node:path";
import type { ProviderLike } from "@vitrine/core";
import { createApplicationContext, type ApplicationContext } from "@vitrine/core";
import { LOGGING_OPTIONS } from "@vitrine/observability";
import { type Connection, createStandaloneConnection } from "@vitrine/orm";
import { ExpressHttpAdapter } from "@vitrine/server";
import { FileSystemStorageClient, IMAGE_STORE_OPTIONS, STORAGE_CLIENT } from "@vitrine/storage";
import { CatalogModule } from "./catalog.module";
import { type AppConfig, loadAppConfig } from "./config/app-config";
import { CATALOG_ENTITIES } from "./entities";
import { APP_CONFIG, DB_CONNECTION } from "./tokens";

export const openCatalogConnection = (config: AppConfig): Promise<Connection> =>
  createStandaloneConnection({
    driver: config.DATA_DRIVER,
    filePath: path.resolve(config.DATA_FILE),
    entities: CATALOG_ENTITIES,
  });

/** Providers that bind the catalog module to `config` and an open connection. */
export const catalogProviders = (config: AppConfig, connection: Connection): ProviderLike[] => [
  { token: APP_CONFIG, useValue: config },
  { token: DB_CONNECTION, useValue: connection },
  {
    token: LOGGING_OPTIONS,
    useValue: { serviceName: "vitrine-catalog", logLevel: config.LOG_LEVEL },
  },
  { token: STORAGE_CLIENT, useValue: new FileSystemStorageClient(path.resolve(config.MEDIA_ROOT)) },
  { token: IMAGE_STORE_OPTIONS, useValue: { mediaUrl: config.MEDIA_URL } },
];

export interface CatalogApplication {
  adapter: ExpressHttpAdapter;
  connection: Connection;
  config: AppConfig;
}

/** `overrides` win over the configured providers, e.g. test doubles. */
export const createCatalogApplication = async (
  config: AppConfig = loadAppConfig(),
  overrides: ProviderLike[] = [],
): Promise<CatalogApplication> => {
  const connection = await openCatalogConnection(config);
  const servesMedia = config.MEDIA_URL.startsWith("/");
  const adapter = new ExpressHttpAdapter({
    module: CatalogModule,
    overrides: [...catalogProviders(config, connection), ...overrides],
    globalPrefix: config.API_PREFIX,
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
    staticAssets: servesMedia ? [{ prefix: config.MEDIA_URL, directory: path.resolve(config.MEDIA_ROOT) }] : [],
  });
  return { adapter, connection, config };
};

/** The catalog container without an HTTP server, for administrative commands. */
export const createCatalogContext = async (
  config: AppConfig = loadAppConfig(),
  overrides: ProviderLike[] = [],
): Promise<ApplicationContext> => {
  const connection = await openCatalogConnection(config);
  return createApplicationContext(CatalogModule, {
    overrides: [...catalogProviders(config, connection), ...overrides],
  });
};
