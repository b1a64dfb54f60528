import { Module } from "@vitrine/core";
import { CacheModule } from "@vitrine/cache";
import { LoggingModule } from "@vitrine/observability";
import { Connection } from "@vitrine/orm";
import { StorageModule } from "@vitrine/storage";
import { CatalogController } from "./catalog.controller";
import { CategoryService } from "./category/category.service";
import { loadAppConfig } from "./config/app-config";
import { ProductService } from "./product/product.service";
import { APP_CONFIG, CATEGORY_LIST_TTL, DB_CONNECTION, TYPE_LIST_TTL } from "./tokens";
import { TypeService } from "./type/type.service";

@Module({
  imports: [LoggingModule, CacheModule, StorageModule],
  controllers: [CatalogController],
  providers: [
    {
      token: APP_CONFIG,
      useFactory: () => loadAppConfig(),
    },
    // bootstrap replaces this with a connection on the configured driver
    {
      token: DB_CONNECTION,
      useFactory: () => new Connection(),
    },
    {
      token: CATEGORY_LIST_TTL,
      useFactory: ({ container }) => container.resolve(APP_CONFIG).CATEGORY_LIST_TTL_SECONDS * 1000,
    },
    {
      token: TYPE_LIST_TTL,
      useFactory: ({ container }) => container.resolve(APP_CONFIG).TYPE_LIST_TTL_SECONDS * 1000,
    },
    CategoryService,
    TypeService,
    ProductService,
  ],
})
export class CatalogModule {}
