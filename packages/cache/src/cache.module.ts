import { Module } from "@vitrine/core";
import { LOGGER, LoggingModule } from "@vitrine/observability";
import { CacheManager } from "./cache-manager";
import { MemoryCacheStore } from "./memory-store";
import { CACHE_MANAGER, CACHE_STORE } from "./tokens";

@Module({
  imports: [LoggingModule],
  providers: [
    {
      token: CACHE_STORE,
      useFactory: () => new MemoryCacheStore(),
    },
    {
      token: CACHE_MANAGER,
      useFactory: ({ container }) =>
        new CacheManager(container.resolve(CACHE_STORE), container.resolve(LOGGER).child({ component: "cache" })),
    },
  ],
})
export class CacheModule {}
