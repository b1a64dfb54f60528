import { createToken } from "@vitrine/core";
import type { CacheManager } from "./cache-manager";
import type { CacheStore } from "./interfaces";

export const CACHE_STORE = createToken<CacheStore>("VITRINE_CACHE_STORE");
export const CACHE_MANAGER = createToken<CacheManager>("VITRINE_CACHE_MANAGER");
