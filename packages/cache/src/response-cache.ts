import { registerRouteEnhancer } from "@vitrine/core";
import type { Constructor, InjectionToken } from "@vitrine/core";

export interface CacheResponseOptions {
  ttlMs: number;
  /** Configured ttl in milliseconds, resolved per request; `ttlMs` applies when it is not registered. */
  ttlToken?: InjectionToken<number>;
}

/**
 * Caches the full response of a GET route. Only successful (200) responses are
 * stored; the key covers the method, the request origin, the path and the
 * sorted query string.
 */
export const CacheResponse = (options: CacheResponseOptions): MethodDecorator => {
  return (target, propertyKey) => {
    if (options.ttlMs <= 0) {
      throw new Error(`CacheResponse on ${String(propertyKey)} requires a positive ttlMs`);
    }
    registerRouteEnhancer(target.constructor as Constructor, propertyKey, {
      kind: "response-cache",
      ttlMs: options.ttlMs,
      ...(options.ttlToken ? { ttlToken: options.ttlToken } : {}),
    });
  };
};

export type QueryValue = string | string[] | undefined;

export const responseCacheKey = (
  method: string,
  path: string,
  query: Record<string, QueryValue> = {},
  /** `<protocol>://<host>`; payloads carry absolute URLs built from it. */
  origin = "",
): string => {
  const pairs = Object.keys(query)
    .sort()
    .flatMap((name) => {
      const value = query[name];
      if (value === undefined) return [];
      const values = Array.isArray(value) ? value : [value];
      return values.map((item) => `${encodeURIComponent(name)}=${encodeURIComponent(item)}`);
    });
  return `response:${method.toUpperCase()}:${origin}${path}?${pairs.join("&")}`;
};
