import { Constructor, InjectionToken } from "../di/types";

/** Whole-response caching for GET routes, keyed by method, path and query. */
export interface ResponseCacheEnhancer {
  kind: "response-cache";
  ttlMs: number;
  /** When registered in the container, its value replaces `ttlMs`. */
  ttlToken?: InjectionToken<number>;
}

/** Multipart file fields accepted by a route. */
export interface UploadEnhancer {
  kind: "upload";
  field: string;
  maxCount: number;
}

export type RouteEnhancer = ResponseCacheEnhancer | UploadEnhancer;

type HandlerKey = string | symbol;

const enhancerRegistry = new WeakMap<Constructor, Map<HandlerKey, RouteEnhancer[]>>();

export const registerRouteEnhancer = (
  controller: Constructor,
  handlerKey: HandlerKey | undefined,
  enhancer: RouteEnhancer,
): void => {
  if (!handlerKey) {
    throw new Error("Route enhancer requires a handler key");
  }
  const controllerRegistry = enhancerRegistry.get(controller) ?? new Map<HandlerKey, RouteEnhancer[]>();
  const enhancers = controllerRegistry.get(handlerKey) ?? [];
  enhancers.push(enhancer);
  controllerRegistry.set(handlerKey, enhancers);
  enhancerRegistry.set(controller, controllerRegistry);
};

export const getRouteEnhancers = (controller: Constructor, handlerKey: HandlerKey): RouteEnhancer[] =>
  enhancerRegistry.get(controller)?.get(handlerKey) ?? [];

export const findEnhancer = <K extends RouteEnhancer["kind"]>(
  enhancers: RouteEnhancer[] | undefined,
  kind: K,
): Extract<RouteEnhancer, { kind: K }> | undefined =>
  (enhancers ?? []).find((enhancer): enhancer is Extract<RouteEnhancer, { kind: K }> => enhancer.kind === kind);
