import { Constructor } from "../di/types";
import { getRouteEnhancers, RouteEnhancer } from "./enhancers";

export type HttpMethod = "GET" | "POST";

export interface RouteOptions {
  /** Status sent when the handler returns a value. Defaults to 200. */
  status?: number;
}

export interface RouteDefinition extends RouteOptions {
  method: HttpMethod;
  path: string;
  handlerKey: string | symbol;
  enhancers: RouteEnhancer[];
}

const declaredRoutes = new WeakMap<Constructor, Omit<RouteDefinition, "enhancers">[]>();

const route =
  (method: HttpMethod) =>
  (path: string, options: RouteOptions = {}): MethodDecorator =>
  (target, handlerKey) => {
    const controller = target.constructor as Constructor;
    declaredRoutes.set(controller, [...(declaredRoutes.get(controller) ?? []), { ...options, method, path, handlerKey }]);
  };

export const Get = route("GET");
export const Post = route("POST");

export const getControllerRoutes = (controller: Constructor): RouteDefinition[] =>
  (declaredRoutes.get(controller) ?? []).map((definition) => ({
    ...definition,
    enhancers: getRouteEnhancers(controller, definition.handlerKey),
  }));
