import { Constructor } from "../di/types";
import { getControllerBasePath } from "../application/controller";
import { RouteEnhancer } from "./enhancers";
import { HttpMethod, getControllerRoutes } from "./routes";

export interface CompiledRoute {
  method: HttpMethod;
  path: string;
  status: number;
  controller: Constructor;
  handlerKey: string | symbol;
  enhancers: RouteEnhancer[];
}

export const compileControllerRoutes = (controllers: Constructor[]): CompiledRoute[] =>
  controllers.flatMap((controller) => {
    const basePath = getControllerBasePath(controller);
    return getControllerRoutes(controller).map(({ method, path, status, handlerKey, enhancers }) => ({
      method,
      path: joinPaths(basePath, path),
      status: status ?? 200,
      controller,
      handlerKey,
      enhancers,
    }));
  });

/** Joins URL segments, collapsing repeated slashes and dropping a trailing one. */
export const joinPaths = (...segments: string[]): string => {
  const joined = `/${segments.join("/")}`.replace(/\/+/g, "/");
  return joined.length > 1 ? joined.replace(/\/$/, "") : joined;
};
