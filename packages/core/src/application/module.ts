import { Container } from "../di/container";
import { isInjectable, provideFromClass } from "../di/decorators";
import { Constructor, ProviderLike, Provider, InjectionToken } from "../di/types";
import { CompiledRoute, compileControllerRoutes } from "../routing/router";

export interface ModuleOptions {
  imports?: Constructor[];
  providers?: ProviderLike[];
  controllers?: Constructor[];
}

const modules = new WeakMap<Constructor, Required<ModuleOptions>>();

export const Module =
  (options: ModuleOptions): ClassDecorator =>
  (target) => {
    modules.set(target as unknown as Constructor, {
      imports: options.imports ?? [],
      providers: options.providers ?? [],
      controllers: options.controllers ?? [],
    });
  };

const getModuleOptions = (moduleType: Constructor): Required<ModuleOptions> => {
  const options = modules.get(moduleType);
  if (!options) {
    throw new Error(`${moduleType.name} is imported as a module but has no @Module()`);
  }
  return options;
};

export interface ApplicationContextOptions {
  /** Registered after every module provider, so they replace module defaults. */
  overrides?: ProviderLike[];
}

export interface ApplicationContext {
  container: Container;
  routes: CompiledRoute[];
  beginRequest(requestProviders?: Provider[]): { container: Container; routes: CompiledRoute[] };
}

export const createApplicationContext = (
  rootModule: Constructor,
  options: ApplicationContextOptions = {},
): ApplicationContext => {
  const graph = flattenImports(rootModule);
  const controllers = Array.from(new Set(graph.flatMap((module) => module.controllers)));
  const providers = new Map<InjectionToken, Provider>();
  [...graph.flatMap((module) => [...module.providers, ...controllers]), ...(options.overrides ?? [])]
    .map(toProvider)
    .forEach((provider) => providers.set(provider.token, provider));

  const container = new Container({ providers: Array.from(providers.values()) });
  const routes = compileControllerRoutes(controllers);
  return {
    container,
    routes,
    beginRequest: (requestProviders = []) => ({ container: container.beginRequest(requestProviders), routes }),
  };
};

// depth first: a module comes after everything it imports, so its providers win
const flattenImports = (
  moduleType: Constructor,
  seen = new Map<Constructor, Required<ModuleOptions>>(),
): Required<ModuleOptions>[] => {
  if (!seen.has(moduleType)) {
    const options = getModuleOptions(moduleType);
    options.imports.forEach((imported) => flattenImports(imported, seen));
    seen.set(moduleType, options);
  }
  return Array.from(seen.values());
};

const toProvider = (provider: ProviderLike): Provider => {
  if (typeof provider !== "function") {
    return provider;
  }
  if (!isInjectable(provider)) {
    throw new Error(`${provider.name} is listed as a provider but has no @Injectable() or @Controller()`);
  }
  return provideFromClass(provider);
};
