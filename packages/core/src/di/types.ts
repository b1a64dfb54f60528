import type { Container } from "./container";

export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * A symbol that remembers the type it resolves to, so
 * `container.resolve(LOGGER)` is typed without a cast.
 */
export type TokenSymbol<T> = symbol & { readonly __resolves?: T };

export type InjectionToken<T = unknown> = Constructor<T> | TokenSymbol<T>;

export const createToken = <T>(description: string): TokenSymbol<T> =>
  Symbol.for(description) as TokenSymbol<T>;

/** Request-scoped providers resolve only inside `Container.beginRequest`. */
export type Scope = "singleton" | "request";

export interface Provider<T = unknown> {
  token: InjectionToken<T>;
  useClass?: Constructor<T>;
  useFactory?: (context: ResolveContext) => T;
  useValue?: T;
  deps?: InjectionToken[];
  scope?: Scope;
}

export interface ResolveContext {
  container: Container;
}

/** A bare class is shorthand for `provideFromClass(Class)`. */
export type ProviderLike = Provider | Constructor;
