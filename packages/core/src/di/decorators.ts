import { Constructor, InjectionToken, Provider } from "./types";

const injectables = new WeakSet<Constructor>();
const constructorTokens = new WeakMap<Constructor, InjectionToken[]>();

/** Marks a class the container may build; its constructor parameters need `@Inject`. */
export const Injectable = (): ClassDecorator => (target) => {
  markInjectable(target as unknown as Constructor);
};

/**
 * Names the token a constructor parameter resolves to. Parameter types are
 * not emitted, so every parameter of an injectable class needs one.
 */
export const Inject =
  (token: InjectionToken): ParameterDecorator =>
  (target, _propertyKey, parameterIndex) => {
    const ctor = (typeof target === "function" ? target : target.constructor) as Constructor;
    const tokens = constructorTokens.get(ctor) ?? [];
    tokens[parameterIndex] = token;
    constructorTokens.set(ctor, tokens);
  };

export const markInjectable = (target: Constructor): void => {
  injectables.add(target);
};

export const isInjectable = (target: Constructor): boolean => injectables.has(target);

/** Singleton provider for `target`, its dependencies read from `@Inject` metadata. */
export const provideFromClass = <T>(target: Constructor<T>): Provider<T> => ({
  token: target,
  useClass: target,
  deps: constructorDependencies(target),
});

const constructorDependencies = (target: Constructor): InjectionToken[] => {
  const tokens = constructorTokens.get(target) ?? [];
  const missing = Array.from({ length: target.length }, (_, index) => index).filter((index) => !tokens[index]);
  if (missing.length) {
    throw new Error(
      `${target.name} takes ${target.length} constructor arguments; add @Inject() to parameter ${missing.join(", ")}`,
    );
  }
  return tokens.slice(0, target.length);
};
