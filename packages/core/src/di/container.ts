import { InjectionToken, Provider } from "./types";

export interface ContainerOptions {
  providers?: Provider[];
  parent?: Container;
}

const describeToken = (token: InjectionToken): string =>
  typeof token === "symbol" ? (token.description ?? token.toString()) : token.name;

export class Container {
  private readonly providers = new Map<InjectionToken, Provider>();
  private readonly singletons: Map<InjectionToken, unknown>;
  /** Present only on containers created by `beginRequest`. */
  private readonly requestInstances?: Map<InjectionToken, unknown>;
  private readonly parent?: Container;

  constructor(options: ContainerOptions = {}) {
    this.parent = options.parent;
    this.singletons = options.parent ? options.parent.singletons : new Map();
    this.requestInstances = options.parent ? new Map() : undefined;
    options.providers?.forEach((provider) => this.register(provider));
  }

  register(provider: Provider): void {
    this.providers.set(provider.token, provider);
    this.singletons.delete(provider.token);
  }

  has(token: InjectionToken): boolean {
    return this.lookup(token) !== undefined;
  }

  /** Child container that shares singletons and owns its request-scoped instances. */
  beginRequest(requestProviders: Provider[] = []): Container {
    return new Container({ parent: this, providers: requestProviders });
  }

  resolve<T>(token: InjectionToken<T>): T {
    const provider = this.lookup(token);
    if (!provider) {
      throw new Error(`No provider found for token ${describeToken(token)}`);
    }
    if (provider.scope !== "request") {
      return this.memoize(this.singletons, provider);
    }
    if (!this.requestInstances) {
      throw new Error(`Token ${describeToken(token)} is request scoped; resolve it inside beginRequest()`);
    }
    return this.memoize(this.requestInstances, provider);
  }

  private lookup<T>(token: InjectionToken<T>): Provider<T> | undefined {
    const local = this.providers.get(token) as Provider<T> | undefined;
    return local ?? this.parent?.lookup(token);
  }

  private memoize<T>(instances: Map<InjectionToken, unknown>, provider: Provider<T>): T {
    if (instances.has(provider.token)) {
      return instances.get(provider.token) as T;
    }
    const instance = this.build(provider);
    instances.set(provider.token, instance);
    return instance;
  }

  private build<T>(provider: Provider<T>): T {
    if ("useValue" in provider) {
      return provider.useValue as T;
    }
    if (provider.useFactory) {
      return provider.useFactory({ container: this });
    }
    if (provider.useClass) {
      return new provider.useClass(...(provider.deps ?? []).map((dep) => this.resolve(dep)));
    }
    throw new Error(`Provider for ${describeToken(provider.token)} has no useValue, useFactory or useClass`);
  }
}
