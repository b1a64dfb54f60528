/** Parses one environment variable; throws with a message naming `key`. */
export type EnvField<T> = (raw: string | undefined, key: string) => T;

export type InferEnv<T extends Record<string, EnvField<unknown>>> = {
  [K in keyof T]: ReturnType<T[K]>;
};

export interface EnvSchema<T extends Record<string, EnvField<unknown>>> {
  fields: T;
  parse(source?: Record<string, string | undefined>): InferEnv<T>;
}

/** Every invalid variable of one load, reported together. */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const defineEnvSchema = <T extends Record<string, EnvField<unknown>>>(fields: T): EnvSchema<T> => ({
  fields,
  parse: (source = process.env) => {
    const values: Record<string, unknown> = {};
    const problems: string[] = [];
    for (const key of Object.keys(fields)) {
      try {
        values[key] = fields[key](source[key], key);
      } catch (error) {
        problems.push(error instanceof Error ? error.message : String(error));
      }
    }
    if (problems.length) {
      throw new ConfigError(problems);
    }
    return values as InferEnv<T>;
  },
});

export const loadConfig = <T extends Record<string, EnvField<unknown>>>(
  schema: EnvSchema<T>,
  source?: Record<string, string | undefined>,
): InferEnv<T> => schema.parse(source);

// empty counts as unset, so `PORT=` in a .env file falls back to the default
const orDefault = (raw: string | undefined, key: string, fallback?: string): string => {
  if (raw !== undefined && raw !== "") {
    return raw;
  }
  if (fallback === undefined) {
    throw new Error(`Environment variable ${key} is required`);
  }
  return fallback;
};

export const env = {
  string:
    (options: { default?: string } = {}): EnvField<string> =>
    (raw, key) =>
      orDefault(raw, key, options.default),

  integer:
    (options: { default?: number; min?: number } = {}): EnvField<number> =>
    (raw, key) => {
      const value = Number(orDefault(raw, key, options.default?.toString()));
      if (!Number.isInteger(value)) {
        throw new Error(`Environment variable ${key} must be an integer`);
      }
      if (options.min !== undefined && value < options.min) {
        throw new Error(`Environment variable ${key} must be at least ${options.min}`);
      }
      return value;
    },

  oneOf:
    <T extends string>(choices: readonly T[], options: { default?: T } = {}): EnvField<T> =>
    (raw, key) => {
      const value = orDefault(raw, key, options.default);
      const match = choices.find((choice) => choice === value);
      if (match === undefined) {
        throw new Error(`Environment variable ${key} must be one of: ${choices.join(", ")}`);
      }
      return match;
    },
};
