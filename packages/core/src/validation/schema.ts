export type IssueCode = "required" | "invalid" | "invalid_reference";

export interface ValidationIssue {
  path: string;
  message: string;
  code?: IssueCode;
}

export interface ParseResult<T> {
  success: boolean;
  data?: T;
  issues?: ValidationIssue[];
}

export interface Schema<T> {
  parse(value: unknown, path?: string[]): ParseResult<T>;
}

export const REQUIRED_MESSAGE = "This field is required.";

const success = <T>(data: T): ParseResult<T> => ({ success: true, data });

const failure = (path: string[], message: string, code: IssueCode = "invalid"): ParseResult<never> => ({
  success: false,
  issues: [{ path: normalizePath(path), message, code }],
});

const normalizePath = (path: string[]): string => (path.length ? path.join(".") : "");

const isMissing = (value: unknown) => value === undefined || value === null;

export interface StringOptions {
  minLength?: number;
  maxLength?: number;
  transform?: (value: string) => string;
  messages?: {
    type?: string;
    minLength?: string;
    maxLength?: string;
  };
}

/** Lengths count code points, so an emoji is one character. */
export const string = (options: StringOptions = {}): Schema<string> => ({
  parse: (value, path = []) => {
    if (isMissing(value)) {
      return failure(path, REQUIRED_MESSAGE, "required");
    }
    if (typeof value !== "string") {
      return failure(path, options.messages?.type ?? "Expected string");
    }
    const transformed = options.transform ? options.transform(value) : value;
    const length = [...transformed].length;
    if (options.minLength !== undefined && length < options.minLength) {
      return failure(path, options.messages?.minLength ?? `Minimum length is ${options.minLength}`);
    }
    if (options.maxLength !== undefined && length > options.maxLength) {
      return failure(path, options.messages?.maxLength ?? `Maximum length is ${options.maxLength}`);
    }
    return success(transformed);
  },
});

export interface NumberOptions {
  min?: number;
  max?: number;
  integer?: boolean;
  /** Accept numeric strings, as sent by form posts. */
  coerce?: boolean;
  messages?: {
    type?: string;
    min?: string;
    max?: string;
  };
}

export const number = (options: NumberOptions = {}): Schema<number> => ({
  parse: (value, path = []) => {
    if (isMissing(value)) {
      return failure(path, REQUIRED_MESSAGE, "required");
    }
    const candidate =
      options.coerce && typeof value === "string" && value.trim() !== "" ? Number(value.trim()) : value;
    if (typeof candidate !== "number" || Number.isNaN(candidate)) {
      return failure(path, options.messages?.type ?? "Expected number");
    }
    if (options.integer && !Number.isInteger(candidate)) {
      return failure(path, options.messages?.type ?? "Expected integer");
    }
    if (options.min !== undefined && candidate < options.min) {
      return failure(path, options.messages?.min ?? `Minimum value is ${options.min}`);
    }
    if (options.max !== undefined && candidate > options.max) {
      return failure(path, options.messages?.max ?? `Maximum value is ${options.max}`);
    }
    return success(candidate);
  },
});

export interface NumericStringOptions {
  maxLength?: number;
  positive?: boolean;
  messages?: {
    type?: string;
    positive?: string;
    maxLength?: string;
  };
}

/**
 * A decimal kept as its submitted text. The text must parse as a finite
 * number; `positive` rejects zero and below.
 */
export const numericString = (options: NumericStringOptions = {}): Schema<string> => ({
  parse: (value, path = []) => {
    if (isMissing(value)) {
      return failure(path, REQUIRED_MESSAGE, "required");
    }
    const text = typeof value === "number" ? String(value) : value;
    if (typeof text !== "string") {
      return failure(path, options.messages?.type ?? "Expected numeric string");
    }
    if (options.maxLength !== undefined && text.length > options.maxLength) {
      return failure(path, options.messages?.maxLength ?? `Maximum length is ${options.maxLength}`);
    }
    const parsed = text.trim() === "" ? Number.NaN : Number(text);
    if (!Number.isFinite(parsed)) {
      return failure(path, options.messages?.type ?? "Expected numeric string");
    }
    if (options.positive && parsed <= 0) {
      return failure(path, options.messages?.positive ?? "Expected a positive number");
    }
    return success(text);
  },
});

export const boolean = (): Schema<boolean> => ({
  parse: (value, path = []) => {
    if (typeof value === "boolean") {
      return success(value);
    }
    if (typeof value === "string") {
      if (["true", "1", "yes", "on"].includes(value.toLowerCase())) {
        return success(true);
      }
      if (["false", "0", "no", "off"].includes(value.toLowerCase())) {
        return success(false);
      }
    }
    if (isMissing(value)) {
      return failure(path, REQUIRED_MESSAGE, "required");
    }
    return failure(path, "Must be a valid boolean.");
  },
});

/** Empty input yields `defaultValue`, so a default makes the field's type non-optional. */
export function optional<T>(schema: Schema<T>, defaultValue: T): Schema<T>;
export function optional<T>(schema: Schema<T>): Schema<T | undefined>;
export function optional<T>(schema: Schema<T>, defaultValue?: T): Schema<T | undefined> {
  return {
    parse: (value, path = []) => {
      if (value === undefined || value === null || value === "") {
        return success(defaultValue);
      }
      return schema.parse(value, path);
    },
  };
}
