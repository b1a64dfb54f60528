import { ParseResult, Schema, ValidationIssue } from "./schema";
import { ValidationOutcome } from "./validator";

/**
 * One field check. Rules may be async (reference lookups) and must not
 * throw for bad input: they report it as issues.
 */
export interface Rule<T> {
  check(value: unknown, field: string): ParseResult<T> | Promise<ParseResult<T>>;
}

export type RuleSet = Record<string, Rule<unknown>>;

export type InferRules<TRules extends RuleSet> = {
  [K in keyof TRules]: TRules[K] extends Rule<infer V> ? V : never;
};

export const field = <T>(schema: Schema<T>): Rule<T> => ({
  check: (value, name) => schema.parse(value, [name]),
});

/**
 * Parses the value with `schema`, then asks `exists` whether the id it names
 * is present. A well-formed id that resolves to nothing is reported with the
 * `invalid_reference` code.
 */
export const reference = <T>(
  schema: Schema<T>,
  exists: (value: T) => Promise<boolean> | boolean,
  message: string,
): Rule<T> => ({
  check: async (value, name) => {
    const parsed = schema.parse(value, [name]);
    if (!parsed.success || parsed.data === undefined) {
      return parsed;
    }
    if (!(await exists(parsed.data))) {
      return {
        success: false,
        issues: [{ path: name, message, code: "invalid_reference" }],
      };
    }
    return parsed;
  },
});

/**
 * Runs every rule in declaration order and collects all issues; a failing
 * rule never stops the ones after it.
 */
export const evaluateRules = async <TRules extends RuleSet>(
  rules: TRules,
  input: Record<string, unknown>,
): Promise<ValidationOutcome<InferRules<TRules>>> => {
  const output: Record<string, unknown> = {};
  const issues: ValidationIssue[] = [];
  for (const name of Object.keys(rules)) {
    const result = await rules[name].check(input[name], name);
    if (result.success) {
      output[name] = result.data;
    } else {
      issues.push(...(result.issues ?? [{ path: name, message: "Invalid value", code: "invalid" }]));
    }
  }
  if (issues.length) {
    return { success: false, errors: issues };
  }
  return { success: true, data: output as InferRules<TRules> };
};
