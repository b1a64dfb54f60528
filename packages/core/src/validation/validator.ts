import { ValidationIssue } from "./schema";

export type ValidationError = ValidationIssue;

export type ValidationOutcome<T> = { success: true; data: T } | { success: false; errors: ValidationError[] };

/** Groups issues as `{ field: [messages] }`; root-level issues land under `non_field_errors`. */
export const toFieldMessages = (errors: ValidationError[]): Record<string, string[]> =>
  errors.reduce<Record<string, string[]>>((report, error) => {
    const field = error.path || "non_field_errors";
    (report[field] ??= []).push(error.message);
    return report;
  }, {});

export class ValidationException extends Error {
  constructor(public readonly errors: ValidationError[]) {
    super("Validation failed");
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get fields(): Record<string, string[]> {
    return toFieldMessages(this.errors);
  }
}
