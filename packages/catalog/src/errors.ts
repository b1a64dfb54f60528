import { ValidationException, type ValidationIssue } from "@vitrine/core";

export type FieldError =
  | { kind: "invalid-field"; field: string; reason: string }
  | { kind: "invalid-reference"; field: string; reason: string };

export const toFieldError = (issue: ValidationIssue): FieldError =>
  issue.code === "invalid_reference"
    ? { kind: "invalid-reference", field: issue.path, reason: issue.message }
    : { kind: "invalid-field", field: issue.path, reason: issue.message };

/** Every failed rule of one catalog write; rendered as a 400 field report. */
export class CatalogValidationError extends ValidationException {
  readonly fieldErrors: FieldError[];

  constructor(errors: ValidationIssue[]) {
    super(errors);
    this.name = "CatalogValidationError";
    this.fieldErrors = errors.map(toFieldError);
  }
}
