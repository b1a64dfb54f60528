export type ConstraintKind = "not-null" | "max-length" | "unique" | "foreign-key" | "immutable";

/** Raised when a write would break a declared column or table constraint. */
export class ConstraintViolationError extends Error {
  constructor(
    readonly kind: ConstraintKind,
    readonly table: string,
    readonly columns: string[],
    message?: string,
  ) {
    super(message ?? `${kind} constraint violated on ${table}(${columns.join(", ")})`);
    this.name = "ConstraintViolationError";
  }
}
