const OPERATOR = Symbol("vitrine.orm.operator");

export interface ComparisonOperator<V> {
  readonly [OPERATOR]: true;
  op: "in";
  values: readonly V[];
}

export type ConditionValue<V> = V | ComparisonOperator<V>;

export const In = <V>(values: readonly V[]): ComparisonOperator<V> => ({ [OPERATOR]: true, op: "in", values });

export type WhereCondition<T> = { [K in keyof T]?: ConditionValue<T[K]> };

export const isOperator = (value: unknown): value is ComparisonOperator<unknown> =>
  typeof value === "object" && value !== null && OPERATOR in value;

const matchesCondition = (actual: unknown, condition: unknown): boolean => {
  if (!isOperator(condition)) {
    return actual === condition;
  }
  return condition.values.includes(actual);
};

/** `undefined` criteria are ignored, so optional filters can be passed straight through. */
export const matchesWhere = (row: Record<string, unknown>, where: object | undefined): boolean =>
  Object.entries(where ?? {}).every(([field, condition]) =>
    condition === undefined ? true : matchesCondition(row[field], condition),
  );

export interface OrderClause<T> {
  field: keyof T & string;
  direction?: "asc" | "desc";
}

export const compareValues = (left: unknown, right: unknown): number => {
  if (left === right) return 0;
  if (left === undefined || left === null) return -1;
  if (right === undefined || right === null) return 1;
  if (typeof left === "number" && typeof right === "number") return left - right;
  return String(left) < String(right) ? -1 : 1;
};
