import { ReferentialAction, registerColumn, registerRelation } from "./metadata";

/**
 * Owning side of a reference. Adds a numeric `<property>Id` column whose value
 * must match a row of the target; deletes of that row cascade or are refused.
 */
export const ManyToOne =
  (target: () => Function, options: { onDelete?: ReferentialAction } = {}): PropertyDecorator =>
  (prototype, propertyKey) => {
    const entity = prototype.constructor;
    const joinColumn = `${propertyKey.toString()}Id`;
    registerColumn(entity, joinColumn, { type: "number", nullable: false, updatable: true });
    registerRelation(entity, {
      kind: "many-to-one",
      propertyKey: propertyKey.toString(),
      target,
      joinColumn,
      onDelete: options.onDelete ?? "restrict",
    });
  };

/** Inverse side, loaded only through `relations`/`prefetch`; stores nothing itself. */
export const OneToMany =
  (target: () => Function, inverseSide: string): PropertyDecorator =>
  (prototype, propertyKey) => {
    registerRelation(prototype.constructor, {
      kind: "one-to-many",
      propertyKey: propertyKey.toString(),
      target,
      inverseSide,
    });
  };
