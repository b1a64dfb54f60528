import { ColumnOptions, registerColumn, registerEntity } from "./metadata";

/** Table name defaults to the lower-cased class name. */
export const Entity =
  (options: { table?: string } = {}): ClassDecorator =>
  (target) => {
    registerEntity(target, options.table);
  };

/** A `string`, non-null, updatable column unless `options` say otherwise. */
export const Column =
  (options: ColumnOptions = {}): PropertyDecorator =>
  (prototype, propertyKey) => {
    registerColumn(prototype.constructor, propertyKey.toString(), {
      type: "string",
      nullable: false,
      updatable: true,
      ...options,
    });
  };

/** Integer primary key assigned from a per-table counter on insert. */
export const PrimaryGeneratedColumn = (): PropertyDecorator =>
  Column({ type: "number", primary: true, generated: "increment", updatable: false });

export { ManyToOne, OneToMany } from "./relations";
