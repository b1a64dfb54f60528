export type ColumnType = "string" | "text" | "number" | "boolean" | "date" | "uuid" | "decimal";

/** What deleting a referenced row does to the rows pointing at it. */
export type ReferentialAction = "cascade" | "restrict";

export interface ColumnOptions {
  type?: ColumnType;
  primary?: boolean;
  nullable?: boolean;
  /** Static value, or a factory evaluated per insert. */
  default?: unknown;
  unique?: boolean;
  /** Maximum length of string values. */
  length?: number;
  generated?: "increment" | "uuid";
  /** When false the stored value can never change after insert. */
  updatable?: boolean;
}

export interface ColumnMetadata {
  propertyKey: string;
  options: ColumnOptions;
}

export interface ManyToOneRelation {
  kind: "many-to-one";
  propertyKey: string;
  target: () => Function;
  /** Column holding the referenced row's primary key. */
  joinColumn: string;
  onDelete: ReferentialAction;
}

export interface OneToManyRelation {
  kind: "one-to-many";
  propertyKey: string;
  target: () => Function;
  /** The ManyToOne property on the target that points back here. */
  inverseSide: string;
}

export type RelationMetadata = ManyToOneRelation | OneToManyRelation;

export interface EntityMetadata {
  target: Function;
  tableName: string;
  columns: ColumnMetadata[];
  relations: RelationMetadata[];
}

const entities = new Map<Function, EntityMetadata>();

export const registerEntity = (target: Function, tableName?: string): EntityMetadata => {
  let metadata = entities.get(target);
  if (!metadata) {
    metadata = { target, tableName: target.name.toLowerCase(), columns: [], relations: [] };
    entities.set(target, metadata);
  }
  if (tableName) {
    metadata.tableName = tableName;
  }
  return metadata;
};

export const registerColumn = (target: Function, propertyKey: string, options: ColumnOptions): void => {
  registerEntity(target).columns.push({ propertyKey, options });
};

export const registerRelation = (target: Function, relation: RelationMetadata): void => {
  registerEntity(target).relations.push(relation);
};

export const getEntityMetadata = (target: Function): EntityMetadata => {
  const metadata = entities.get(target);
  if (!metadata) {
    throw new Error(`${target.name} is not decorated with @Entity()`);
  }
  return metadata;
};

export const listEntities = (): EntityMetadata[] => Array.from(entities.values());

/** Single-column primary keys only. */
export const primaryKeyOf = (metadata: EntityMetadata): string => {
  const primary = metadata.columns.filter((column) => column.options.primary);
  if (primary.length !== 1) {
    throw new Error(`${metadata.tableName} must declare exactly one primary column`);
  }
  return primary[0].propertyKey;
};

export const manyToOneRelations = (metadata: EntityMetadata): ManyToOneRelation[] =>
  metadata.relations.filter((relation): relation is ManyToOneRelation => relation.kind === "many-to-one");

export const findRelation = (target: Function, propertyKey: string): RelationMetadata | undefined =>
  getEntityMetadata(target).relations.find((relation) => relation.propertyKey === propertyKey);
