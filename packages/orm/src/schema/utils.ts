import { TableSchema } from "../drivers/interfaces";
import { EntityMetadata, getEntityMetadata, manyToOneRelations, primaryKeyOf } from "../metadata";

export const buildTableSchema = (metadata: EntityMetadata): TableSchema => ({
  name: metadata.tableName,
  columns: metadata.columns.map(({ propertyKey, options }) => ({
    name: propertyKey,
    type: options.type ?? "string",
    nullable: options.nullable ?? false,
    ...(options.length === undefined ? {} : { length: options.length }),
  })),
  primaryKey: primaryKeyOf(metadata),
  uniqueColumns: metadata.columns.filter((column) => column.options.unique).map((column) => column.propertyKey),
  foreignKeys: manyToOneRelations(metadata).map((relation) => {
    const referenced = getEntityMetadata(relation.target());
    return {
      column: relation.joinColumn,
      referencedTable: referenced.tableName,
      referencedColumn: primaryKeyOf(referenced),
      onDelete: relation.onDelete,
    };
  }),
});
