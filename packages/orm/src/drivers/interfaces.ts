export type Row = Record<string, unknown>;

export interface ColumnSchema {
  name: string;
  type: string;
  nullable: boolean;
  length?: number;
}

export interface ForeignKeySchema {
  column: string;
  referencedTable: string;
  referencedColumn: string;
  onDelete: "cascade" | "restrict";
}

/** Table layout recorded by `ensureTable`, kept alongside the rows it describes. */
export interface TableSchema {
  name: string;
  columns: ColumnSchema[];
  primaryKey: string;
  uniqueColumns: string[];
  foreignKeys: ForeignKeySchema[];
}

export interface DatabaseDriver {
  init(): Promise<void>;
  ensureTable(schema: TableSchema): Promise<void>;
  readTable(name: string): Promise<Row[]>;
  writeTable(name: string, rows: Row[]): Promise<void>;
  getSchema(name: string): Promise<TableSchema | undefined>;
  /** Next value of the table's integer sequence; values are never reused. */
  nextId(name: string): Promise<number>;
  beginTransaction(): Promise<TransactionDriver>;
}

export interface TransactionDriver extends DatabaseDriver {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface PersistedState {
  tables: Record<string, Row[]>;
  schemas: Record<string, TableSchema>;
  sequences: Record<string, number>;
}

/** Tables and sequences a transaction touched; only these are written back on commit. */
export interface ChangeSet {
  tables: Set<string>;
  sequences: Set<string>;
}
