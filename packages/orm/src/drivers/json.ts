import { type Stats, promises as fs } from "node:fs";
import path from "node:path";
import { advanceSequence, applyChanges, openTransaction, cloneRows, cloneState, emptyState } from "./base";
import {
  ColumnSchema,
  DatabaseDriver,
  ForeignKeySchema,
  PersistedState,
  Row,
  TableSchema,
  TransactionDriver,
} from "./interfaces";

export interface JsonDriverOptions {
  filePath?: string;
}

/**
 * Keeps the state in a JSON file that several processes (the server and the
 * CLI) may share. Every operation first reloads the file when another writer
 * replaced it; a transaction's commit merges only the tables it touched onto
 * that fresh state.
 */
export class JsonDatabaseDriver implements DatabaseDriver {
  private readonly filePath: string;
  protected state: PersistedState = emptyState();
  /** Identity of the file version `state` was loaded from or written as. */
  private version?: string;
  private mutex: Promise<void> = Promise.resolve();

  constructor(options: JsonDriverOptions = {}) {
    this.filePath = path.resolve(options.filePath ?? "catalog-data.json");
  }

  async init(): Promise<void> {
    await this.enqueue(async () => {
      if (!(await this.reload())) {
        this.state = emptyState();
        await this.persist();
      }
    });
  }

  async ensureTable(schema: TableSchema): Promise<void> {
    await this.mutate(() => {
      if (!this.state.tables[schema.name]) {
        this.state.tables[schema.name] = [];
      }
      this.state.schemas[schema.name] = schema;
    });
  }

  async readTable(name: string): Promise<Row[]> {
    return this.read(() => cloneRows(this.state.tables[name]));
  }

  async writeTable(name: string, rows: Row[]): Promise<void> {
    await this.mutate(() => {
      this.state.tables[name] = cloneRows(rows);
    });
  }

  async getSchema(name: string): Promise<TableSchema | undefined> {
    return this.read(() => this.state.schemas[name]);
  }

  async nextId(name: string): Promise<number> {
    return this.enqueue(async () => {
      await this.reload();
      const id = advanceSequence(this.state, name);
      await this.persist();
      return id;
    });
  }

  async beginTransaction(): Promise<TransactionDriver> {
    const snapshot = await this.read(() => cloneState(this.state));
    return openTransaction(snapshot, async (next, changes) => {
      await this.mutate(() => applyChanges(this.state, next, changes));
    });
  }

  private async read<T>(select: () => T): Promise<T> {
    return this.enqueue(async () => {
      await this.reload();
      return select();
    });
  }

  private async mutate(change: () => void): Promise<void> {
    await this.enqueue(async () => {
      await this.reload();
      change();
      await this.persist();
    });
  }

  /** Loads the file when it differs from the version in memory; false when there is no file. */
  private async reload(): Promise<boolean> {
    let stats: Stats;
    try {
      stats = await fs.stat(this.filePath);
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
    const version = versionOf(stats);
    if (version !== this.version) {
      this.state = parseState(await fs.readFile(this.filePath, "utf8"), this.filePath);
      this.version = version;
    }
    return true;
  }

  // written beside the target and renamed over it, so readers in other processes never see half a file
  private async persist(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const staging = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(staging, JSON.stringify(this.state, null, 2), "utf8");
    await fs.rename(staging, this.filePath);
    this.version = versionOf(await fs.stat(this.filePath));
  }

  private async enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutex.then(task);
    // a failed write must not block the ones queued after it
    this.mutex = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

const versionOf = (stats: Stats): string => `${stats.ino}:${stats.size}:${stats.mtimeMs}`;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseState = (content: string, filePath: string): PersistedState => {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed) || !isRecord(parsed.tables) || !isRecord(parsed.schemas)) {
    throw new Error(`Data file ${filePath} is not a valid catalog store`);
  }
  const state = emptyState();
  for (const [name, rows] of Object.entries(parsed.tables)) {
    if (!Array.isArray(rows) || !rows.every(isRecord)) {
      throw new Error(`Table ${name} in ${filePath} must be an array of rows`);
    }
    state.tables[name] = rows;
  }
  for (const [name, schema] of Object.entries(parsed.schemas)) {
    if (!isTableSchema(schema)) {
      throw new Error(`Schema ${name} in ${filePath} is malformed`);
    }
    state.schemas[name] = schema;
  }
  if (isRecord(parsed.sequences)) {
    for (const [name, value] of Object.entries(parsed.sequences)) {
      if (typeof value === "number") state.sequences[name] = value;
    }
  }
  return state;
};

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isColumn = (value: unknown): value is ColumnSchema =>
  isRecord(value) &&
  typeof value.name === "string" &&
  typeof value.type === "string" &&
  typeof value.nullable === "boolean" &&
  (value.length === undefined || typeof value.length === "number");

const isForeignKey = (value: unknown): value is ForeignKeySchema =>
  isRecord(value) &&
  typeof value.column === "string" &&
  typeof value.referencedTable === "string" &&
  typeof value.referencedColumn === "string" &&
  (value.onDelete === "cascade" || value.onDelete === "restrict");

const isTableSchema = (value: unknown): value is TableSchema =>
  isRecord(value) &&
  typeof value.name === "string" &&
  typeof value.primaryKey === "string" &&
  Array.isArray(value.columns) &&
  value.columns.every(isColumn) &&
  isStringArray(value.uniqueColumns) &&
  Array.isArray(value.foreignKeys) &&
  value.foreignKeys.every(isForeignKey);
