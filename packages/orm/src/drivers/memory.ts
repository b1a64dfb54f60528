import { advanceSequence, applyChanges, openTransaction, cloneRows, cloneState, emptyState } from "./base";
import { DatabaseDriver, PersistedState, Row, TableSchema, TransactionDriver } from "./interfaces";

export class MemoryDatabaseDriver implements DatabaseDriver {
  protected state: PersistedState = emptyState();

  async init(): Promise<void> {
    // nothing to load
  }

  async ensureTable(schema: TableSchema): Promise<void> {
    if (!this.state.tables[schema.name]) {
      this.state.tables[schema.name] = [];
    }
    this.state.schemas[schema.name] = schema;
  }

  async readTable(name: string): Promise<Row[]> {
    return cloneRows(this.state.tables[name]);
  }

  async writeTable(name: string, rows: Row[]): Promise<void> {
    this.state.tables[name] = cloneRows(rows);
  }

  async getSchema(name: string): Promise<TableSchema | undefined> {
    return this.state.schemas[name];
  }

  async nextId(name: string): Promise<number> {
    return advanceSequence(this.state, name);
  }

  async beginTransaction(): Promise<TransactionDriver> {
    return openTransaction(cloneState(this.state), async (next, changes) => {
      applyChanges(this.state, next, changes);
    });
  }
}
