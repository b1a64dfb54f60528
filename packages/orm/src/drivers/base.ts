import { ChangeSet, PersistedState, Row, TransactionDriver } from "./interfaces";

export const emptyState = (): PersistedState => ({ tables: {}, schemas: {}, sequences: {} });

export const cloneState = (state: PersistedState): PersistedState => structuredClone(state);

export const cloneRows = (rows: Row[] | undefined): Row[] => (rows ?? []).map((row) => ({ ...row }));

export const advanceSequence = (state: PersistedState, name: string): number => {
  const next = (state.sequences[name] ?? 0) + 1;
  state.sequences[name] = next;
  return next;
};

/** Copies the touched tables and sequences of `next` onto `target`. */
export const applyChanges = (target: PersistedState, next: PersistedState, changes: ChangeSet): void => {
  changes.tables.forEach((name) => {
    target.tables[name] = next.tables[name] ?? [];
    if (next.schemas[name]) {
      target.schemas[name] = next.schemas[name];
    }
  });
  changes.sequences.forEach((name) => {
    target.sequences[name] = Math.max(target.sequences[name] ?? 0, next.sequences[name] ?? 0);
  });
};

/**
 * Runs against a private copy of `snapshot`. Nothing is visible outside until
 * `commit`, which hands the working state and its change set to `commitFn`.
 */
export const openTransaction = (
  snapshot: PersistedState,
  commitFn: (next: PersistedState, changes: ChangeSet) => Promise<void>,
): TransactionDriver => {
  let open = true;
  const assertOpen = () => {
    if (!open) throw new Error("Transaction already committed or rolled back");
  };
  const working = cloneState(snapshot);
  const changes: ChangeSet = { tables: new Set(), sequences: new Set() };
  return {
    async init() {
      assertOpen();
    },
    async ensureTable(schema) {
      assertOpen();
      if (!working.tables[schema.name]) {
        working.tables[schema.name] = [];
      }
      working.schemas[schema.name] = schema;
      changes.tables.add(schema.name);
    },
    async readTable(name) {
      assertOpen();
      return cloneRows(working.tables[name]);
    },
    async writeTable(name, rows) {
      assertOpen();
      working.tables[name] = cloneRows(rows);
      changes.tables.add(name);
    },
    async getSchema(name) {
      assertOpen();
      return working.schemas[name];
    },
    async nextId(name) {
      assertOpen();
      changes.sequences.add(name);
      return advanceSequence(working, name);
    },
    async beginTransaction() {
      throw new Error("Nested transactions are not supported");
    },
    async commit() {
      assertOpen();
      open = false;
      await commitFn(working, changes);
    },
    async rollback() {
      assertOpen();
      open = false;
    },
  };
};
