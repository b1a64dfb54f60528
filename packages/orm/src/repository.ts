import { randomUUID } from "node:crypto";
import { DatabaseDriver, Row } from "./drivers/interfaces";
import { ConstraintViolationError } from "./errors";
import {
  EntityMetadata,
  ManyToOneRelation,
  OneToManyRelation,
  findRelation,
  getEntityMetadata,
  listEntities,
  manyToOneRelations,
  primaryKeyOf,
} from "./metadata";
import { In, OrderClause, WhereCondition, compareValues, matchesWhere } from "./query/criteria";

export interface FindOptions<T> {
  where?: WhereCondition<T>;
  order?: OrderClause<T>[];
  limit?: number;
  /** Relation paths to prefetch, dotted for nested relations (`products.images`). */
  relations?: string[];
}

/** Resolves the repository of a related entity inside the same driver scope. */
export type RelatedResolver = (entity: Function) => Repository<object>;

type Criteria = Record<string, unknown>;

export class Repository<T extends object> {
  constructor(
    private readonly metadata: EntityMetadata,
    private readonly driver: DatabaseDriver,
    private readonly factory: () => T,
    private readonly resolveRelated: RelatedResolver,
  ) {}

  get tableName(): string {
    return this.metadata.tableName;
  }

  create(initial: Partial<T> = {}): T {
    return Object.assign(this.factory(), initial);
  }

  /**
   * Inserts the entity when its primary key is unset, updates it otherwise.
   * Generated and default values are written back onto `entity`.
   */
  async save(entity: T): Promise<T> {
    const rows = await this.driver.readTable(this.metadata.tableName);
    const primary = primaryKeyOf(this.metadata);
    const plain = this.toPlain(entity);
    const id = plain[primary];
    const index = id === undefined || id === null ? -1 : rows.findIndex((row) => row[primary] === id);

    if (index >= 0) {
      this.ensureImmutableColumns(rows[index], plain);
    } else {
      await this.applyInsertValues(plain, rows);
    }

    this.ensureNotNull(plain);
    this.ensureLength(plain);
    this.ensureUnique(plain, rows, index);
    await this.ensureReferences(plain);

    if (index >= 0) {
      rows[index] = plain;
    } else {
      rows.push(plain);
    }
    await this.driver.writeTable(this.metadata.tableName, rows);
    this.metadata.columns.forEach((column) => {
      Reflect.set(entity, column.propertyKey, plain[column.propertyKey]);
    });
    return entity;
  }

  async find(options: FindOptions<T> = {}): Promise<T[]> {
    return this.findBy(options.where ?? {}, options);
  }

  async findOne(options: FindOptions<T> = {}): Promise<T | null> {
    const [first] = await this.find({ ...options, limit: 1 });
    return first ?? null;
  }

  async exists(where: WhereCondition<T>): Promise<boolean> {
    const rows = await this.driver.readTable(this.metadata.tableName);
    return rows.some((row) => matchesWhere(row, where));
  }

  async count(where: WhereCondition<T> = {}): Promise<number> {
    const rows = await this.driver.readTable(this.metadata.tableName);
    return rows.filter((row) => matchesWhere(row, where)).length;
  }

  /**
   * Removes matching rows. Rows that reference them are removed first when
   * their foreign key cascades; otherwise the delete is refused.
   */
  async delete(where: WhereCondition<T>): Promise<number> {
    return this.deleteBy(where);
  }

  /** Loads `relations` onto already materialized entities in one query per relation. */
  async prefetch(entities: T[], relations: string[]): Promise<T[]> {
    if (!entities.length) return entities;
    for (const [property, nested] of groupRelations(relations).entries()) {
      const relation = findRelation(this.metadata.target, property);
      if (!relation) {
        throw new Error(`Unknown relation ${property} on ${this.metadata.tableName}`);
      }
      if (relation.kind === "many-to-one") {
        await this.loadManyToOne(entities, relation, nested);
      } else {
        await this.loadOneToMany(entities, relation, nested);
      }
    }
    return entities;
  }

  private async findBy(criteria: object, options: Omit<FindOptions<T>, "where">): Promise<T[]> {
    const rows = await this.driver.readTable(this.metadata.tableName);
    const primary = primaryKeyOf(this.metadata);
    const order: Array<{ field: string; direction?: "asc" | "desc" }> = options.order?.length
      ? options.order
      : [{ field: primary, direction: "asc" }];
    const matched = rows
      .filter((row) => matchesWhere(row, criteria))
      .sort((left, right) => {
        for (const clause of order) {
          const result = compareValues(left[clause.field], right[clause.field]);
          if (result !== 0) return clause.direction === "desc" ? -result : result;
        }
        return 0;
      });
    const limited = options.limit === undefined ? matched : matched.slice(0, options.limit);
    const entities = limited.map((row) => this.materialize(row));
    return options.relations?.length ? this.prefetch(entities, options.relations) : entities;
  }

  private async deleteBy(criteria: object): Promise<number> {
    const rows = await this.driver.readTable(this.metadata.tableName);
    const removed = rows.filter((row) => matchesWhere(row, criteria));
    if (!removed.length) return 0;
    const primary = primaryKeyOf(this.metadata);
    const removedIds = removed.map((row) => row[primary]);

    for (const dependent of listEntities()) {
      for (const relation of manyToOneRelations(dependent)) {
        if (relation.target() !== this.metadata.target) continue;
        const related = this.resolveRelated(dependent.target);
        const references: Criteria = { [relation.joinColumn]: In(removedIds) };
        if (relation.onDelete === "cascade") {
          await related.deleteBy(references);
        } else if (await related.exists(references)) {
          throw new ConstraintViolationError(
            "foreign-key",
            dependent.tableName,
            [relation.joinColumn],
            `${this.metadata.tableName} rows are still referenced by ${dependent.tableName}`,
          );
        }
      }
    }

    // dependents may live in this same table, so re-read before writing
    const remaining = await this.driver.readTable(this.metadata.tableName);
    await this.driver.writeTable(
      this.metadata.tableName,
      remaining.filter((row) => !removedIds.includes(row[primary])),
    );
    return removed.length;
  }

  private async loadManyToOne(entities: T[], relation: ManyToOneRelation, nested: string[]) {
    const target = relation.target();
    const targetPrimary = primaryKeyOf(getEntityMetadata(target));
    const ids = unique(entities.map((entity) => Reflect.get(entity, relation.joinColumn)));
    const related = ids.length
      ? await this.resolveRelated(target).findBy({ [targetPrimary]: In(ids) }, { relations: nested })
      : [];
    const byId = new Map(related.map((item) => [Reflect.get(item, targetPrimary), item]));
    entities.forEach((entity) => {
      Reflect.set(entity, relation.propertyKey, byId.get(Reflect.get(entity, relation.joinColumn)) ?? null);
    });
  }

  private async loadOneToMany(entities: T[], relation: OneToManyRelation, nested: string[]) {
    const target = relation.target();
    const inverse = findRelation(target, relation.inverseSide);
    if (!inverse || inverse.kind !== "many-to-one") {
      throw new Error(`OneToMany ${relation.propertyKey} needs a ManyToOne ${relation.inverseSide} on the target`);
    }
    const ownerPrimary = primaryKeyOf(this.metadata);
    const ownerIds = unique(entities.map((entity) => Reflect.get(entity, ownerPrimary)));
    const children = ownerIds.length
      ? await this.resolveRelated(target).findBy({ [inverse.joinColumn]: In(ownerIds) }, { relations: nested })
      : [];
    const grouped = new Map<unknown, object[]>();
    children.forEach((child) => {
      const ownerId = Reflect.get(child, inverse.joinColumn);
      grouped.set(ownerId, [...(grouped.get(ownerId) ?? []), child]);
    });
    entities.forEach((entity) => {
      Reflect.set(entity, relation.propertyKey, grouped.get(Reflect.get(entity, ownerPrimary)) ?? []);
    });
  }

  private async applyInsertValues(plain: Row, rows: Row[]): Promise<void> {
    for (const column of this.metadata.columns) {
      const key = column.propertyKey;
      if (plain[key] !== undefined && plain[key] !== null) continue;
      if (column.options.generated === "increment") {
        plain[key] = await this.nextFreeId(key, rows);
      } else if (column.options.generated === "uuid") {
        plain[key] = randomUUID();
      } else if (column.options.default !== undefined) {
        const fallback = column.options.default;
        plain[key] = typeof fallback === "function" ? fallback() : fallback;
      } else if (column.options.nullable) {
        plain[key] = null;
      }
    }
  }

  // sequences can lag behind rows written before they existed
  private async nextFreeId(column: string, rows: Row[]): Promise<number> {
    const taken = new Set(rows.map((row) => row[column]));
    let candidate = await this.driver.nextId(this.metadata.tableName);
    while (taken.has(candidate)) {
      candidate = await this.driver.nextId(this.metadata.tableName);
    }
    return candidate;
  }

  private ensureImmutableColumns(previous: Row, next: Row): void {
    const changed = this.metadata.columns.filter(
      (column) => column.options.updatable === false && previous[column.propertyKey] !== next[column.propertyKey],
    );
    if (changed.length) {
      throw new ConstraintViolationError(
        "immutable",
        this.metadata.tableName,
        changed.map((column) => column.propertyKey),
      );
    }
  }

  private ensureNotNull(plain: Row): void {
    const missing = this.metadata.columns.filter(
      (column) => !column.options.nullable && (plain[column.propertyKey] === undefined || plain[column.propertyKey] === null),
    );
    if (missing.length) {
      throw new ConstraintViolationError(
        "not-null",
        this.metadata.tableName,
        missing.map((column) => column.propertyKey),
      );
    }
  }

  private ensureLength(plain: Row): void {
    const tooLong = this.metadata.columns.filter(({ propertyKey, options }) => {
      const value = plain[propertyKey];
      return options.length !== undefined && typeof value === "string" && [...value].length > options.length;
    });
    if (tooLong.length) {
      throw new ConstraintViolationError(
        "max-length",
        this.metadata.tableName,
        tooLong.map((column) => column.propertyKey),
      );
    }
  }

  private ensureUnique(plain: Row, rows: Row[], ownIndex: number): void {
    for (const { propertyKey, options } of this.metadata.columns) {
      if (!options.unique) continue;
      if (rows.some((row, index) => index !== ownIndex && row[propertyKey] === plain[propertyKey])) {
        throw new ConstraintViolationError("unique", this.metadata.tableName, [propertyKey]);
      }
    }
  }

  private async ensureReferences(plain: Row): Promise<void> {
    for (const { joinColumn, target } of manyToOneRelations(this.metadata)) {
      const value = plain[joinColumn];
      if (value === undefined || value === null) continue;
      const referenced = getEntityMetadata(target());
      const primary = primaryKeyOf(referenced);
      const targetRows = await this.driver.readTable(referenced.tableName);
      if (!targetRows.some((row) => row[primary] === value)) {
        throw new ConstraintViolationError(
          "foreign-key",
          this.metadata.tableName,
          [joinColumn],
          `${joinColumn} references a missing ${referenced.tableName} row`,
        );
      }
    }
  }

  private toPlain(entity: T): Row {
    return Object.fromEntries(
      this.metadata.columns.map((column) => [column.propertyKey, Reflect.get(entity, column.propertyKey)]),
    );
  }

  private materialize(row: Row): T {
    const instance = this.factory();
    this.metadata.columns.forEach((column) => {
      Reflect.set(instance, column.propertyKey, row[column.propertyKey]);
    });
    return instance;
  }
}

const unique = (values: unknown[]): unknown[] =>
  Array.from(new Set(values.filter((value) => value !== undefined && value !== null)));

const groupRelations = (paths: string[]): Map<string, string[]> => {
  const map = new Map<string, string[]>();
  for (const path of paths) {
    const [root, ...rest] = path.split(".");
    const remainder = rest.join(".");
    const list = map.get(root) ?? [];
    if (remainder) {
      list.push(remainder);
    }
    map.set(root, list);
  }
  return map;
};
