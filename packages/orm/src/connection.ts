import { AsyncLocalStorage } from "node:async_hooks";
import { DatabaseDriver, TransactionDriver } from "./drivers/interfaces";
import { MemoryDatabaseDriver } from "./drivers/memory";
import { getEntityMetadata, listEntities } from "./metadata";
import { Repository } from "./repository";
import { buildTableSchema } from "./schema/utils";

export type EntityTarget<T extends object> = new () => T;

export interface ConnectionOptions {
  driver?: DatabaseDriver;
  /** Entities whose tables are created on initialize; defaults to every decorated entity. */
  entities?: Function[];
}

export class Connection {
  private readonly driver: DatabaseDriver;
  private readonly entities?: Function[];
  private readonly transactionContext = new AsyncLocalStorage<TransactionState>();
  private lock: Promise<void> = Promise.resolve();

  constructor(options: ConnectionOptions = {}) {
    this.driver = options.driver ?? new MemoryDatabaseDriver();
    this.entities = options.entities;
  }

  async initialize(): Promise<void> {
    await this.driver.init();
    const entities = this.entities ?? listEntities().map((metadata) => metadata.target);
    for (const entity of entities) {
      await this.driver.ensureTable(buildTableSchema(getEntityMetadata(entity)));
    }
  }

  /** Inside `transaction` the repository reads and writes the transaction's working copy. */
  getRepository<T extends object>(entity: EntityTarget<T>): Repository<T> {
    const active = this.transactionContext.getStore();
    return this.createRepository(entity, active?.driver ?? this.driver);
  }

  getDriver(): DatabaseDriver {
    return this.driver;
  }

  /**
   * Runs `handler` atomically: every write commits together or none does.
   * Root transactions run one at a time; a nested call joins the outer one.
   */
  async transaction<R>(handler: (manager: EntityManager) => Promise<R> | R): Promise<R> {
    const active = this.transactionContext.getStore();
    if (active) {
      return handler(active.manager);
    }
    const release = await this.acquire();
    try {
      return await this.runRootTransaction(handler);
    } finally {
      release();
    }
  }

  private async runRootTransaction<R>(handler: (manager: EntityManager) => Promise<R> | R): Promise<R> {
    const tx = await this.driver.beginTransaction();
    const manager = new EntityManager((entity) => this.createRepository(entity, tx));
    return this.transactionContext.run({ driver: tx, manager }, async () => {
      let result: R;
      try {
        result = await handler(manager);
      } catch (error) {
        await tx.rollback();
        throw error;
      }
      await tx.commit();
      return result;
    });
  }

  private async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.lock;
    this.lock = previous.then(() => next);
    await previous;
    return release;
  }

  private createRepository<T extends object>(entity: EntityTarget<T>, driver: DatabaseDriver): Repository<T> {
    return new Repository<T>(
      getEntityMetadata(entity),
      driver,
      () => new entity(),
      (related) => this.createRelatedRepository(related, driver),
    );
  }

  private createRelatedRepository(target: Function, driver: DatabaseDriver): Repository<object> {
    const factory = (): object => Reflect.construct(target, []);
    return new Repository<object>(getEntityMetadata(target), driver, factory, (related) =>
      this.createRelatedRepository(related, driver),
    );
  }
}

export class EntityManager {
  constructor(private readonly resolver: <T extends object>(entity: EntityTarget<T>) => Repository<T>) {}

  getRepository<T extends object>(entity: EntityTarget<T>): Repository<T> {
    return this.resolver(entity);
  }
}

interface TransactionState {
  driver: TransactionDriver;
  manager: EntityManager;
}
