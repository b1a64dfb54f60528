import { Connection } from "./connection";
import { DatabaseDriver } from "./drivers/interfaces";
import { JsonDatabaseDriver } from "./drivers/json";
import { MemoryDatabaseDriver } from "./drivers/memory";

export type DriverName = "memory" | "json";

export interface StandaloneOrmOptions {
  driver: DriverName | DatabaseDriver;
  /** Used by the json driver. */
  filePath?: string;
  entities?: Function[];
}

export const createDriver = (name: DriverName, filePath?: string): DatabaseDriver =>
  name === "json" ? new JsonDatabaseDriver({ filePath }) : new MemoryDatabaseDriver();

export const createStandaloneConnection = async (options: StandaloneOrmOptions): Promise<Connection> => {
  const driver = typeof options.driver === "string" ? createDriver(options.driver, options.filePath) : options.driver;
  const connection = new Connection({ driver, entities: options.entities });
  await connection.initialize();
  return connection;
};
