import { bindAccount } from "../bridge/account.js";
import { expectFunction, expectString } from "../bridge/arguments.js";
import { ColumnCatalog } from "../bridge/catalog.js";
import type { BridgeServices } from "../bridge/handle.js";
import { bindPlayer } from "../bridge/player.js";
import type { Logger } from "../core/logger.js";
import type { WorldData } from "../core/types.js";
import type { Database, Queryable, Row } from "../data/database.js";
import type { HostGlobals, InterpreterInstance } from "./instance.js";

export interface HostEnvironment {
  database: Database;
  world: WorldData;
  logger: Logger;
  nowSeconds?: () => number;
  /** Extra globals installed into every interpreter instance. */
  globals?: HostGlobals;
}

export const RESERVED_GLOBALS = ["Player", "Account", "db", "log"] as const;

export const unixSeconds = (): number => Math.floor(Date.now() / 1000);

const bindQueryable = (target: Queryable, prefix: string) => ({
  query: async (sql: unknown, ...params: unknown[]): Promise<Row[]> => {
    return target.query(expectString(`${prefix}.query`, 1, sql), params);
  },
  singleQuery: async (sql: unknown, ...params: unknown[]): Promise<Row | null> => {
    const rows = await target.query(expectString(`${prefix}.singleQuery`, 1, sql), params);
    return rows.length > 0 ? rows[0] : null;
  },
  execute: async (sql: unknown, ...params: unknown[]): Promise<number> => {
    return target.execute(expectString(`${prefix}.execute`, 1, sql), params);
  },
});

export const createDatabaseBinding = (database: Database, instance: InterpreterInstance) => ({
  ...bindQueryable(database, "db"),
  transaction: async (work: unknown): Promise<unknown> => {
    const run = expectFunction("db.transaction", 1, work);
    instance.transactionOpen = true;
    try {
      return await database.transaction(async (tx) => run(bindQueryable(tx, "tx")));
    } finally {
      instance.transactionOpen = false;
    }
  },
  get inTransaction(): boolean {
    return instance.transactionOpen;
  },
});

const createScriptLogger = (logger: Logger, virtualPath: string) => {
  const format = (message: unknown): string => `[${virtualPath}] ${String(message)}`;
  return {
    info: (message: unknown) => logger.info(format(message)),
    warn: (message: unknown) => logger.warn(format(message)),
    error: (message: unknown) => logger.error(format(message)),
  };
};

export const createHostGlobals = (env: HostEnvironment, instance: InterpreterInstance): HostGlobals => {
  const services: BridgeServices = {
    db: env.database,
    catalog: new ColumnCatalog(env.database),
    world: env.world,
    nowSeconds: env.nowSeconds ?? unixSeconds,
  };
  return {
    ...env.globals,
    Player: (idOrName: unknown) => bindPlayer(services, idOrName),
    Account: (idOrName: unknown) => bindAccount(services, idOrName),
    db: createDatabaseBinding(env.database, instance),
    log: createScriptLogger(env.logger, instance.unit.virtualPath),
  };
};
