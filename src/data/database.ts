import pg, { type PoolClient, type QueryResult } from "pg";

import { DataAccessError, SiteScriptError, describeCause } from "../core/errors.js";

export type Row = Record<string, unknown>;

export interface Queryable {
  query(sql: string, params?: readonly unknown[]): Promise<Row[]>;
  /** Runs a statement and resolves to the number of affected rows. */
  execute(sql: string, params?: readonly unknown[]): Promise<number>;
}

export interface Database extends Queryable {
  readonly enabled: boolean;
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

const toDataAccessError = (error: unknown): SiteScriptError => {
  if (error instanceof SiteScriptError) {
    return error;
  }
  return new DataAccessError("query", `Database query failed: ${describeCause(error)}`, error);
};

type RunQuery = (sql: string, params: unknown[]) => Promise<QueryResult<Row>>;

const createQueryable = (run: RunQuery): Queryable => ({
  query: async (sql, params = []) => {
    try {
      const result = await run(sql, [...params]);
      return result.rows;
    } catch (error) {
      throw toDataAccessError(error);
    }
  },
  execute: async (sql, params = []) => {
    try {
      const result = await run(sql, [...params]);
      return result.rowCount ?? 0;
    } catch (error) {
      throw toDataAccessError(error);
    }
  },
});

export const createPgDatabase = (connectionString: string): Database => {
  const pool = new pg.Pool({ connectionString });
  const base = createQueryable((sql, params) => pool.query<Row>(sql, params));
  return {
    enabled: true,
    ...base,
    transaction: async (work) => {
      let client: PoolClient;
      try {
        client = await pool.connect();
      } catch (error) {
        throw toDataAccessError(error);
      }
      const tx = createQueryable((sql, params) => client.query<Row>(sql, params));
      // A client whose rollback failed is destroyed instead of going back to the pool.
      let brokenClient: Error | undefined;
      try {
        await tx.execute("BEGIN");
        const result = await work(tx);
        await tx.execute("COMMIT");
        return result;
      } catch (error) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          brokenClient = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        }
        throw error;
      } finally {
        client.release(brokenClient);
      }
    },
    close: () => pool.end(),
  };
};

/** Stand-in used when no database is configured; every call fails. */
export const createDisabledDatabase = (reason = "No database is configured"): Database => {
  const fail = (): Promise<never> => Promise.reject(new DataAccessError("disabled", reason));
  return {
    enabled: false,
    query: fail,
    execute: fail,
    transaction: fail,
    close: async () => undefined,
  };
};
