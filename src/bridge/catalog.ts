import { FieldNotAllowedError } from "../core/errors.js";
import type { ColumnValue } from "../core/types.js";
import type { Queryable } from "../data/database.js";

export const COLUMN_CATALOG_SQL =
  "SELECT column_name FROM information_schema.columns " +
  "WHERE table_catalog = current_database() AND table_schema = current_schema() AND table_name = $1";

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

/**
 * Allow-list of column names, read live from the schema catalog on every
 * call. Only names returned here are ever interpolated into SQL.
 */
export class ColumnCatalog {
  constructor(private readonly db: Queryable) {}

  async columns(table: string): Promise<Set<string>> {
    const rows = await this.db.query(COLUMN_CATALOG_SQL, [table]);
    const names = new Set<string>();
    for (const row of rows) {
      if (typeof row.column_name === "string") {
        names.add(row.column_name);
      }
    }
    return names;
  }

  async resolve(table: string, field: string): Promise<string> {
    const columns = await this.columns(table);
    if (!columns.has(field)) {
      throw new FieldNotAllowedError(table, field);
    }
    return field;
  }
}

export const toColumnValue = (value: unknown): ColumnValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (value instanceof Date) {
    return Math.floor(value.getTime() / 1000);
  }
  return String(value);
};

export interface CustomFieldTarget {
  db: Queryable;
  catalog: ColumnCatalog;
  table: string;
  id: number;
  /** Columns that stay read-only even though the catalog lists them. */
  readOnly: readonly string[];
}

export const readCustomField = async (target: CustomFieldTarget, field: string): Promise<ColumnValue> => {
  const column = await target.catalog.resolve(target.table, field);
  const rows = await target.db.query(
    `SELECT ${quoteIdentifier(column)} AS value FROM ${target.table} WHERE id = $1`,
    [target.id]
  );
  const [row] = rows;
  return row ? toColumnValue(row.value) : null;
};

export const writeCustomField = async (
  target: CustomFieldTarget,
  field: string,
  value: ColumnValue
): Promise<void> => {
  if (target.readOnly.includes(field)) {
    throw new FieldNotAllowedError(target.table, field);
  }
  const column = await target.catalog.resolve(target.table, field);
  await target.db.execute(`UPDATE ${target.table} SET ${quoteIdentifier(column)} = $1 WHERE id = $2`, [
    value,
    target.id,
  ]);
};
