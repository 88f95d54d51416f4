import { z } from "zod";

import { SiteScriptError } from "../core/errors.js";
import { kindDirectory } from "../core/paths.js";
import type { ExtensionKind, ExtensionRecord } from "../core/types.js";
import type { Queryable } from "../data/database.js";
import { parseRow } from "../data/rows.js";

const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/;

const ExtensionRowSchema = z.object({
  extension_id: z.union([z.string(), z.number()]).transform((value) => String(value)),
  enabled: z.boolean(),
});

export interface ExtensionSource {
  listEnabled(kind: ExtensionKind): Promise<ExtensionRecord[]>;
}

/** Extension ids sort numerically when they are numbers ("3" before "12"). */
export const compareExtensionIds = (a: string, b: string): number =>
  a.localeCompare(b, "en", { numeric: true });

export const extensionTableName = (tablePrefix: string, kind: ExtensionKind): string => {
  const table = `${tablePrefix}_extension_${kindDirectory(kind)}`;
  if (!IDENTIFIER_PATTERN.test(table)) {
    throw new SiteScriptError("EXTENSION_TABLE_INVALID", `Invalid extension table name "${table}".`);
  }
  return table;
};

export class ExtensionStore implements ExtensionSource {
  constructor(
    private readonly db: Queryable,
    private readonly tablePrefix: string
  ) {}

  async listEnabled(kind: ExtensionKind): Promise<ExtensionRecord[]> {
    const table = extensionTableName(this.tablePrefix, kind);
    const rows = await this.db.query(`SELECT extension_id, enabled FROM ${table} WHERE enabled = true`);
    return rows
      .map((row) => parseRow(ExtensionRowSchema, row, "extension"))
      .map((row) => ({ id: row.extension_id, kind, enabled: row.enabled }))
      .sort((a, b) => compareExtensionIds(a.id, b.id));
  }

  /** Resolves to false when no extension with that id exists. */
  async setEnabled(kind: ExtensionKind, extensionId: string, enabled: boolean): Promise<boolean> {
    const table = extensionTableName(this.tablePrefix, kind);
    const changed = await this.db.execute(`UPDATE ${table} SET enabled = $1 WHERE extension_id = $2`, [
      enabled,
      extensionId,
    ]);
    return changed > 0;
  }
}
