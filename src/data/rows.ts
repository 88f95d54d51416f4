import { z } from "zod";

import { DataAccessError } from "../core/errors.js";
import type { Row } from "./database.js";

/** Integer columns may arrive as strings (int8) depending on the driver. */
export const intColumn = z.coerce.number().int();
export const numberColumn = z.coerce.number();

export const parseRow = <S extends z.ZodTypeAny>(schema: S, row: Row, what: string): z.infer<S> => {
  const result = schema.safeParse(row);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "row"}: ${issue.message}` : "unknown issue";
    throw new DataAccessError("row", `Unexpected ${what} row (${where})`, result.error);
  }
  return result.data;
};

export const parseOptionalRow = <S extends z.ZodTypeAny>(
  schema: S,
  rows: Row[],
  what: string
): z.infer<S> | null => {
  const [row] = rows;
  return row ? parseRow(schema, row, what) : null;
};
