import { z } from "zod";

import type { Queryable } from "./database.js";
import { intColumn, numberColumn, parseOptionalRow } from "./rows.js";

export const AccountRowSchema = z.object({
  id: intColumn,
  name: z.string(),
  email: z.string(),
  premium_ends_at: numberColumn,
  creation: numberColumn,
});

export type AccountEntity = z.infer<typeof AccountRowSchema>;

const ACCOUNT_COLUMNS = Object.keys(AccountRowSchema.shape).join(", ");

export const ACCOUNT_SQL = {
  byId: `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
  byName: `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE name = $1`,
  premiumEndsAt: "SELECT premium_ends_at FROM accounts WHERE id = $1",
} as const;

const PremiumRowSchema = z.object({ premium_ends_at: numberColumn });

export class AccountRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<AccountEntity | null> {
    return parseOptionalRow(AccountRowSchema, await this.db.query(ACCOUNT_SQL.byId, [id]), "account");
  }

  async findByName(name: string): Promise<AccountEntity | null> {
    return parseOptionalRow(AccountRowSchema, await this.db.query(ACCOUNT_SQL.byName, [name]), "account");
  }

  /** Unix timestamp in seconds; 0 when the account has never had premium. */
  async getPremiumEndsAt(id: number): Promise<number | null> {
    const rows = await this.db.query(ACCOUNT_SQL.premiumEndsAt, [id]);
    const row = parseOptionalRow(PremiumRowSchema, rows, "account premium");
    return row ? row.premium_ends_at : null;
  }
}

export interface PremiumStatus {
  endsAt: number;
  /** Remaining seconds. */
  time: number;
  days: number;
}

export const premiumStatus = (endsAt: number, nowSeconds: number): PremiumStatus => {
  const time = Math.max(0, endsAt - nowSeconds);
  return { endsAt, time, days: Math.ceil(time / 86400) };
};
