import { z } from "zod";

import type { Queryable } from "./database.js";
import { intColumn, numberColumn, parseOptionalRow, parseRow } from "./rows.js";

export const PlayerRowSchema = z.object({
  id: intColumn,
  name: z.string(),
  account_id: intColumn,
  level: intColumn,
  vocation: intColumn,
  health: intColumn,
  healthmax: intColumn,
  experience: numberColumn,
  maglevel: intColumn,
  mana: intColumn,
  manamax: intColumn,
  town_id: intColumn,
  sex: intColumn,
  cap: intColumn,
  lastlogin: numberColumn,
  balance: numberColumn,
});

export type PlayerEntity = z.infer<typeof PlayerRowSchema>;

const PLAYER_COLUMNS = Object.keys(PlayerRowSchema.shape).join(", ");

export const PLAYER_SQL = {
  byId: `SELECT ${PLAYER_COLUMNS} FROM players WHERE id = $1`,
  byName: `SELECT ${PLAYER_COLUMNS} FROM players WHERE name = $1`,
  byAccount: `SELECT ${PLAYER_COLUMNS} FROM players WHERE account_id = $1 ORDER BY name`,
  balance: "SELECT balance FROM players WHERE id = $1",
  setBalance: "UPDATE players SET balance = $1 WHERE id = $2",
  experience: "SELECT experience FROM players WHERE id = $1",
  online: "SELECT player_id FROM players_online WHERE player_id = $1",
  storage: "SELECT key, value FROM player_storage WHERE player_id = $1 AND key = $2",
  setStorage:
    "INSERT INTO player_storage (player_id, key, value) VALUES ($1, $2, $3) " +
    "ON CONFLICT (player_id, key) DO UPDATE SET value = EXCLUDED.value",
  guild:
    "SELECT g.id, g.name, m.rank_id FROM guild_membership m " +
    "INNER JOIN guilds g ON g.id = m.guild_id WHERE m.player_id = $1",
} as const;

const StorageRowSchema = z.object({ key: intColumn, value: intColumn });
export type StorageValue = z.infer<typeof StorageRowSchema>;

const GuildRowSchema = z.object({ id: intColumn, name: z.string(), rank_id: intColumn });
export type GuildMembership = z.infer<typeof GuildRowSchema>;

const BalanceRowSchema = z.object({ balance: numberColumn });
const ExperienceRowSchema = z.object({ experience: numberColumn });

export class PlayerRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<PlayerEntity | null> {
    return parseOptionalRow(PlayerRowSchema, await this.db.query(PLAYER_SQL.byId, [id]), "player");
  }

  async findByName(name: string): Promise<PlayerEntity | null> {
    return parseOptionalRow(PlayerRowSchema, await this.db.query(PLAYER_SQL.byName, [name]), "player");
  }

  async getBalance(id: number): Promise<number> {
    const row = parseOptionalRow(BalanceRowSchema, await this.db.query(PLAYER_SQL.balance, [id]), "balance");
    return row?.balance ?? 0;
  }

  async setBalance(id: number, balance: number): Promise<void> {
    await this.db.execute(PLAYER_SQL.setBalance, [balance, id]);
  }

  async getExperience(id: number): Promise<number> {
    const rows = await this.db.query(PLAYER_SQL.experience, [id]);
    return parseOptionalRow(ExperienceRowSchema, rows, "experience")?.experience ?? 0;
  }

  async isOnline(id: number): Promise<boolean> {
    const rows = await this.db.query(PLAYER_SQL.online, [id]);
    return rows.length > 0;
  }

  async getStorageValue(id: number, key: number): Promise<StorageValue | null> {
    const rows = await this.db.query(PLAYER_SQL.storage, [id, key]);
    return parseOptionalRow(StorageRowSchema, rows, "storage");
  }

  async setStorageValue(id: number, key: number, value: number): Promise<void> {
    await this.db.execute(PLAYER_SQL.setStorage, [id, key, value]);
  }

  async getGuild(id: number): Promise<GuildMembership | null> {
    return parseOptionalRow(GuildRowSchema, await this.db.query(PLAYER_SQL.guild, [id]), "guild");
  }

  async listByAccount(accountId: number): Promise<PlayerEntity[]> {
    const rows = await this.db.query(PLAYER_SQL.byAccount, [accountId]);
    return rows.map((row) => parseRow(PlayerRowSchema, row, "player"));
  }
}
