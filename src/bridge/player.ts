import { z } from "zod";

import { BindingNotFoundError } from "../core/errors.js";
import type { ColumnValue, Town, Vocation } from "../core/types.js";
import { AccountRepository, premiumStatus, type PremiumStatus } from "../data/accounts.js";
import { PlayerRepository, PlayerRowSchema, type PlayerEntity, type StorageValue } from "../data/players.js";
import { expectColumnValue, expectInteger, expectNonNegativeInteger, expectString } from "./arguments.js";
import { readCustomField, writeCustomField, type CustomFieldTarget } from "./catalog.js";
import { DomainHandle, loadByIdOrName, type BridgeServices } from "./handle.js";

/** Fields copied onto `player.fields`; balance stays behind its accessor. */
export const PLAYER_EXPORTED_FIELDS = {
  id: true,
  name: true,
  account_id: true,
  level: true,
  vocation: true,
  health: true,
  healthmax: true,
  experience: true,
  maglevel: true,
  mana: true,
  manamax: true,
  town_id: true,
  sex: true,
  cap: true,
  lastlogin: true,
} as const;

export const PlayerFieldsSchema = PlayerRowSchema.pick(PLAYER_EXPORTED_FIELDS);

export type PlayerFields = z.infer<typeof PlayerFieldsSchema>;

export const projectPlayer = (entity: PlayerEntity): PlayerFields => PlayerFieldsSchema.parse(entity);

export interface PlayerGuild {
  id: number;
  name: string;
  rankId: number;
}

export class PlayerHandle extends DomainHandle<PlayerEntity, PlayerFields> {
  private readonly players: PlayerRepository;
  private readonly accounts: AccountRepository;

  constructor(
    entity: PlayerEntity,
    private readonly services: BridgeServices
  ) {
    const players = new PlayerRepository(services.db);
    super(entity, {
      entityName: "player",
      keyOf: (player) => player.id,
      project: projectPlayer,
      reload: (player) => players.findById(player.id),
    });
    this.players = players;
    this.accounts = new AccountRepository(services.db);
  }

  async getGuild(): Promise<PlayerGuild | null> {
    const guild = await this.players.getGuild(this.live.id);
    return guild ? { id: guild.id, name: guild.name, rankId: guild.rank_id } : null;
  }

  getAccountId(): number {
    return this.live.account_id;
  }

  getBankBalance(): Promise<number> {
    return this.players.getBalance(this.live.id);
  }

  async setBankBalance(balance: unknown): Promise<void> {
    const amount = expectNonNegativeInteger("setBankBalance", 1, balance);
    await this.mutate(() => this.players.setBalance(this.live.id, amount));
  }

  isOnline(): Promise<boolean> {
    return this.players.isOnline(this.live.id);
  }

  async getStorageValue(key: unknown): Promise<StorageValue | null> {
    const storageKey = expectInteger("getStorageValue", 1, key);
    return this.players.getStorageValue(this.live.id, storageKey);
  }

  async setStorageValue(key: unknown, value: unknown): Promise<void> {
    const storageKey = expectInteger("setStorageValue", 1, key);
    const storageValue = expectInteger("setStorageValue", 2, value);
    await this.mutate(() => this.players.setStorageValue(this.live.id, storageKey, storageValue));
  }

  getVocation(): Vocation {
    const vocation = this.services.world.vocations.find((item) => item.id === this.live.vocation);
    if (!vocation) {
      throw new BindingNotFoundError("vocation", this.live.vocation);
    }
    return { ...vocation };
  }

  getGender(): number {
    return this.live.sex;
  }

  async getPremiumDays(): Promise<number> {
    return (await this.premium()).days;
  }

  async getPremiumTime(): Promise<number> {
    return (await this.premium()).time;
  }

  async getPremiumEndsAt(): Promise<number> {
    return (await this.premium()).endsAt;
  }

  getTown(): Town {
    const town = this.services.world.towns.find((item) => item.id === this.live.town_id);
    if (!town) {
      throw new BindingNotFoundError("town", this.live.town_id);
    }
    return { ...town, templePosition: town.templePosition ? { ...town.templePosition } : null };
  }

  getLevel(): number {
    return this.live.level;
  }

  getName(): string {
    return this.live.name;
  }

  getExperience(): Promise<number> {
    return this.players.getExperience(this.live.id);
  }

  getCapacity(): number {
    return this.live.cap;
  }

  async getCustomField(field: unknown): Promise<ColumnValue> {
    const name = expectString("getCustomField", 1, field);
    return readCustomField(this.customFieldTarget(), name);
  }

  async setCustomField(field: unknown, value: unknown): Promise<void> {
    const name = expectString("setCustomField", 1, field);
    const columnValue = expectColumnValue("setCustomField", 2, value);
    await this.mutate(() => writeCustomField(this.customFieldTarget(), name, columnValue));
  }

  private async premium(): Promise<PremiumStatus> {
    const endsAt = await this.accounts.getPremiumEndsAt(this.live.account_id);
    if (endsAt === null) {
      throw new BindingNotFoundError("account", this.live.account_id);
    }
    return premiumStatus(endsAt, this.services.nowSeconds());
  }

  private customFieldTarget(): CustomFieldTarget {
    return {
      db: this.services.db,
      catalog: this.services.catalog,
      table: "players",
      id: this.live.id,
      readOnly: ["id"],
    };
  }
}

export const bindPlayer = async (services: BridgeServices, idOrName: unknown): Promise<PlayerHandle> => {
  const players = new PlayerRepository(services.db);
  const entity = await loadByIdOrName("player", "Player", idOrName, {
    byId: (id) => players.findById(id),
    byName: (name) => players.findByName(name),
  });
  return new PlayerHandle(entity, services);
};
