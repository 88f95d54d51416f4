import { z } from "zod";

import { BindingNotFoundError } from "../core/errors.js";
import type { ColumnValue } from "../core/types.js";
import {
  AccountRepository,
  AccountRowSchema,
  premiumStatus,
  type AccountEntity,
  type PremiumStatus,
} from "../data/accounts.js";
import { PlayerRepository } from "../data/players.js";
import { expectColumnValue, expectString } from "./arguments.js";
import { readCustomField, writeCustomField, type CustomFieldTarget } from "./catalog.js";
import { DomainHandle, loadByIdOrName, type BridgeServices } from "./handle.js";
import { projectPlayer, type PlayerFields } from "./player.js";

export const ACCOUNT_EXPORTED_FIELDS = {
  id: true,
  name: true,
  premium_ends_at: true,
  creation: true,
} as const;

export const AccountFieldsSchema = AccountRowSchema.pick(ACCOUNT_EXPORTED_FIELDS);

export type AccountFields = z.infer<typeof AccountFieldsSchema>;

export const projectAccount = (entity: AccountEntity): AccountFields => AccountFieldsSchema.parse(entity);

export class AccountHandle extends DomainHandle<AccountEntity, AccountFields> {
  private readonly accounts: AccountRepository;

  constructor(
    entity: AccountEntity,
    private readonly services: BridgeServices
  ) {
    const accounts = new AccountRepository(services.db);
    super(entity, {
      entityName: "account",
      keyOf: (account) => account.id,
      project: projectAccount,
      reload: (account) => accounts.findById(account.id),
    });
    this.accounts = accounts;
  }

  getId(): number {
    return this.live.id;
  }

  getName(): string {
    return this.live.name;
  }

  getEmail(): string {
    return this.live.email;
  }

  async getPlayers(): Promise<PlayerFields[]> {
    const players = await new PlayerRepository(this.services.db).listByAccount(this.live.id);
    return players.map(projectPlayer);
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
    const endsAt = await this.accounts.getPremiumEndsAt(this.live.id);
    if (endsAt === null) {
      throw new BindingNotFoundError("account", this.live.id);
    }
    return premiumStatus(endsAt, this.services.nowSeconds());
  }

  private customFieldTarget(): CustomFieldTarget {
    return {
      db: this.services.db,
      catalog: this.services.catalog,
      table: "accounts",
      id: this.live.id,
      readOnly: ["id", "password"],
    };
  }
}

export const bindAccount = async (services: BridgeServices, idOrName: unknown): Promise<AccountHandle> => {
  const accounts = new AccountRepository(services.db);
  const entity = await loadByIdOrName("account", "Account", idOrName, {
    byId: (id) => accounts.findById(id),
    byName: (name) => accounts.findByName(name),
  });
  return new AccountHandle(entity, services);
};
