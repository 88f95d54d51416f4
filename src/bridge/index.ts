export { AccountHandle, bindAccount, projectAccount } from "./account.js";
export type { AccountFields } from "./account.js";
export { ColumnCatalog, COLUMN_CATALOG_SQL, quoteIdentifier } from "./catalog.js";
export { DomainHandle } from "./handle.js";
export type { BridgeServices } from "./handle.js";
export { PlayerHandle, bindPlayer, projectPlayer } from "./player.js";
export type { PlayerFields, PlayerGuild } from "./player.js";
