export const SITESCRIPT_VERSION = "0.1.0";

export * from "./core/errors.js";
export * from "./core/logger.js";
export * from "./core/paths.js";
export * from "./core/types.js";
export * from "./compiler/index.js";
export * from "./config/config.js";
export * from "./data/database.js";
export * from "./data/accounts.js";
export * from "./data/players.js";
export * from "./data/rows.js";
export * from "./bridge/index.js";
export * from "./runtime/index.js";
export * from "./extensions/index.js";
export * from "./api.js";
