export { RuntimeContext } from "./context.js";
export type { PoolSettings, RuntimeContextOptions } from "./context.js";
export { Dispatcher } from "./dispatcher.js";
export type { DispatchOptions, DispatchResult } from "./dispatcher.js";
export { RESERVED_GLOBALS, createDatabaseBinding, createHostGlobals, unixSeconds } from "./host.js";
export type { HostEnvironment } from "./host.js";
export { InterpreterInstance } from "./instance.js";
export type { EntryFunction, HostGlobals, HostGlobalsFactory } from "./instance.js";
export { StatePool } from "./pool.js";
export type { StatePoolOptions } from "./pool.js";
export { CompiledUnitRegistry, RegistryHolder } from "./registry.js";
export type { RegistrySnapshot, UnitLookup } from "./registry.js";
