export { ExtensionResolver } from "./resolver.js";
export type { ExtensionResolverOptions, ResolveReport } from "./resolver.js";
export { ExtensionStore, compareExtensionIds, extensionTableName } from "./store.js";
export type { ExtensionSource } from "./store.js";
export { WidgetList } from "./widgets.js";
