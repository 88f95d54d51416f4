import path from "node:path";

import { DEFAULT_SCRIPT_EXTENSION, compileAll, isDirectory, type CompiledUnit } from "./compiler/index.js";
import { loadConfig, loadWorldData } from "./config/config.js";
import { SiteScriptError } from "./core/errors.js";
import { createLogger, silentLogger, type Logger } from "./core/logger.js";
import { EXTENSION_KINDS, type ExtensionKind, type WorldData } from "./core/types.js";
import { createDisabledDatabase, createPgDatabase, type Database } from "./data/database.js";
import { ExtensionResolver, type ResolveReport } from "./extensions/resolver.js";
import { ExtensionStore } from "./extensions/store.js";
import { RuntimeContext, type PoolSettings } from "./runtime/context.js";
import { Dispatcher, type DispatchOptions, type DispatchResult } from "./runtime/dispatcher.js";
import type { HostGlobals } from "./runtime/instance.js";
import { CompiledUnitRegistry } from "./runtime/registry.js";

export const PRIMARY_ROOTS = ["pages", "widgets"] as const;

export interface CreateSiteRuntimeOptions {
  siteRoot: string;
  database?: Database;
  world?: WorldData;
  /** Prefix of the `<prefix>_extension_pages` and `<prefix>_extension_widgets` tables. */
  tablePrefix?: string;
  scriptExtension?: string;
  pool?: PoolSettings;
  dispatchTimeoutMs?: number;
  logger?: Logger;
  globals?: HostGlobals;
  nowSeconds?: () => number;
  now?: () => number;
}

export interface SiteRuntime {
  readonly context: RuntimeContext;
  readonly dispatcher: Dispatcher;
  readonly resolver: ExtensionResolver;
  readonly store: ExtensionStore;
  run(virtualPath: string, context?: unknown, options?: DispatchOptions): Promise<DispatchResult>;
  /** Resolves one kind, or every kind in order when omitted. */
  resolveExtensions(kind?: ExtensionKind): Promise<ResolveReport[]>;
  toggleExtension(kind: ExtensionKind, extensionId: string, enabled: boolean): Promise<ResolveReport>;
  reloadPrimary(): CompiledUnitRegistry;
  widgets(): string[];
  close(): Promise<void>;
}

const emptyWorld = (): WorldData => ({ vocations: [], towns: [] });

/** Compiles `pages/` and `widgets/` below the site root; a missing tree is skipped. */
export const compilePrimaryTrees = (
  siteRoot: string,
  extension: string = DEFAULT_SCRIPT_EXTENSION,
  logger: Logger = silentLogger
): CompiledUnitRegistry => {
  const entries: Array<[string, CompiledUnit]> = [];
  for (const root of PRIMARY_ROOTS) {
    const dir = path.join(siteRoot, root);
    if (!isDirectory(dir)) {
      logger.warn(`Missing primary ${root} directory: ${dir}`);
      continue;
    }
    entries.push(...compileAll(dir, { prefix: root, extension }));
  }
  return new CompiledUnitRegistry(entries);
};

const primaryWidgetPaths = (registry: CompiledUnitRegistry): string[] =>
  registry.paths().filter((virtualPath) => virtualPath.startsWith("widgets/"));

export const createSiteRuntime = (options: CreateSiteRuntimeOptions): SiteRuntime => {
  const siteRoot = path.resolve(options.siteRoot);
  const logger = options.logger ?? silentLogger;
  const database = options.database ?? createDisabledDatabase();
  const scriptExtension = options.scriptExtension ?? DEFAULT_SCRIPT_EXTENSION;

  const context = new RuntimeContext({
    host: {
      database,
      world: options.world ?? emptyWorld(),
      nowSeconds: options.nowSeconds,
      globals: options.globals,
    },
    pool: options.pool,
    dispatchTimeoutMs: options.dispatchTimeoutMs,
    logger,
    now: options.now,
  });
  const dispatcher = new Dispatcher(context);
  const store = new ExtensionStore(database, options.tablePrefix ?? "site");
  const resolver = new ExtensionResolver({ siteRoot, source: store, runtime: context, scriptExtension });

  const reloadPrimary = (): CompiledUnitRegistry => {
    const registry = compilePrimaryTrees(siteRoot, scriptExtension, logger);
    context.registry.replacePrimary(registry);
    context.pruneStaleInstances();
    context.widgets.loadPrimary(primaryWidgetPaths(registry));
    logger.info(`Compiled ${registry.size} primary script(s) from ${siteRoot}`);
    return registry;
  };

  const resolveExtensions = async (kind?: ExtensionKind): Promise<ResolveReport[]> => {
    const reports: ResolveReport[] = [];
    for (const next of kind ? [kind] : EXTENSION_KINDS) {
      reports.push(await resolver.resolveExtensions(next));
    }
    return reports;
  };

  reloadPrimary();

  return {
    context,
    dispatcher,
    resolver,
    store,
    run: (virtualPath, runContext, runOptions) => dispatcher.run(virtualPath, runContext, runOptions),
    resolveExtensions,
    toggleExtension: async (kind, extensionId, enabled) => {
      const changed = await store.setEnabled(kind, extensionId, enabled);
      if (!changed) {
        throw new SiteScriptError("EXTENSION_NOT_FOUND", `No ${kind} extension with id "${extensionId}".`);
      }
      try {
        return await resolver.resolveExtensions(kind);
      } catch (error) {
        logger.warn(`Reverting ${kind} extension ${extensionId} after failed resolution`);
        await store.setEnabled(kind, extensionId, !enabled);
        throw error;
      }
    },
    reloadPrimary,
    widgets: () => context.widgets.list(),
    close: async () => {
      context.pool.clear();
      await database.close();
    },
  };
};

export interface CreateSiteRuntimeFromConfigOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  database?: Database;
}

/**
 * Loads a YAML site configuration, compiles the primary trees and resolves
 * every extension kind. Without a database the extension layers stay empty.
 */
export const createSiteRuntimeFromConfig = async (
  configPath: string,
  options: CreateSiteRuntimeFromConfigOptions = {}
): Promise<SiteRuntime> => {
  const config = loadConfig(configPath, options.env);
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const ownsDatabase = options.database === undefined;
  const database =
    options.database ??
    (config.database.url ? createPgDatabase(config.database.url) : createDisabledDatabase());

  try {
    const runtime = createSiteRuntime({
      siteRoot: config.siteRoot,
      database,
      world: loadWorldData(config),
      tablePrefix: config.tablePrefix,
      scriptExtension: config.scriptExtension,
      pool: config.pool,
      dispatchTimeoutMs: config.dispatch.timeoutMs,
      logger,
    });

    if (!database.enabled) {
      logger.warn("No database configured; extensions are not resolved");
      return runtime;
    }
    await runtime.resolveExtensions();
    return runtime;
  } catch (error) {
    if (ownsDatabase) {
      await database.close();
    }
    throw error;
  }
};
