import path from "node:path";

import {
  DEFAULT_SCRIPT_EXTENSION,
  compileOne,
  isDirectory,
  listScriptFiles,
  type CompiledUnit,
} from "../compiler/compiler.js";
import { ExtensionLoadError, PoolColdStartError, describeCause } from "../core/errors.js";
import { joinVirtualPath, kindDirectory, widgetIdFromPath } from "../core/paths.js";
import type { ExtensionKind } from "../core/types.js";
import type { RuntimeContext } from "../runtime/context.js";
import type { InterpreterInstance } from "../runtime/instance.js";
import { CompiledUnitRegistry } from "../runtime/registry.js";
import type { ExtensionSource } from "./store.js";

export interface ExtensionResolverOptions {
  /** Directory that contains `extensions/`. */
  siteRoot: string;
  source: ExtensionSource;
  runtime: RuntimeContext;
  scriptExtension?: string;
}

export interface ResolveReport {
  kind: ExtensionKind;
  /** Extension ids that contributed scripts, in merge order. */
  loaded: string[];
  /** Extension ids without a `<kind>s/` directory. */
  skipped: string[];
  /** Widget ids removed from the active list because they failed to load. */
  failedWidgets: string[];
  /** Virtual paths published in the new extension layer. */
  paths: string[];
}

interface LoadedScript {
  unit: CompiledUnit;
  instance: InterpreterInstance;
}

export class ExtensionResolver {
  private readonly siteRoot: string;
  private readonly source: ExtensionSource;
  private readonly runtime: RuntimeContext;
  private readonly scriptExtension: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: ExtensionResolverOptions) {
    this.siteRoot = options.siteRoot;
    this.source = options.source;
    this.runtime = options.runtime;
    this.scriptExtension = options.scriptExtension ?? DEFAULT_SCRIPT_EXTENSION;
  }

  extensionDirectory(extensionId: string, kind: ExtensionKind): string {
    return path.join(this.siteRoot, "extensions", extensionId, kindDirectory(kind));
  }

  /** Resolutions run one at a time; each builds its layer aside and publishes it in one swap. */
  resolveExtensions(kind: ExtensionKind): Promise<ResolveReport> {
    const run = this.queue.then(
      () => this.resolve(kind),
      () => this.resolve(kind)
    );
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async resolve(kind: ExtensionKind): Promise<ResolveReport> {
    const logger = this.runtime.logger;
    const records = await this.source.listEnabled(kind);
    const directoryName = kindDirectory(kind);
    const scripts = new Map<string, LoadedScript>();
    const widgetStatus = new Map<string, "loaded" | "failed">();
    const loaded: string[] = [];
    const skipped: string[] = [];

    for (const record of records) {
      const dir = this.extensionDirectory(record.id, kind);
      if (!isDirectory(dir)) {
        logger.error(`Missing ${directoryName} directory in extension ${record.id}`);
        skipped.push(record.id);
        continue;
      }

      for (const relativePath of listScriptFiles(dir, this.scriptExtension)) {
        const virtualPath = joinVirtualPath(directoryName, relativePath);
        const filePath = path.join(dir, ...relativePath.split("/"));
        try {
          scripts.set(virtualPath, this.loadScript(filePath, virtualPath));
          if (kind === "widget") {
            widgetStatus.set(widgetIdFromPath(virtualPath), "loaded");
          }
        } catch (error) {
          if (kind !== "widget") {
            throw new ExtensionLoadError(record.id, kind, error);
          }
          logger.error(`Cannot load widgets in extension: ${record.id} ${describeCause(error)}`);
          // An earlier extension's script at this path stays in place.
          if (!scripts.has(virtualPath)) {
            widgetStatus.set(widgetIdFromPath(virtualPath), "failed");
          }
        }
      }
      loaded.push(record.id);
    }

    const layer = new CompiledUnitRegistry(
      [...scripts.entries()].map(([virtualPath, script]) => [virtualPath, script.unit] as const)
    );
    this.runtime.registry.replaceExtensions(kind, layer);
    this.runtime.pruneStaleInstances();
    for (const [virtualPath, script] of scripts) {
      this.runtime.pool.seed(virtualPath, script.instance);
    }

    const failedWidgets: string[] = [];
    if (kind === "widget") {
      const loadedWidgets: string[] = [];
      for (const [widgetId, status] of widgetStatus) {
        (status === "loaded" ? loadedWidgets : failedWidgets).push(widgetId);
      }
      this.runtime.widgets.applyExtensionResolution(loadedWidgets, failedWidgets);
    }

    logger.info(`Resolved ${scripts.size} ${kind} script(s) from ${loaded.length} extension(s)`);
    return { kind, loaded, skipped, failedWidgets: failedWidgets.sort(), paths: layer.paths() };
  }

  private loadScript(filePath: string, virtualPath: string): LoadedScript {
    const unit = compileOne(filePath, virtualPath);
    const instance = this.runtime.createInstance(unit);
    try {
      instance.initialize();
    } catch (error) {
      throw new PoolColdStartError(virtualPath, error);
    }
    return { unit, instance };
  }
}
