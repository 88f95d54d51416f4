import { DispatchTimeoutError, SiteScriptError, describeCause } from "../core/errors.js";
import { defaultEntryName, normalizeVirtualPath } from "../core/paths.js";
import type { UnitLayer } from "../core/types.js";
import type { RuntimeContext } from "./context.js";

export interface DispatchOptions {
  /** Entry function name; defaults to `widget` under widgets/ and the file basename elsewhere. */
  entry?: string;
  /** Overrides the runtime's default deadline; 0 waits indefinitely. */
  timeoutMs?: number;
}

export interface DispatchResult {
  path: string;
  layer: UnitLayer;
  value: unknown;
}

const withDeadline = <T>(work: Promise<T>, timeoutMs: number, virtualPath: string): Promise<T> => {
  if (timeoutMs <= 0) {
    return work;
  }
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new DispatchTimeoutError(virtualPath, timeoutMs)), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
};

export class Dispatcher {
  constructor(private readonly runtime: RuntimeContext) {}

  async run(path: string, context: unknown, options: DispatchOptions = {}): Promise<DispatchResult> {
    const virtualPath = normalizeVirtualPath(path);
    const found = this.runtime.registry.lookup(virtualPath);
    if (!found) {
      throw new SiteScriptError("DISPATCH_PATH_NOT_FOUND", `No script is registered at "${virtualPath}".`);
    }

    const instance = this.runtime.pool.checkout(virtualPath, found.unit);
    const entryName = options.entry ?? defaultEntryName(virtualPath);
    const timeoutMs = options.timeoutMs ?? this.runtime.dispatchTimeoutMs;
    let timedOut = false;
    try {
      const entry = instance.entry(entryName);
      if (!entry) {
        throw new SiteScriptError(
          "DISPATCH_ENTRY_NOT_FOUND",
          `Script "${virtualPath}" does not define function "${entryName}".`
        );
      }
      let value: unknown;
      try {
        value = await withDeadline(Promise.resolve().then(() => entry(context)), timeoutMs, virtualPath);
      } catch (error) {
        if (error instanceof DispatchTimeoutError) {
          timedOut = true;
          throw error;
        }
        throw new SiteScriptError("SCRIPT_FAILED", `Script "${virtualPath}" failed: ${describeCause(error)}`, {
          cause: error,
          details: { entry: entryName },
        });
      }
      return { path: virtualPath, layer: found.layer, value };
    } finally {
      if (timedOut) {
        this.runtime.logger.warn(`Discarding instance ${instance.id} of ${virtualPath} after timeout`);
        this.runtime.pool.discard(instance);
      } else {
        this.runtime.pool.checkin(instance, virtualPath);
      }
    }
  }
}
