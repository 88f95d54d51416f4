import type { CompiledUnit } from "../compiler/compiler.js";
import { SiteScriptError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { WidgetList } from "../extensions/widgets.js";
import { RESERVED_GLOBALS, createHostGlobals, type HostEnvironment } from "./host.js";
import { InterpreterInstance } from "./instance.js";
import { StatePool } from "./pool.js";
import { RegistryHolder } from "./registry.js";

export interface PoolSettings {
  maxIdlePerPath?: number;
  idleTimeoutMs?: number;
}

export interface RuntimeContextOptions {
  host: Omit<HostEnvironment, "logger">;
  pool?: PoolSettings;
  /** Default deadline for a dispatch; 0 waits indefinitely. */
  dispatchTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Long-lived owner of the registry, the interpreter pool and the widget list.
 * Passed explicitly to the dispatcher and the extension resolver.
 */
export class RuntimeContext {
  readonly registry = new RegistryHolder();
  readonly widgets = new WidgetList();
  readonly pool: StatePool;
  readonly logger: Logger;
  readonly dispatchTimeoutMs: number;

  private readonly host: HostEnvironment;
  private readonly now: () => number;

  constructor(options: RuntimeContextOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.dispatchTimeoutMs = Math.max(0, options.dispatchTimeoutMs ?? 0);
    this.host = { ...options.host, logger: this.logger };

    for (const name of RESERVED_GLOBALS) {
      if (this.host.globals && Object.hasOwn(this.host.globals, name)) {
        throw new SiteScriptError(
          "HOST_GLOBAL_RESERVED",
          `globals cannot register reserved host name "${name}".`
        );
      }
    }

    this.pool = new StatePool({
      createInstance: (unit) => this.createInstance(unit),
      maxIdlePerPath: options.pool?.maxIdlePerPath,
      idleTimeoutMs: options.pool?.idleTimeoutMs,
      now: this.now,
      logger: this.logger,
    });
  }

  get database(): HostEnvironment["database"] {
    return this.host.database;
  }

  /** Builds an uninitialized instance with the host globals installed. */
  createInstance(unit: CompiledUnit): InterpreterInstance {
    return new InterpreterInstance(unit, (instance) => createHostGlobals(this.host, instance), this.now());
  }

  /** Drops idle instances whose unit is no longer published for their path. */
  pruneStaleInstances(): number {
    return this.pool.retain((_path, instance) => this.registry.isCurrent(instance.unit));
  }
}
