import type { CompiledUnit } from "../compiler/compiler.js";
import { PoolColdStartError, SiteScriptError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { normalizeVirtualPath } from "../core/paths.js";
import type { InterpreterInstance } from "./instance.js";

export interface StatePoolOptions {
  createInstance: (unit: CompiledUnit) => InterpreterInstance;
  /** Idle instances kept per path; 0 keeps every returned instance. */
  maxIdlePerPath?: number;
  /** Idle instances older than this are dropped on the next checkout of their path; 0 never expires. */
  idleTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Per-path LIFO stacks of idle interpreter instances. Checkout and checkin are
 * synchronous, so each one completes on the event loop without interleaving
 * with another; an instance is handed to one caller at a time.
 */
export class StatePool {
  private readonly idle = new Map<string, InterpreterInstance[]>();
  private readonly checkedOut = new Set<InterpreterInstance>();
  private readonly createInstance: (unit: CompiledUnit) => InterpreterInstance;
  private readonly maxIdlePerPath: number;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: StatePoolOptions) {
    this.createInstance = options.createInstance;
    this.maxIdlePerPath = Math.max(0, options.maxIdlePerPath ?? 0);
    this.idleTimeoutMs = Math.max(0, options.idleTimeoutMs ?? 0);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get activeCount(): number {
    return this.checkedOut.size;
  }

  idleCount(virtualPath?: string): number {
    if (virtualPath !== undefined) {
      return this.idle.get(normalizeVirtualPath(virtualPath))?.length ?? 0;
    }
    let total = 0;
    for (const stack of this.idle.values()) {
      total += stack.length;
    }
    return total;
  }

  isCheckedOut(instance: InterpreterInstance): boolean {
    return this.checkedOut.has(instance);
  }

  checkout(virtualPath: string, unit: CompiledUnit): InterpreterInstance {
    const key = normalizeVirtualPath(virtualPath);
    this.expire(key, this.now());
    const stack = this.idle.get(key);
    while (stack && stack.length > 0) {
      const candidate = stack.pop();
      if (!candidate) {
        break;
      }
      if (candidate.unit !== unit) {
        this.logger.debug(`Dropping stale instance ${candidate.id} for ${key}`);
        continue;
      }
      return this.lease(candidate);
    }

    const instance = this.createInstance(unit);
    try {
      instance.initialize();
    } catch (error) {
      throw new PoolColdStartError(key, error);
    }
    return this.lease(instance);
  }

  checkin(instance: InterpreterInstance, virtualPath: string): void {
    if (!this.checkedOut.delete(instance)) {
      throw new SiteScriptError(
        "POOL_NOT_CHECKED_OUT",
        `Instance ${instance.id} is not checked out of the pool.`
      );
    }
    instance.transactionOpen = false;
    instance.lastUsedAt = this.now();
    this.store(normalizeVirtualPath(virtualPath), instance);
  }

  /** Forgets a checked-out instance without returning it, e.g. after a timeout. */
  discard(instance: InterpreterInstance): void {
    this.checkedOut.delete(instance);
  }

  /** Adds an instance that was initialized outside the pool to the idle stack. */
  seed(virtualPath: string, instance: InterpreterInstance): void {
    if (this.checkedOut.has(instance)) {
      throw new SiteScriptError(
        "POOL_SEED_CHECKED_OUT",
        `Instance ${instance.id} is checked out and cannot be seeded.`
      );
    }
    instance.transactionOpen = false;
    instance.lastUsedAt = this.now();
    this.store(normalizeVirtualPath(virtualPath), instance);
  }

  /** Drops idle instances rejected by `keep`; returns how many were dropped. */
  retain(keep: (virtualPath: string, instance: InterpreterInstance) => boolean): number {
    let dropped = 0;
    for (const [key, stack] of this.idle) {
      const kept = stack.filter((instance) => keep(key, instance));
      dropped += stack.length - kept.length;
      if (kept.length === 0) {
        this.idle.delete(key);
      } else {
        this.idle.set(key, kept);
      }
    }
    return dropped;
  }

  evictIdle(now: number = this.now()): number {
    let evicted = 0;
    for (const key of [...this.idle.keys()]) {
      evicted += this.expire(key, now);
    }
    return evicted;
  }

  clear(): void {
    this.idle.clear();
  }

  private lease(instance: InterpreterInstance): InterpreterInstance {
    instance.lastUsedAt = this.now();
    this.checkedOut.add(instance);
    return instance;
  }

  private store(key: string, instance: InterpreterInstance): void {
    let stack = this.idle.get(key);
    if (!stack) {
      stack = [];
      this.idle.set(key, stack);
    }
    if (stack.includes(instance)) {
      return;
    }
    if (this.maxIdlePerPath > 0 && stack.length >= this.maxIdlePerPath) {
      this.logger.debug(`Idle capacity reached for ${key}; dropping instance ${instance.id}`);
      return;
    }
    stack.push(instance);
  }

  private expire(key: string, now: number): number {
    if (this.idleTimeoutMs === 0) {
      return 0;
    }
    const stack = this.idle.get(key);
    if (!stack) {
      return 0;
    }
    const fresh = stack.filter((instance) => now - instance.lastUsedAt < this.idleTimeoutMs);
    const expired = stack.length - fresh.length;
    if (fresh.length === 0) {
      this.idle.delete(key);
    } else {
      this.idle.set(key, fresh);
    }
    return expired;
  }
}
