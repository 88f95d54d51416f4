import vm from "node:vm";

import type { CompiledUnit } from "../compiler/compiler.js";

export type HostGlobals = Record<string, unknown>;

export type HostGlobalsFactory = (instance: InterpreterInstance) => HostGlobals;

export type EntryFunction = (...args: unknown[]) => unknown;

let instanceCounter = 0;

export class InterpreterInstance {
  readonly id: number;
  readonly unit: CompiledUnit;
  /** Set by the host `db.transaction` binding; the pool clears it on checkin. */
  transactionOpen = false;
  lastUsedAt: number;

  private readonly context: vm.Context;
  private initialized = false;

  constructor(unit: CompiledUnit, hostGlobals: HostGlobalsFactory, now: number = Date.now()) {
    instanceCounter += 1;
    this.id = instanceCounter;
    this.unit = unit;
    this.lastUsedAt = now;

    const sandbox: Record<string, unknown> = Object.create(null);
    for (const [name, value] of Object.entries(hostGlobals(this))) {
      Object.defineProperty(sandbox, name, {
        configurable: false,
        enumerable: true,
        writable: false,
        value,
      });
    }
    this.context = vm.createContext(sandbox, {
      name: unit.virtualPath,
      codeGeneration: {
        strings: false,
        wasm: false,
      },
    });
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /** Runs the unit's top-level code once, declaring its entry functions in this context. */
  initialize(): void {
    if (this.initialized) {
      return;
    }
    this.unit.script.runInContext(this.context);
    this.initialized = true;
  }

  entry(name: string): EntryFunction | undefined {
    const candidate: unknown = this.context[name];
    if (typeof candidate !== "function") {
      return undefined;
    }
    return (...args: unknown[]): unknown => Reflect.apply(candidate, undefined, args);
  }

  readGlobal(name: string): unknown {
    return this.context[name];
  }
}
