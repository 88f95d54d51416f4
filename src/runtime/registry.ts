import type { CompiledUnit } from "../compiler/compiler.js";
import { normalizeVirtualPath } from "../core/paths.js";
import type { ExtensionKind, UnitLayer } from "../core/types.js";

export class CompiledUnitRegistry {
  private readonly units: ReadonlyMap<string, CompiledUnit>;

  constructor(entries: Iterable<readonly [string, CompiledUnit]> = []) {
    const units = new Map<string, CompiledUnit>();
    for (const [virtualPath, unit] of entries) {
      units.set(normalizeVirtualPath(virtualPath), unit);
    }
    this.units = units;
  }

  get size(): number {
    return this.units.size;
  }

  get(virtualPath: string): CompiledUnit | undefined {
    return this.units.get(normalizeVirtualPath(virtualPath));
  }

  has(virtualPath: string): boolean {
    return this.units.has(normalizeVirtualPath(virtualPath));
  }

  paths(): string[] {
    return [...this.units.keys()].sort();
  }
}

export interface RegistrySnapshot {
  readonly version: number;
  readonly primary: CompiledUnitRegistry;
  readonly extensions: Readonly<Record<ExtensionKind, CompiledUnitRegistry>>;
}

export interface UnitLookup {
  unit: CompiledUnit;
  layer: UnitLayer;
}

const lookupIn = (snapshot: RegistrySnapshot, virtualPath: string): UnitLookup | undefined => {
  const fromExtension = snapshot.extensions.page.get(virtualPath) ?? snapshot.extensions.widget.get(virtualPath);
  if (fromExtension) {
    return { unit: fromExtension, layer: "extension" };
  }
  const fromPrimary = snapshot.primary.get(virtualPath);
  return fromPrimary ? { unit: fromPrimary, layer: "primary" } : undefined;
};

/**
 * Holds the published registry snapshot. Rebuilds construct a new snapshot
 * aside and swap the reference, so readers never observe a half-merged state.
 */
export class RegistryHolder {
  private snapshot: RegistrySnapshot = {
    version: 0,
    primary: new CompiledUnitRegistry(),
    extensions: {
      page: new CompiledUnitRegistry(),
      widget: new CompiledUnitRegistry(),
    },
  };

  current(): RegistrySnapshot {
    return this.snapshot;
  }

  lookup(virtualPath: string): UnitLookup | undefined {
    return lookupIn(this.snapshot, virtualPath);
  }

  /** True when `unit` is what a lookup of its own path resolves to right now. */
  isCurrent(unit: CompiledUnit): boolean {
    return this.lookup(unit.virtualPath)?.unit === unit;
  }

  replacePrimary(registry: CompiledUnitRegistry): RegistrySnapshot {
    this.snapshot = {
      version: this.snapshot.version + 1,
      primary: registry,
      extensions: this.snapshot.extensions,
    };
    return this.snapshot;
  }

  replaceExtensions(kind: ExtensionKind, registry: CompiledUnitRegistry): RegistrySnapshot {
    this.snapshot = {
      version: this.snapshot.version + 1,
      primary: this.snapshot.primary,
      extensions: { ...this.snapshot.extensions, [kind]: registry },
    };
    return this.snapshot;
  }
}
