import { ArgumentTypeError, BindingNotFoundError } from "../core/errors.js";
import type { WorldData } from "../core/types.js";
import type { Queryable } from "../data/database.js";
import { describeValue } from "./arguments.js";
import type { ColumnCatalog } from "./catalog.js";

export interface BridgeServices {
  db: Queryable;
  catalog: ColumnCatalog;
  world: WorldData;
  /** Current unix time in seconds. */
  nowSeconds: () => number;
}

export interface HandleSource<TEntity, TFields> {
  entityName: string;
  keyOf: (entity: TEntity) => number;
  project: (entity: TEntity) => TFields;
  reload: (entity: TEntity) => Promise<TEntity | null>;
}

/**
 * Pairs a live entity with a frozen snapshot of its exported fields. Methods
 * read the live entity; `fields` may lag until `refresh` runs, which every
 * mutation does before resolving.
 */
export class DomainHandle<TEntity, TFields> {
  private entity: TEntity;
  private snapshot: Readonly<TFields>;

  constructor(
    entity: TEntity,
    private readonly source: HandleSource<TEntity, TFields>
  ) {
    this.entity = entity;
    this.snapshot = Object.freeze(source.project(entity));
  }

  get fields(): Readonly<TFields> {
    return this.snapshot;
  }

  protected get live(): TEntity {
    return this.entity;
  }

  async refresh(): Promise<this> {
    const next = await this.source.reload(this.entity);
    if (!next) {
      throw new BindingNotFoundError(this.source.entityName, this.source.keyOf(this.entity));
    }
    this.entity = next;
    this.snapshot = Object.freeze(this.source.project(next));
    return this;
  }

  protected async mutate<T>(work: () => Promise<T>): Promise<T> {
    const result = await work();
    await this.refresh();
    return result;
  }
}

export interface EntityFinders<TEntity> {
  byId: (id: number) => Promise<TEntity | null>;
  byName: (name: string) => Promise<TEntity | null>;
}

export const loadByIdOrName = async <TEntity>(
  entityName: string,
  method: string,
  idOrName: unknown,
  finders: EntityFinders<TEntity>
): Promise<TEntity> => {
  let entity: TEntity | null;
  let key: string | number;
  if (typeof idOrName === "number" && Number.isInteger(idOrName)) {
    key = idOrName;
    entity = await finders.byId(idOrName);
  } else if (typeof idOrName === "string" && idOrName.length > 0) {
    key = idOrName;
    entity = await finders.byName(idOrName);
  } else {
    throw new ArgumentTypeError(method, 1, `${entityName} id or name`, describeValue(idOrName));
  }
  if (entity === null) {
    throw new BindingNotFoundError(entityName, key);
  }
  return entity;
};
