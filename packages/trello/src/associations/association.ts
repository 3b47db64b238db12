import { NotFoundError, NotSavedError } from '@trellis/errors';
import type { Entity, EntityClass } from '../entity.js';
import type { RequestParams } from '../net/request.js';
import { CacheSlot } from './cache-slot.js';
import { fetchMany, fetchOne } from './fetcher.js';
import { AssociationProxy, MultiAssociation } from './proxy.js';

/**
 * @fileoverview Class-level association declarations.
 *
 * A declaration is created once per entity type and keeps one cache slot per
 * owning instance. Slots live in a `WeakMap`, so they go away with the entity.
 * @packageDocumentation
 */

/** Deferred target, so entity modules can reference each other */
export type TargetThunk<T extends Entity> = () => EntityClass<T>;

export interface HasOneOptions {
  /** Foreign-key attribute; fetches `/{target}/{value}` */
  via?: string;
  /** Nested segment; fetches `/{owner}/{ownerId}/{path}`. Defaults to the association name. */
  path?: string;
  params?: RequestParams;
  /** Resolve an empty answer or unset foreign key to `undefined` instead of failing */
  optional?: boolean;
}

export interface HasManyOptions {
  /** Nested segment under the owner. Defaults to the target's resource path. */
  path?: string;
  /** Fixed query parameters, merged under any `where` parameters */
  params?: RequestParams;
}

/**
 * Shared part of every declaration: the per-instance cache slots.
 */
export abstract class Association<T extends Entity, V> {
  private readonly slots = new WeakMap<Entity, CacheSlot<V>>();

  protected constructor(
    readonly name: string,
    protected readonly target: TargetThunk<T>,
  ) {}

  /** Cache slot of this association on `owner`, created on first use */
  protected slotFor(owner: Entity): CacheSlot<V> {
    let slot = this.slots.get(owner);
    if (!slot) {
      slot = new CacheSlot(() => this.fetch(owner));
      this.slots.set(owner, slot);
    }
    return slot;
  }

  /**
   * Id of `owner`, needed before anything nested under it can load.
   * Checked outside the cache slot so an unsaved owner never caches a failure.
   * @throws NotSavedError when the owner has no id
   */
  protected ownerId(owner: Entity): string {
    const id = owner.id;
    if (id === undefined) {
      throw new NotSavedError(owner.definition.name, `load ${this.name} for`);
    }
    return id;
  }

  /** `/{owner}/{ownerId}/{segment}` */
  protected nestedPath(owner: Entity, segment: string): string {
    return `/${owner.definition.path}/${encodeURIComponent(this.ownerId(owner))}/${segment}`;
  }

  protected abstract fetch(owner: Entity): Promise<V>;
}

/**
 * Single related entity.
 */
export abstract class SingleAssociation<T extends Entity, V extends T | undefined> extends Association<T, V> {
  /** Foreign key each owner's slot was last resolved with */
  private readonly keys = new WeakMap<Entity, unknown>();

  constructor(
    name: string,
    target: TargetThunk<T>,
    protected readonly options: HasOneOptions,
  ) {
    super(name, target);
  }

  /**
   * Proxy over `owner`'s cache slot. A slot resolved through a foreign key
   * that has since changed is reset first.
   */
  of(owner: Entity): AssociationProxy<V> {
    const slot = this.slotFor(owner);
    const via = this.options.via;

    if (via === undefined) {
      return new AssociationProxy(slot, () => this.ownerId(owner));
    }
    if (this.keys.has(owner) && this.keys.get(owner) !== owner.read(via)) {
      this.keys.delete(owner);
      slot.reset();
    }
    return new AssociationProxy(slot);
  }

  /** Fetch the target, `undefined` when the answer is empty or the foreign key is unset */
  protected async lookup(owner: Entity): Promise<T | undefined> {
    const target = this.target();
    let path: string;

    if (this.options.via !== undefined) {
      const key = owner.read(this.options.via);
      this.keys.set(owner, key);
      if (typeof key !== 'string' || key === '') {
        return undefined;
      }
      path = `/${target.definition.path}/${encodeURIComponent(key)}`;
    } else {
      path = this.nestedPath(owner, this.options.path ?? this.name);
    }

    return fetchOne(owner.client, target, path, this.options.params);
  }
}

/**
 * Required has-one: an empty answer is a `NotFoundError`.
 */
export class HasOne<T extends Entity> extends SingleAssociation<T, T> {
  protected async fetch(owner: Entity): Promise<T> {
    const value = await this.lookup(owner);
    if (value === undefined) {
      throw new NotFoundError(`${this.name} of ${owner.definition.name} ${owner.id ?? '(unsaved)'}`);
    }
    return value;
  }
}

/**
 * Optional has-one: an empty answer resolves to `undefined`.
 */
export class OptionalHasOne<T extends Entity> extends SingleAssociation<T, T | undefined> {
  protected fetch(owner: Entity): Promise<T | undefined> {
    return this.lookup(owner);
  }
}

/**
 * Ordered related collection.
 */
export class HasMany<T extends Entity> extends Association<T, readonly T[]> {
  constructor(
    name: string,
    target: TargetThunk<T>,
    private readonly options: HasManyOptions = {},
  ) {
    super(name, target);
  }

  /** Proxy over `owner`'s cache slot */
  of(owner: Entity): MultiAssociation<T> {
    return new MultiAssociation(
      this.slotFor(owner),
      (params) => this.query(owner, params),
      () => this.ownerId(owner),
    );
  }

  protected async fetch(owner: Entity): Promise<readonly T[]> {
    return Object.freeze(await this.query(owner, {}));
  }

  private async query(owner: Entity, params: RequestParams): Promise<T[]> {
    const target = this.target();
    const path = this.nestedPath(owner, this.options.path ?? target.definition.path);
    return fetchMany(owner.client, target, path, { ...this.options.params, ...params });
  }
}

/**
 * Declare a has-one association.
 *
 * @example
 * ```typescript
 * static readonly associations = {
 *   list: hasOne('list', () => List, { via: 'idList' }),
 *   organization: hasOne('organization', () => Organization, { via: 'idOrganization', optional: true }),
 * };
 * ```
 */
export function hasOne<T extends Entity>(
  name: string,
  target: TargetThunk<T>,
  options: HasOneOptions & { optional: true },
): OptionalHasOne<T>;
export function hasOne<T extends Entity>(
  name: string,
  target: TargetThunk<T>,
  options?: HasOneOptions & { optional?: false },
): HasOne<T>;
export function hasOne<T extends Entity>(
  name: string,
  target: TargetThunk<T>,
  options: HasOneOptions = {},
): HasOne<T> | OptionalHasOne<T> {
  return options.optional
    ? new OptionalHasOne(name, target, options)
    : new HasOne(name, target, options);
}

/**
 * Declare a has-many association.
 */
export function hasMany<T extends Entity>(
  name: string,
  target: TargetThunk<T>,
  options?: HasManyOptions,
): HasMany<T> {
  return new HasMany(name, target, options);
}
