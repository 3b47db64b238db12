import type { Entity } from '../entity.js';
import type { RequestParams } from '../net/request.js';
import type { CacheSlot } from './cache-slot.js';

/**
 * Lazy handle on one association of one entity. Awaiting it resolves the
 * association once and serves the cached value afterwards.
 *
 * @example
 * ```typescript
 * const list = await card.list;   // GET /lists/{idList}
 * const again = await card.list;  // cached, no request
 * await card.list.reload();       // GET again
 * ```
 */
export class AssociationProxy<V> implements PromiseLike<V> {
  /**
   * @param precondition - runs before every resolution; a throw rejects the
   *   load without reaching the slot
   */
  constructor(
    protected readonly slot: CacheSlot<V>,
    protected readonly precondition: () => unknown = () => undefined,
  ) {}

  /** Resolve, or return the cached value */
  async load(): Promise<V> {
    this.precondition();
    return this.slot.resolve();
  }

  /** Drop the cached value or error and resolve again */
  async reload(): Promise<V> {
    this.precondition();
    this.slot.reset();
    return this.slot.resolve();
  }

  /** Drop the cached value or error without resolving */
  reset(): void {
    this.slot.reset();
  }

  get isLoaded(): boolean {
    return this.slot.isResolved;
  }

  /** Cached value, `undefined` until loaded */
  get value(): V | undefined {
    return this.slot.value;
  }

  then<R1 = V, R2 = never>(
    onfulfilled?: ((value: V) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    return this.load().then(onfulfilled, onrejected);
  }
}

/**
 * Has-many handle. `where` queries bypass the cache entirely.
 */
export class MultiAssociation<T extends Entity> extends AssociationProxy<readonly T[]> {
  constructor(
    slot: CacheSlot<readonly T[]>,
    private readonly query: (params: RequestParams) => Promise<T[]>,
    precondition?: () => unknown,
  ) {
    super(slot, precondition);
  }

  /**
   * Fetch with extra query parameters, e.g. `{ filter: 'closed' }`. Always
   * issues a request and never reads or fills the cached collection.
   */
  where(params: RequestParams): Promise<T[]> {
    return this.query(params);
  }
}
