/**
 * Resolution state of one association on one entity instance.
 */
export type SlotState<V> =
  | { readonly status: 'unresolved' }
  | { readonly status: 'resolving'; readonly promise: Promise<V> }
  | { readonly status: 'resolved'; readonly value: V }
  | { readonly status: 'failed'; readonly error: unknown };

/**
 * Memoizes one asynchronous resolution.
 *
 * `unresolved → resolving → resolved | failed`. Concurrent callers during
 * `resolving` share the in-flight promise. A failure is rethrown on every
 * call until `reset()`. A resolution that settles after a reset is discarded.
 */
export class CacheSlot<V> {
  private state: SlotState<V> = { status: 'unresolved' };
  private generation = 0;

  constructor(private readonly resolver: () => Promise<V>) {}

  get status(): SlotState<V>['status'] {
    return this.state.status;
  }

  get isResolved(): boolean {
    return this.state.status === 'resolved';
  }

  /** Resolved value, or `undefined` until resolved */
  get value(): V | undefined {
    return this.state.status === 'resolved' ? this.state.value : undefined;
  }

  resolve(): Promise<V> {
    switch (this.state.status) {
      case 'resolved':
        return Promise.resolve(this.state.value);
      case 'failed':
        return Promise.reject(this.state.error);
      case 'resolving':
        return this.state.promise;
      case 'unresolved':
        return this.start();
    }
  }

  /** Forget the value or error */
  reset(): void {
    this.generation += 1;
    this.state = { status: 'unresolved' };
  }

  private start(): Promise<V> {
    const generation = this.generation;
    const promise = this.resolver().then(
      (value) => {
        if (generation === this.generation) {
          this.state = { status: 'resolved', value };
        }
        return value;
      },
      (error: unknown) => {
        if (generation === this.generation) {
          this.state = { status: 'failed', error };
        }
        throw error;
      },
    );
    this.state = { status: 'resolving', promise };
    return promise;
  }
}
