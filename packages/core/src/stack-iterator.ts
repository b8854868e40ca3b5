import { SENTINEL } from './constants.js';
import { StaleIteratorError } from './errors.js';
import type { NodePool } from './node-pool.js';

/** Iterator over one stack that cannot write values back. Returned by `cbegin`/`cend`. */
export interface ReadonlyStackIterator<T> extends IterableIterator<T> {
  /** Index of the node under the cursor; 0 once exhausted. */
  readonly index: number;
  readonly done: boolean;
  readonly current: T;
  advance(): ReadonlyStackIterator<T>;
  equals(other: ReadonlyStackIterator<T>): boolean;
}

/**
 * Forward-only cursor over one stack of a NodePool, most recent push first.
 *
 * The iterator borrows the pool: it records the pool's generation when it is
 * created and throws StaleIteratorError once the pool has released any node
 * (`pop`, `freeStack`, `clear`). Pushes do not invalidate it.
 *
 * Also implements the JS iteration protocol, so it can be spread or used in
 * `for...of`. Iterating consumes it; start again with `pool.begin(head)`.
 */
export class StackIterator<T> implements ReadonlyStackIterator<T> {
  private readonly pool: NodePool<T>;
  private readonly generation: number;
  private cursor: number;

  constructor(pool: NodePool<T>, start: number) {
    this.pool = pool;
    this.generation = pool.generation;
    this.cursor = start;
  }

  get index(): number {
    return this.cursor;
  }

  get done(): boolean {
    return this.cursor === SENTINEL;
  }

  /** Value under the cursor. Throws InvalidIndexError once exhausted. */
  get current(): T {
    this.assertFresh('current');
    return this.pool.value(this.cursor);
  }

  set current(value: T) {
    this.assertFresh('current');
    this.pool.setValue(this.cursor, value);
  }

  /** Step to the next node. Throws InvalidIndexError once exhausted. */
  advance(): this {
    this.assertFresh('advance');
    this.cursor = this.pool.next(this.cursor);
    return this;
  }

  /**
   * True when both iterators walk the same pool and sit on the same index.
   * Exhausted iterators are always equal, whichever pool they came from.
   */
  equals(other: ReadonlyStackIterator<T>): boolean {
    if (this.cursor === SENTINEL || other.index === SENTINEL) {
      return this.cursor === other.index;
    }
    return other instanceof StackIterator && other.pool === this.pool && other.cursor === this.cursor;
  }

  next(): IteratorResult<T> {
    if (this.cursor === SENTINEL) {
      return { done: true, value: undefined };
    }
    const value = this.current;
    this.advance();
    return { done: false, value };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private assertFresh(operation: string): void {
    if (this.pool.generation !== this.generation) {
      throw new StaleIteratorError(operation);
    }
  }
}
