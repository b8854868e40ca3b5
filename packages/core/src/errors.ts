/**
 * Errors thrown by NodePool and StackIterator.
 *
 * Index and capacity failures extend RangeError so callers that already
 * guard pool calls with `instanceof RangeError` keep working.
 */

/**
 * Thrown when an index is 0 where a node is required, not an integer, above
 * the pool size, or already released to the free list.
 */
export class InvalidIndexError extends RangeError {
  readonly index: number;

  constructor(operation: string, index: number, size: number, reason?: string) {
    super(`NodePool.${operation}: index ${index} ${reason ?? `is out of range [1, ${size}]`}`);
    this.name = 'InvalidIndexError';
    this.index = index;
  }
}

/** Thrown by `pop` and `peek` on the empty stack handle. */
export class EmptyStackError extends RangeError {
  constructor(operation: string) {
    super(`NodePool.${operation}: stack is empty`);
    this.name = 'EmptyStackError';
  }
}

/**
 * Thrown when the backing store cannot grow to the requested slot count,
 * either because it would pass `maxCapacity` or because the runtime refused
 * the allocation (kept as `cause`).
 */
export class AllocationError extends RangeError {
  readonly requested: number;

  constructor(message: string, requested: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AllocationError';
    this.requested = requested;
  }
}

/** Thrown when an iterator is used after its pool released nodes. */
export class StaleIteratorError extends Error {
  constructor(operation: string) {
    super(`StackIterator.${operation}: pool was modified since the iterator was created`);
    this.name = 'StaleIteratorError';
  }
}
