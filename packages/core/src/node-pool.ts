/**
 * A pool of singly-linked stacks sharing one growable backing store.
 *
 * Nodes are addressed by 1-based integer indices; index 0 is the sentinel
 * (empty stack, end of stack, empty free list). Node `i` lives in slot
 * `i - 1`. The `next` links are stored in a Uint32Array and the values in a
 * plain array, so growing the store never changes an index.
 *
 * Popped nodes are threaded onto a free list through the same links and are
 * recycled by later pushes before the store grows again.
 */

import { MAX_NODES, MIN_GROWTH, SENTINEL } from './constants.js';
import { AllocationError, EmptyStackError, InvalidIndexError } from './errors.js';
import { StackIterator, type ReadonlyStackIterator } from './stack-iterator.js';

export interface NodePoolOptions {
  /** Number of node slots to reserve up front. Default: 0 */
  initialCapacity?: number;
  /** Ceiling on node slots; growing past it throws AllocationError. Default: MAX_NODES */
  maxCapacity?: number;
}

function assertCount(operation: string, name: string, n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`NodePool.${operation}: ${name} must be a non-negative integer, got ${n}`);
  }
}

export class NodePool<T> {
  private links: Uint32Array = new Uint32Array(0);
  private values: T[] = [];
  private count: number = 0;
  private freeHead: number = SENTINEL;
  private freeLength: number = 0;
  private releases: number = 0;
  private readonly limit: number;

  /** Pass a slot count to pre-size the pool, or an options object. */
  constructor(options: number | NodePoolOptions = {}) {
    const resolved: NodePoolOptions = typeof options === 'number' ? { initialCapacity: options } : options;
    const { initialCapacity = 0, maxCapacity = MAX_NODES } = resolved;
    assertCount('constructor', 'maxCapacity', maxCapacity);
    assertCount('constructor', 'initialCapacity', initialCapacity);
    if (maxCapacity > MAX_NODES) {
      throw new RangeError(`NodePool.constructor: maxCapacity ${maxCapacity} exceeds MAX_NODES (${MAX_NODES})`);
    }
    this.limit = maxCapacity;
    if (initialCapacity > 0) {
      this.resize('constructor', initialCapacity);
    }
  }

  /** Number of allocated node slots. Never decreases. */
  get capacity(): number {
    return this.links.length;
  }

  get maxCapacity(): number {
    return this.limit;
  }

  /** Number of nodes ever appended to the store, live or free. Valid indices are `1..size`. */
  get size(): number {
    return this.count;
  }

  /** Number of nodes waiting on the free list. */
  get freeCount(): number {
    return this.freeLength;
  }

  /** Number of nodes currently held by some stack. */
  get liveCount(): number {
    return this.count - this.freeLength;
  }

  /**
   * Bumped by every operation that can release nodes (`pop`, `freeStack`,
   * `clear`). Iterators compare against it to detect that they went stale.
   */
  get generation(): number {
    return this.releases;
  }

  /** Returns the empty stack handle. */
  newStack(): number {
    return SENTINEL;
  }

  isEmpty(head: number): boolean {
    return head === SENTINEL;
  }

  /**
   * Make room for at least `n` nodes without further growth.
   * Never shrinks the store.
   *
   * @throws AllocationError when `n` exceeds `maxCapacity` or cannot be allocated.
   */
  reserve(n: number): void {
    assertCount('reserve', 'n', n);
    if (n > this.links.length) {
      this.resize('reserve', n);
    }
  }

  /** Value stored at a node. */
  value(index: number): T {
    return this.values[this.slotOf('value', index)];
  }

  setValue(index: number, value: T): void {
    this.values[this.slotOf('setValue', index)] = value;
  }

  /** Index of the node after `index`, or 0 at the end of its list. */
  next(index: number): number {
    return this.links[this.slotOf('next', index)];
  }

  /**
   * Relink a node. `next` must be 0 or a valid index; keeping every list
   * acyclic is up to the caller. Invalidates open iterators.
   */
  setNext(index: number, next: number): void {
    const slot = this.slotOf('setNext', index);
    this.assertHandle('setNext', next);
    this.links[slot] = next;
    this.releases += 1;
  }

  /** Value at the head of a non-empty stack. */
  peek(head: number): T {
    if (head === SENTINEL) {
      throw new EmptyStackError('peek');
    }
    return this.values[this.slotOf('peek', head)];
  }

  /**
   * Prepend `value` to the stack headed by `head` and return the new head.
   * Reuses the most recently freed node when there is one; otherwise appends
   * a node, doubling the store if it is full.
   */
  push(value: T, head: number): number {
    this.assertHandle('push', head);

    if (this.freeHead === SENTINEL) {
      if (this.count === this.links.length) {
        this.grow('push');
      }
      this.links[this.count] = head;
      this.values.push(value);
      this.count += 1;
      return this.count;
    }

    const index = this.freeHead;
    const slot = index - 1;
    this.freeHead = this.links[slot];
    this.freeLength -= 1;
    this.values[slot] = value;
    this.links[slot] = head;
    return index;
  }

  /**
   * Detach the head node of a stack, move it onto the free list and return
   * the new head. The node's value stays in place until the node is reused.
   */
  pop(head: number): number {
    if (head === SENTINEL) {
      throw new EmptyStackError('pop');
    }
    const slot = this.slotOf('pop', head);
    this.assertNotFree('pop', head);
    const next = this.links[slot];
    this.links[slot] = this.freeHead;
    this.freeHead = head;
    this.freeLength += 1;
    this.releases += 1;
    return next;
  }

  /**
   * Release every node of a stack to the free list in one pass. Always returns 0.
   * The chain is checked first: one that reaches the free-list head, or is
   * longer than the live node count, is rejected before anything is released.
   */
  freeStack(head: number): number {
    this.assertHandle('freeStack', head);
    if (head !== SENTINEL) {
      this.assertNotFree('freeStack', head);
      const live = this.count - this.freeLength;
      let seen = 0;
      for (let index = head; index !== SENTINEL; index = this.links[index - 1]) {
        seen += 1;
        if (index === this.freeHead || seen > live) {
          throw new InvalidIndexError('freeStack', head, this.count, 'does not head a live stack');
        }
      }
    }
    let index = head;
    while (index !== SENTINEL) {
      const slot = index - 1;
      const next = this.links[slot];
      this.links[slot] = this.freeHead;
      this.freeHead = index;
      this.freeLength += 1;
      index = next;
    }
    if (head !== SENTINEL) {
      this.releases += 1;
    }
    return SENTINEL;
  }

  /** Number of nodes in a stack. */
  length(head: number): number {
    this.assertHandle('length', head);
    let n = 0;
    for (let index = head; index !== SENTINEL; index = this.links[index - 1]) {
      n += 1;
    }
    return n;
  }

  /** Values of a stack, most recently pushed first. */
  toArray(head: number): T[] {
    return Array.from(this.cbegin(head));
  }

  /**
   * Forget every node and the free list. Capacity is kept, so refilling the
   * pool up to its previous size does not grow the store.
   */
  clear(): void {
    // Links past `count` are left as they are; appends overwrite them.
    this.values = [];
    this.count = 0;
    this.freeHead = SENTINEL;
    this.freeLength = 0;
    this.releases += 1;
  }

  /** An independent pool with the same indices, values, free list and capacity. */
  clone(): NodePool<T> {
    const copy = new NodePool<T>({ maxCapacity: this.limit });
    copy.links = this.links.slice();
    copy.values = this.values.slice();
    copy.count = this.count;
    copy.freeHead = this.freeHead;
    copy.freeLength = this.freeLength;
    return copy;
  }

  // ── Iteration ─────────────────────────────────────────────────────────────

  /** Iterator positioned at the head of a stack. */
  begin(head: number): StackIterator<T> {
    this.assertHandle('begin', head);
    return new StackIterator(this, head);
  }

  /** Exhausted iterator; every iterator over this pool equals it once done. */
  end(): StackIterator<T> {
    return new StackIterator(this, SENTINEL);
  }

  cbegin(head: number): ReadonlyStackIterator<T> {
    return this.begin(head);
  }

  cend(): ReadonlyStackIterator<T> {
    return this.end();
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  /** Storage slot of a live index; throws for 0, non-integers and indices past `size`. */
  private slotOf(operation: string, index: number): number {
    if (!Number.isInteger(index) || index < 1 || index > this.count) {
      throw new InvalidIndexError(operation, index, this.count);
    }
    return index - 1;
  }

  /** Accepts the sentinel as well as any valid index. */
  private assertHandle(operation: string, head: number): void {
    if (head !== SENTINEL) {
      this.slotOf(operation, head);
    }
  }

  /**
   * Rejects the most recently freed node, or any node once every node is free.
   * Without a per-node flag this is the double release that can be caught in O(1).
   */
  private assertNotFree(operation: string, index: number): void {
    if (index === this.freeHead || this.freeLength === this.count) {
      throw new InvalidIndexError(operation, index, this.count, 'is already on the free list');
    }
  }

  private grow(operation: string): void {
    const required = this.count + 1;
    const doubled = Math.min(Math.max(this.links.length * 2, MIN_GROWTH), this.limit);
    this.resize(operation, Math.max(required, doubled));
  }

  private resize(operation: string, slots: number): void {
    if (slots > this.limit) {
      throw new AllocationError(
        `NodePool.${operation}: ${slots} slots exceed maxCapacity (${this.limit})`,
        slots,
      );
    }
    let links: Uint32Array;
    try {
      links = new Uint32Array(slots);
    } catch (err) {
      throw new AllocationError(`NodePool.${operation}: could not allocate ${slots} slots`, slots, {
        cause: err,
      });
    }
    links.set(this.links.subarray(0, this.count));
    this.links = links;
  }
}
