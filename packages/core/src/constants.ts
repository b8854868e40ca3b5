/** Reserved index meaning "no node": the empty stack, the end of a stack, the empty free list. */
export const SENTINEL = 0;

/** Handle of a stack with no nodes. Same value as SENTINEL. */
export const EMPTY_STACK = SENTINEL;

/** Largest slot count a pool can address with 32-bit links (index 0 is reserved). */
export const MAX_NODES = 0xffffffff;

/** Smallest capacity an append-triggered growth step allocates. */
export const MIN_GROWTH = 4;
