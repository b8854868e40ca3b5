export { NodePool, type NodePoolOptions } from './node-pool.js';
export { StackIterator, type ReadonlyStackIterator } from './stack-iterator.js';
export { SENTINEL, EMPTY_STACK, MAX_NODES, MIN_GROWTH } from './constants.js';
export {
  InvalidIndexError,
  EmptyStackError,
  AllocationError,
  StaleIteratorError,
} from './errors.js';
