import { useRef, useEffect } from 'react';
import { NodePool, type NodePoolOptions } from '@stack-pool/core';

export interface NodePoolHandle<T> {
  pool: NodePool<T>;
  /** Drop every stack in the pool while keeping its capacity (e.g. once per frame or per search). */
  reset: () => void;
}

/** Build a pool handle outside React. `useNodePool` uses this on its first render. */
export function createNodePoolHandle<T>(options: NodePoolOptions = {}): NodePoolHandle<T> {
  const pool = new NodePool<T>(options);
  return {
    pool,
    reset: () => {
      pool.clear();
    },
  };
}

/**
 * Swap a fresh pool into `handle` when the capacity options differ from the
 * ones it was built with. Returns true when the pool was replaced.
 */
export function refreshNodePoolHandle<T>(
  handle: NodePoolHandle<T>,
  built: NodePoolOptions,
  requested: NodePoolOptions,
): boolean {
  if (built.initialCapacity === requested.initialCapacity && built.maxCapacity === requested.maxCapacity) {
    return false;
  }
  const next = createNodePoolHandle<T>(requested);
  handle.pool = next.pool;
  handle.reset = next.reset;
  return true;
}

/**
 * React hook that owns a NodePool for the lifetime of a component. The handle
 * is stable across renders, so stack handles kept in refs or state stay
 * valid. Call `handle.reset()` to recycle every node without reallocating.
 */
export function useNodePool<T>(options: NodePoolOptions = {}): NodePoolHandle<T> {
  const { initialCapacity = 0, maxCapacity } = options;

  const handleRef = useRef<NodePoolHandle<T> | null>(null);
  const builtWith = useRef({ initialCapacity, maxCapacity });

  if (handleRef.current === null) {
    handleRef.current = createNodePoolHandle<T>({ initialCapacity, maxCapacity });
  }

  // Re-create the pool if capacity options change (rare but supported).
  // Stack handles from the old pool are meaningless afterwards.
  useEffect(() => {
    const handle = handleRef.current;
    if (handle === null) return;
    const requested = { initialCapacity, maxCapacity };
    if (refreshNodePoolHandle(handle, builtWith.current, requested)) {
      builtWith.current = requested;
    }
  }, [initialCapacity, maxCapacity]);

  return handleRef.current;
}
