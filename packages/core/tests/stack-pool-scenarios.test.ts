import { describe, it, expect } from 'vitest';
import { NodePool, EMPTY_STACK } from '../src/index.js';

describe('NodePool – push, pop, reuse, free walkthrough', () => {
  const pool = new NodePool<number>();
  const h0 = pool.newStack();
  const h1 = pool.push(1, h0);
  const h2 = pool.push(2, h1);
  let capacityBeforeReuse = 0;
  let h4 = 0;

  it('iterating the second head yields both values newest first', () => {
    expect(h0).toBe(EMPTY_STACK);
    expect([...pool.begin(h2)]).toEqual([2, 1]);
  });

  it('pop returns the previous head and frees one node', () => {
    const h3 = pool.pop(h2);
    expect(h3).toBe(h1);
    expect(pool.freeCount).toBe(1);
  });

  it('the next push reuses the freed node without growing', () => {
    capacityBeforeReuse = pool.capacity;
    h4 = pool.push(3, h0);
    expect(h4).toBe(h2);
    expect(pool.capacity).toBe(capacityBeforeReuse);
    expect(pool.toArray(h4)).toEqual([3]);
  });

  it('freeing both stacks leaves two free nodes', () => {
    expect(pool.freeStack(h1)).toBe(0);
    expect(pool.isEmpty(0)).toBe(true);
    expect(pool.freeStack(h4)).toBe(0);
    expect(pool.freeCount).toBe(2);
    expect(pool.liveCount).toBe(0);
  });
});

describe('NodePool – reserve up front', () => {
  it('100 pushes after reserve(100) never grow the store', () => {
    const pool = new NodePool<number>();
    pool.reserve(100);
    expect(pool.capacity).toBeGreaterThanOrEqual(100);

    let h = pool.newStack();
    for (let i = 0; i < 100; i++) {
      h = pool.push(i, h);
      expect(pool.capacity).toBe(100);
    }
    pool.push(100, h);
    expect(pool.capacity).toBe(200);
  });
});

describe('NodePool – traversal frontier', () => {
  it('drives a depth-first search with one recycled frontier stack', () => {
    const graph: Record<string, string[]> = {
      a: ['b', 'c'],
      b: ['d'],
      c: ['d', 'e'],
      d: [],
      e: [],
    };
    const pool = new NodePool<string>();
    let frontier = pool.push('a', pool.newStack());
    const seen = new Set<string>();
    const order: string[] = [];

    while (!pool.isEmpty(frontier)) {
      const node = pool.peek(frontier);
      frontier = pool.pop(frontier);
      if (seen.has(node)) continue;
      seen.add(node);
      order.push(node);
      for (const neighbour of graph[node] ?? []) {
        frontier = pool.push(neighbour, frontier);
      }
    }

    expect(order).toEqual(['a', 'c', 'e', 'd', 'b']);
    // Never more than three nodes were live at once.
    expect(pool.size).toBe(3);
    expect(pool.capacity).toBe(4);
    expect(pool.liveCount).toBe(0);
  });

  it('keeps many short-lived stacks in one store', () => {
    const pool = new NodePool<number>();
    const heads: number[] = [];
    for (let s = 0; s < 50; s++) {
      let h = pool.newStack();
      for (let i = 0; i <= s % 5; i++) h = pool.push(s * 10 + i, h);
      heads.push(h);
    }
    const liveBefore = pool.liveCount;
    const capacityBefore = pool.capacity;

    // Drop every other stack and rebuild the same shape; freed nodes absorb it.
    for (let s = 0; s < 50; s += 2) {
      heads[s] = pool.freeStack(heads[s]);
    }
    for (let s = 0; s < 50; s += 2) {
      let h = pool.newStack();
      for (let i = 0; i <= s % 5; i++) h = pool.push(-(i + 1), h);
      heads[s] = h;
    }

    expect(pool.liveCount).toBe(liveBefore);
    expect(pool.capacity).toBe(capacityBefore);
    expect(pool.toArray(heads[7])).toEqual([72, 71, 70]);
    expect(pool.toArray(heads[4])).toEqual([-5, -4, -3, -2, -1]);
  });
});
