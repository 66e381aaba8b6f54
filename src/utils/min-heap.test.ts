import { describe, it, expect } from 'vitest';
import { MinHeap } from './min-heap';

describe('MinHeap', () => {
  it('pops values in ascending priority', () => {
    const heap = new MinHeap<number>(n => n);
    [5, 3, 8, 1, 9, 2, 7].forEach(n => heap.push(n));

    const out: number[] = [];
    let next = heap.pop();
    while (next !== undefined) {
      out.push(next);
      next = heap.pop();
    }
    expect(out).toEqual([1, 2, 3, 5, 7, 8, 9]);
  });

  it('orders objects by the derived priority', () => {
    const heap = new MinHeap<{ name: string; rank: number }>(v => v.rank);
    heap.push({ name: 'c', rank: 2 });
    heap.push({ name: 'a', rank: 0 });
    heap.push({ name: 'b', rank: 1 });

    expect(heap.peek()?.name).toBe('a');
    expect(heap.pop()?.name).toBe('a');
    expect(heap.pop()?.name).toBe('b');
    expect(heap.size()).toBe(1);
  });

  it('returns undefined when empty', () => {
    const heap = new MinHeap<number>(n => n);
    expect(heap.pop()).toBeUndefined();
    expect(heap.peek()).toBeUndefined();
    expect(heap.size()).toBe(0);
  });
});
