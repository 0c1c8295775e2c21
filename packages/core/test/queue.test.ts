import { describe, it, expect } from 'vitest';
import { Queue } from '../src/utils/Queue.js';

describe('Queue', () => {
  it('dequeues in insertion order', () => {
    const queue = new Queue<string>(['a', 'b']);
    queue.enqueue('c');

    expect(queue.size).toBe(3);
    expect([queue.dequeue(), queue.dequeue(), queue.dequeue()]).toEqual(['a', 'b', 'c']);
  });

  it('returns undefined once empty', () => {
    const queue = new Queue<number>();

    expect(queue.size).toBe(0);
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.size).toBe(0);
  });

  it('keeps order across compaction', () => {
    const queue = new Queue<number>();
    for (let i = 0; i < 3000; i++) queue.enqueue(i);

    const drained: number[] = [];
    for (let i = 0; i < 2000; i++) {
      const item = queue.dequeue();
      if (item !== undefined) drained.push(item);
    }
    queue.enqueue(3000);

    expect(drained[1999]).toBe(1999);
    expect(queue.size).toBe(1001);
    expect(queue.dequeue()).toBe(2000);
  });
});
