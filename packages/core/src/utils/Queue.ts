/**
 * Array-backed FIFO queue.
 *
 * `Array.prototype.shift` is O(n); this keeps a head cursor instead and
 * compacts the backing array once the consumed prefix dominates it.
 */
export class Queue<T> {
  private items: T[] = [];
  private head = 0;

  constructor(initial: Iterable<T> = []) {
    for (const item of initial) {
      this.enqueue(item);
    }
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the front item, or undefined when empty.
   */
  dequeue(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const item = this.items[this.head];
    this.head++;

    if (this.head >= 1024 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  get size(): number {
    return this.items.length - this.head;
  }
}
