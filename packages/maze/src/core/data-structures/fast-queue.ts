/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed with a moving head; the backing array is compacted once
 * more than half of it has been consumed.
 *
 * @example
 * ```typescript
 * const queue = FastQueue.from([1, 2]);
 * queue.dequeue();  // 1
 * queue.dequeue();  // 2
 * queue.dequeue();  // undefined
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item, or undefined if empty.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1024 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    if (this.isEmpty) return undefined;
    return this.items[this.head];
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}
