/**
 * Fixed-capacity FIFO ring buffer that drops its oldest item on overflow
 */
export class BoundedQueue<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private length = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Queue capacity must be a positive integer');
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.length;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  get isFull(): boolean {
    return this.length === this.capacity;
  }

  /**
   * Append an item
   *
   * @returns the evicted oldest item when the queue was full
   */
  push(item: T): { evicted: true; item: T } | { evicted: false } {
    if (this.isFull) {
      const oldest = this.slots[this.head];
      this.slots[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
      return oldest === undefined ? { evicted: false } : { evicted: true, item: oldest };
    }

    this.slots[(this.head + this.length) % this.capacity] = item;
    this.length++;
    return { evicted: false };
  }

  shift(): T | undefined {
    if (this.length === 0) {
      return undefined;
    }
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length--;
    return item;
  }

  /**
   * Remove and return every queued item, oldest first
   */
  drain(): T[] {
    const items: T[] = [];
    for (let item = this.shift(); item !== undefined; item = this.shift()) {
      items.push(item);
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }
}
