/**
 * Fixed-capacity FIFO store. Appending to a full buffer evicts the oldest
 * item; survivors keep insertion order.
 */
export class BoundedBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedBuffer.capacity must be an integer >= 1 (got ${capacity})`);
    }
  }

  /** Returns the evicted item, if the append pushed one out. */
  push(item: T): T | undefined {
    const evicted = this.items.length === this.capacity ? this.items.shift() : undefined;
    this.items.push(item);
    return evicted;
  }

  get size() {
    return this.items.length;
  }

  isFull() {
    return this.items.length === this.capacity;
  }

  /** Oldest first. The returned array is a copy. */
  toArray(): T[] {
    return this.items.slice();
  }

  clear() {
    this.items = [];
  }
}
