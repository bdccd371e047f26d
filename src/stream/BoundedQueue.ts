/**
 * FIFO with a fixed capacity. Pushing onto a full queue evicts the oldest
 * item, which is returned to the caller.
 */
export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length > this.capacity) return this.items.shift();
    return undefined;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }
}
