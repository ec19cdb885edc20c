/**
 * Fixed-capacity, insertion-ordered ring buffer.
 *
 * Once full, every `append()` overwrites the oldest slot, so the buffer
 * always holds the `capacity` most recent items in arrival order.
 */
export class UpdateBuffer<T> {
  readonly capacity: number;
  private readonly slots: Array<T | undefined>;
  /** Index of the oldest item. */
  private head = 0;
  private count = 0;

  constructor(capacity: number, initial: Iterable<T> = []) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`UpdateBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity);
    for (const item of initial) this.append(item);
  }

  get length(): number {
    return this.count;
  }

  /**
   * Insert at the tail. Returns the evicted head when the buffer was full.
   */
  append(item: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = item;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  /** Ordered copy, oldest first. */
  snapshot(): T[] {
    const out: T[] = [];
    for (const item of this) out.push(item);
    return out;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) yield item;
    }
  }
}
