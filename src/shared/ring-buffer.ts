/**
 * Fixed-capacity ring buffer.
 *
 * Pushing into a full buffer silently drops the oldest entry. Used for the walker undo history and
 * for the session's buffer of typed characters.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring buffer capacity must be a positive integer (got ${capacity})`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(value: T): void {
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count += 1;
    }
  }

  /** Removes and returns the newest entry; `undefined` when empty. */
  pop(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    this.head = (this.head - 1 + this.capacity) % this.capacity;
    this.count -= 1;
    const value = this.slots[this.head];
    this.slots[this.head] = undefined;
    return value;
  }

  /** Newest entry without removing it. */
  peek(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.slots[(this.head - 1 + this.capacity) % this.capacity];
  }

  /**
   * The newest `length` entries, oldest first. `length` is clamped to the current size.
   */
  ending(length: number): T[] {
    const take = Math.max(0, Math.min(length, this.count));
    const result: T[] = [];
    for (let offset = take; offset > 0; offset--) {
      const value = this.slots[(this.head - offset + this.capacity) % this.capacity];
      if (value !== undefined) {
        result.push(value);
      }
    }
    return result;
  }

  toArray(): T[] {
    return this.ending(this.count);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
