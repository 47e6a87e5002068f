/** Fixed-capacity ring buffer of the most recent values. */
export class RollingWindow<T> {
  private readonly buffer: (T | undefined)[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Window capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /** Append a value. Returns the value that fell out of the window, if any. */
  push(value: T): T | undefined {
    if (this.count < this.capacity) {
      this.buffer[(this.start + this.count) % this.capacity] = value;
      this.count++;
      return undefined;
    }
    const evicted = this.buffer[this.start];
    this.buffer[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  get size(): number {
    return this.count;
  }

  get full(): boolean {
    return this.count === this.capacity;
  }

  /** Values oldest first. */
  values(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const value = this.buffer[(this.start + i) % this.capacity];
      if (value !== undefined) out.push(value);
    }
    return out;
  }
}
