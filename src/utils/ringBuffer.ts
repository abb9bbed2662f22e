// =========================================================
// RING BUFFER — TIME-BASED ROLLING WINDOW
// =========================================================

/**
 * Time-based ring buffer for maintaining rolling windows of records.
 * Automatically evicts entries older than the specified window duration.
 * Items are expected in non-decreasing timestamp order.
 */
export class RingBuffer<T extends { timestamp: number }> {
  private buffer: T[] = [];
  private readonly windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  /**
   * Add an item to the buffer
   */
  add(item: T): void {
    this.buffer.push(item);
    this.evictOld();
  }

  /**
   * Get all items currently in the window
   */
  getAll(): T[] {
    this.evictOld();
    return [...this.buffer];
  }

  /**
   * Get count of items in the window
   */
  count(): number {
    this.evictOld();
    return this.buffer.length;
  }

  /**
   * Get the most recent item
   */
  getLast(): T | undefined {
    this.evictOld();
    return this.buffer[this.buffer.length - 1];
  }

  /**
   * Remove items older than the window. Returns how many were dropped.
   */
  evictOld(): number {
    const cutoff = Date.now() - this.windowMs;
    // Find first index that's within window
    let firstValidIndex = 0;
    while (firstValidIndex < this.buffer.length &&
           this.buffer[firstValidIndex].timestamp < cutoff) {
      firstValidIndex++;
    }
    if (firstValidIndex > 0) {
      this.buffer = this.buffer.slice(firstValidIndex);
    }
    return firstValidIndex;
  }
}

/**
 * Append-only history capped by count. The oldest entries fall off first.
 */
export class BoundedHistory<T> {
  private items: T[] = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  getAll(): T[] {
    return [...this.items];
  }

  /**
   * Newest first
   */
  recent(limit: number): T[] {
    return this.items.slice(-limit).reverse();
  }

  get length(): number {
    return this.items.length;
  }
}
