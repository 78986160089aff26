/**
 * @file ring-buffer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Fixed-capacity FIFO. Once full, each push overwrites the oldest slot and
 * hands the overwritten element back to the caller.
 */
export class RingBuffer<T> {
  private readonly _items: T[] = [];
  private readonly _capacity: number;
  private _bufferIndex = 0; // Oldest slot once the buffer is full

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Ring buffer capacity must be a positive integer');
    }
    this._capacity = capacity;
  }

  get capacity(): number {
    return this._capacity;
  }

  get length(): number {
    return this._items.length;
  }

  get isFull(): boolean {
    return this._items.length === this._capacity;
  }

  /**
   * Appends an item, returning the evicted one when the buffer was full.
   */
  push(item: T): T | undefined {
    if (this._items.length < this._capacity) {
      this._items.push(item);
      return undefined;
    }

    const evicted = this._items[this._bufferIndex];
    this._items[this._bufferIndex] = item;
    this._bufferIndex = (this._bufferIndex + 1) % this._capacity;
    return evicted;
  }

  /**
   * Copy of the contents, oldest first.
   */
  snapshot(): T[] {
    if (!this.isFull || this._bufferIndex === 0) {
      return [...this._items];
    }
    return [
      ...this._items.slice(this._bufferIndex),
      ...this._items.slice(0, this._bufferIndex),
    ];
  }

  /**
   * Items matching the predicate, oldest first.
   */
  filter(predicate: (item: T) => boolean): T[] {
    return this.snapshot().filter(predicate);
  }
}
