/**
 * FIFO queue with O(1) amortized enqueue and dequeue, used as the BFS
 * frontier.
 *
 * Array-backed with a moving head; the array is compacted once the dead
 * prefix grows past half of it.
 *
 * @example
 * ```typescript
 * const queue = new FastQueue<number>();
 * queue.enqueue(1);
 * queue.enqueue(2);
 * queue.dequeue();  // 1
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
   * Remove and return the first item, or undefined if empty.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    if (this.isEmpty) return undefined;
    return this.items[this.head];
  }

  /**
   * Snapshot of the queued items in dequeue order.
   */
  toArray(): T[] {
    return this.items.slice(this.head);
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}

/**
 * Bit set over the cells of a rows × cols grid, addressed by row-major key.
 * Used for visited/discovered sets in grid searches.
 *
 * @example
 * ```typescript
 * const visited = new CellBitSet(10, 10);
 * visited.add(23);
 * visited.has(23);  // true
 * ```
 */
export class CellBitSet {
  private readonly bits: Uint32Array;
  private count = 0;

  constructor(rows: number, cols: number) {
    this.bits = new Uint32Array(Math.ceil((rows * cols) / 32));
  }

  get size(): number {
    return this.count;
  }

  has(key: number): boolean {
    const value = this.bits[key >>> 5];
    return value !== undefined && (value & (1 << (key & 31))) !== 0;
  }

  /**
   * Add a key. Returns false if it was already present.
   */
  add(key: number): boolean {
    const index = key >>> 5;
    const bit = 1 << (key & 31);
    const current = this.bits[index];
    if (current === undefined || (current & bit) !== 0) return false;
    this.bits[index] = current | bit;
    this.count++;
    return true;
  }

  clear(): void {
    this.bits.fill(0);
    this.count = 0;
  }
}
