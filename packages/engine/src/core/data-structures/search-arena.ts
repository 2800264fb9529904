export const NO_PARENT = -1;

/**
 * Search tree stored as parallel arrays indexed by integer handle.
 *
 * Each node records its payload, its parent handle and its depth, so path
 * reconstruction walks parent indices instead of object references. An
 * arena belongs to a single search call and is cleared when it returns.
 *
 * @example
 * ```typescript
 * const arena = new SearchArena<string>();
 * const root = arena.add("a", NO_PARENT);
 * const child = arena.add("b", root);
 * arena.pathTo(child);  // ["a", "b"]
 * ```
 */
export class SearchArena<T> {
  private readonly items: T[] = [];
  private readonly parents: number[] = [];
  private readonly depths: number[] = [];

  get size(): number {
    return this.items.length;
  }

  /**
   * Append a node and return its handle.
   */
  add(item: T, parent: number): number {
    const depth = parent === NO_PARENT ? 0 : this.depth(parent) + 1;
    this.items.push(item);
    this.parents.push(parent);
    this.depths.push(depth);
    return this.items.length - 1;
  }

  item(handle: number): T {
    this.assertHandle(handle);
    return this.items[handle] as T;
  }

  parent(handle: number): number {
    this.assertHandle(handle);
    return this.parents[handle] ?? NO_PARENT;
  }

  depth(handle: number): number {
    this.assertHandle(handle);
    return this.depths[handle] ?? 0;
  }

  /**
   * Payloads from the root down to `handle`, inclusive.
   */
  pathTo(handle: number): T[] {
    const path: T[] = [];
    let current = handle;
    while (current !== NO_PARENT) {
      path.push(this.item(current));
      current = this.parent(current);
    }
    return path.reverse();
  }

  clear(): void {
    this.items.length = 0;
    this.parents.length = 0;
    this.depths.length = 0;
  }

  private assertHandle(handle: number): void {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.items.length) {
      throw new RangeError(`Invalid arena handle ${handle} (size ${this.items.length})`);
    }
  }
}
