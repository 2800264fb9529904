import { describe, expect, it } from "vitest";
import { CellBitSet, FastQueue, NO_PARENT, SearchArena } from "../src/core/data-structures";

describe("FastQueue", () => {
  it("dequeues in insertion order", () => {
    const queue = FastQueue.from([1, 2, 3]);
    expect(queue.dequeue()).toBe(1);
    expect(queue.peek()).toBe(2);
    expect(queue.length).toBe(2);
    expect(queue.toArray()).toEqual([2, 3]);
  });

  it("returns undefined when empty", () => {
    const queue = new FastQueue<string>();
    expect(queue.isEmpty).toBe(true);
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
  });

  it("keeps order across compaction", () => {
    const queue = new FastQueue<number>();
    for (let i = 0; i < 3000; i++) queue.enqueue(i);
    for (let i = 0; i < 2000; i++) expect(queue.dequeue()).toBe(i);

    expect(queue.length).toBe(1000);
    expect(queue.peek()).toBe(2000);
    expect(queue.toArray()[999]).toBe(2999);
  });

  it("clears", () => {
    const queue = FastQueue.from(["a", "b"]);
    queue.clear();
    expect(queue.isEmpty).toBe(true);
  });
});

describe("CellBitSet", () => {
  it("tracks membership and size", () => {
    const set = new CellBitSet(3, 3);
    expect(set.add(4)).toBe(true);
    expect(set.add(4)).toBe(false);
    expect(set.has(4)).toBe(true);
    expect(set.has(5)).toBe(false);
    expect(set.size).toBe(1);
  });

  it("ignores keys past the grid", () => {
    const set = new CellBitSet(3, 3);
    expect(set.add(40)).toBe(false);
    expect(set.has(40)).toBe(false);
  });

  it("works across word boundaries", () => {
    const set = new CellBitSet(8, 8);
    set.add(31);
    set.add(32);
    set.add(63);
    expect([31, 32, 63, 33].map((k) => set.has(k))).toEqual([true, true, true, false]);
    set.clear();
    expect(set.size).toBe(0);
    expect(set.has(32)).toBe(false);
  });
});

describe("SearchArena", () => {
  it("reconstructs paths from parent handles", () => {
    const arena = new SearchArena<string>();
    const a = arena.add("a", NO_PARENT);
    const b = arena.add("b", a);
    const c = arena.add("c", b);
    const d = arena.add("d", a);

    expect(arena.pathTo(c)).toEqual(["a", "b", "c"]);
    expect(arena.pathTo(d)).toEqual(["a", "d"]);
    expect(arena.pathTo(a)).toEqual(["a"]);
    expect(arena.depth(c)).toBe(2);
    expect(arena.parent(d)).toBe(a);
    expect(arena.parent(a)).toBe(NO_PARENT);
    expect(arena.size).toBe(4);
  });

  it("rejects unknown handles", () => {
    const arena = new SearchArena<number>();
    arena.add(1, NO_PARENT);
    expect(() => arena.item(5)).toThrow(RangeError);
    expect(() => arena.add(2, 7)).toThrow(RangeError);
  });

  it("is empty after clear", () => {
    const arena = new SearchArena<number>();
    arena.add(1, NO_PARENT);
    arena.clear();
    expect(arena.size).toBe(0);
    expect(() => arena.item(0)).toThrow(RangeError);
  });
});
