import { describe, expect, it } from "vitest";
import { GridGraph } from "../src/maze/grid-graph";
import { generateMaze } from "../src/maze/maze-generator";
import { findPath } from "../src/search/path-search";
import { cell, errorCode } from "./helpers";

describe("generateMaze", () => {
  it("carves a perfect maze from (1, 1) to the bottom-right room", () => {
    const maze = generateMaze({ rows: 9, cols: 11, seed: 7 });

    expect(maze.start).toEqual(cell(1, 1));
    expect(maze.goal).toEqual(cell(7, 9));
    // 20 rooms joined by a spanning tree of 19 opened walls
    expect(maze.blocked).toHaveLength(9 * 11 - 39);

    const res = GridGraph.fromDescriptor(maze);
    if (!res.success) throw res.error;
    const { graph } = res.value;
    for (let row = 1; row < 9; row += 2) {
      for (let col = 1; col < 11; col += 2) {
        expect(graph.isBlocked(cell(row, col))).toBe(false);
      }
    }
    for (let col = 0; col < 11; col++) {
      expect(graph.isBlocked(cell(0, col))).toBe(true);
      expect(graph.isBlocked(cell(8, col))).toBe(true);
    }
    expect(findPath(graph, maze.start, maze.goal, "bfs").status).toBe("found");
  });

  it("is deterministic per seed", () => {
    expect(generateMaze({ rows: 11, cols: 11, seed: 3 })).toEqual(
      generateMaze({ rows: 11, cols: 11, seed: 3 }),
    );
    const layouts = new Set(
      [1, 2, 3, 4, 5].map((seed) => JSON.stringify(generateMaze({ rows: 11, cols: 11, seed }))),
    );
    expect(layouts.size).toBeGreaterThan(1);
  });

  it("places teleporters on open cells other than start and goal", () => {
    const maze = generateMaze({ rows: 9, cols: 9, seed: 11, teleporterPairs: 2 });
    const teleporters = maze.teleporters ?? [];
    expect(teleporters).toHaveLength(2);

    const endpoints = teleporters.flatMap((link) => [link.from, link.to]);
    const keys = new Set(endpoints.map((c) => c.row * 9 + c.col));
    expect(keys.size).toBe(4);
    expect(keys.has(1 * 9 + 1)).toBe(false);
    expect(keys.has(7 * 9 + 7)).toBe(false);
    expect(GridGraph.fromDescriptor(maze).success).toBe(true);
  });

  it("never links neighbouring cells", () => {
    for (const seed of [1, 2, 3, 4, 5, 6, 7, 8]) {
      const maze = generateMaze({ rows: 5, cols: 5, seed, teleporterPairs: 2 });
      for (const { from, to } of maze.teleporters ?? []) {
        expect(Math.abs(from.row - to.row) + Math.abs(from.col - to.col)).toBeGreaterThan(1);
      }
      expect(GridGraph.fromDescriptor(maze).success).toBe(true);
    }
  });

  it("rejects even or tiny dimensions", () => {
    expect(errorCode(() => generateMaze({ rows: 8, cols: 9, seed: 1 }))).toBe("MAZE_INVALID");
    expect(errorCode(() => generateMaze({ rows: 9, cols: 3, seed: 1 }))).toBe("MAZE_INVALID");
  });

  it("rejects more teleporters than open cells allow", () => {
    // 5x5 has 4 rooms and 3 opened walls; 5 cells remain besides start and goal
    expect(errorCode(() => generateMaze({ rows: 5, cols: 5, seed: 1, teleporterPairs: 3 }))).toBe(
      "MAZE_INVALID",
    );
    expect(generateMaze({ rows: 5, cols: 5, seed: 1, teleporterPairs: 2 }).teleporters).toHaveLength(
      2,
    );
  });
});
