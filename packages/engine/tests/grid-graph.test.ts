import { describe, expect, it } from "vitest";
import { GridGraph } from "../src/maze/grid-graph";
import { cell, errorCode, gridFromAscii } from "./helpers";

describe("GridGraph", () => {
  describe("neighbors", () => {
    it("lists open cells up, right, down, left", () => {
      const graph = new GridGraph(3, 3);
      expect(graph.neighbors(cell(1, 1))).toEqual([
        cell(0, 1),
        cell(1, 2),
        cell(2, 1),
        cell(1, 0),
      ]);
      expect(graph.neighbors(cell(0, 0))).toEqual([cell(0, 1), cell(1, 0)]);
    });

    it("skips blocked cells", () => {
      const graph = gridFromAscii([".#.", "...", "..."]);
      expect(graph.neighbors(cell(0, 0))).toEqual([cell(1, 0)]);
      expect(graph.isBlocked(cell(0, 1))).toBe(true);
    });

    it("appends teleporter targets, both ways by default", () => {
      const graph = new GridGraph(3, 3, [], [{ from: cell(0, 0), to: cell(2, 2) }]);
      expect(graph.neighbors(cell(0, 0))).toEqual([cell(0, 1), cell(1, 0), cell(2, 2)]);
      expect(graph.neighbors(cell(2, 2))).toEqual([cell(1, 2), cell(2, 1), cell(0, 0)]);
    });

    it("keeps one-way teleporters directed", () => {
      const graph = new GridGraph(
        3,
        3,
        [],
        [{ from: cell(0, 0), to: cell(2, 2), bidirectional: false }],
      );
      expect(graph.hasEdge(cell(0, 0), cell(2, 2))).toBe(true);
      expect(graph.hasEdge(cell(2, 2), cell(0, 0))).toBe(false);
    });
  });

  describe("construction", () => {
    it("rejects bad dimensions", () => {
      expect(errorCode(() => new GridGraph(0, 3))).toBe("MAZE_INVALID");
      expect(errorCode(() => new GridGraph(3, 2.5))).toBe("MAZE_INVALID");
    });

    it("rejects blocked cells outside the grid", () => {
      expect(errorCode(() => new GridGraph(2, 2, [cell(2, 0)]))).toBe("MAZE_CELL_OUT_OF_BOUNDS");
    });

    it("rejects teleporters on blocked cells or onto themselves", () => {
      expect(
        errorCode(() => new GridGraph(2, 2, [cell(1, 1)], [{ from: cell(0, 0), to: cell(1, 1) }])),
      ).toBe("MAZE_CELL_BLOCKED");
      expect(errorCode(() => new GridGraph(2, 2, [], [{ from: cell(0, 0), to: cell(0, 0) }]))).toBe(
        "MAZE_INVALID",
      );
    });

    it("rejects teleporters between neighbouring cells", () => {
      expect(errorCode(() => new GridGraph(1, 3, [], [{ from: cell(0, 0), to: cell(0, 1) }]))).toBe(
        "MAZE_INVALID",
      );
      expect(errorCode(() => new GridGraph(3, 1, [], [{ from: cell(2, 0), to: cell(1, 0) }]))).toBe(
        "MAZE_INVALID",
      );
      const diagonal = new GridGraph(2, 2, [], [{ from: cell(0, 0), to: cell(1, 1) }]);
      expect(diagonal.neighbors(cell(0, 0))).toEqual([cell(0, 1), cell(1, 0), cell(1, 1)]);
    });
  });

  describe("fromDescriptor", () => {
    const base = {
      rows: 3,
      cols: 3,
      blocked: [cell(1, 1)],
      start: cell(0, 0),
      goal: cell(2, 2),
    };

    it("builds the graph with start and goal", () => {
      const res = GridGraph.fromDescriptor(base);
      if (!res.success) throw res.error;
      expect(res.value.graph.rows).toBe(3);
      expect(res.value.start).toEqual(cell(0, 0));
      expect(res.value.graph.isBlocked(cell(1, 1))).toBe(true);
    });

    it("rejects a blocked start", () => {
      const res = GridGraph.fromDescriptor({ ...base, start: cell(1, 1) });
      expect(res.error.code).toBe("MAZE_CELL_BLOCKED");
      expect(res.error.message).toBe("Start cell (1, 1) is blocked");
    });

    it("rejects a goal outside the grid", () => {
      const res = GridGraph.fromDescriptor({ ...base, goal: cell(3, 0) });
      expect(res.error.code).toBe("MAZE_CELL_OUT_OF_BOUNDS");
    });

    it("rejects malformed descriptors", () => {
      expect(GridGraph.fromDescriptor({ ...base, rows: 0 }).error.code).toBe("MAZE_INVALID");
      expect(GridGraph.fromDescriptor(null).error.code).toBe("MAZE_INVALID");
    });
  });

  describe("distancesFrom", () => {
    it("gives BFS distances and omits unreachable cells", () => {
      const graph = gridFromAscii(["...", ".#.", "..."]);
      const distances = graph.distancesFrom(cell(0, 0));
      expect(distances.get(graph.keyOf(cell(2, 2)))).toBe(4);
      expect(distances.get(graph.keyOf(cell(0, 2)))).toBe(2);
      expect(distances.has(graph.keyOf(cell(1, 1)))).toBe(false);
      expect(distances.size).toBe(8);
    });

    it("counts a teleporter as one step", () => {
      const graph = gridFromAscii(["....."], [{ from: cell(0, 0), to: cell(0, 4) }]);
      expect(graph.distancesFrom(cell(0, 0)).get(4)).toBe(1);
      expect(graph.distancesFrom(cell(0, 0)).get(3)).toBe(2);
    });
  });

  it("renders walls, teleporters, start and goal", () => {
    const graph = gridFromAscii(["...", ".#.", "..."], [{ from: cell(0, 2), to: cell(2, 0) }]);
    expect(graph.render(cell(0, 0), cell(2, 2))).toBe("S.T\n.#.\nT.G");
    expect(graph.render()).toBe("..T\n.#.\nT..");
  });

  it("converts between cells and keys", () => {
    const graph = new GridGraph(4, 5);
    expect(graph.keyOf(cell(2, 3))).toBe(13);
    expect(graph.cellAt(13)).toEqual(cell(2, 3));
    expect(graph.cellCount).toBe(20);
  });
});
