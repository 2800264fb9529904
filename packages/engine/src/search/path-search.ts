/**
 * Path Search
 *
 * BFS and DFS over a GridGraph. Both expand each cell at most once, record
 * parents in a SearchArena and run the goal test on expansion.
 *
 * - BFS marks cells when they are discovered, so the returned path has the
 *   fewest edges (a teleporter jump is one edge).
 * - DFS marks cells when they are expanded and pushes neighbours in reverse
 *   so they pop in the fixed up/right/down/left/teleporter order.
 */

import type { CellCoord } from "@algoquest/contracts";
import { CellBitSet, FastQueue, NO_PARENT, SearchArena } from "../core/data-structures";
import type { FrontierEvent, TraceSink, VisitedEvent } from "../core/trace";
import type { GridGraph } from "../maze/grid-graph";

export type PathStrategy = "bfs" | "dfs";

export type PathTraceEvent = VisitedEvent<CellCoord> | FrontierEvent<CellCoord>;

export interface PathSearchOptions {
  /** Receives one `visited` event per expansion, then the frontier after it */
  readonly trace?: TraceSink<PathTraceEvent>;
}

export interface PathSearchStats {
  readonly expandedCount: number;
  readonly discoveredCount: number;
  readonly maxFrontierSize: number;
}

export type PathResult =
  | {
      readonly status: "found";
      /** Start to goal, inclusive */
      readonly path: readonly CellCoord[];
      /** Cells in expansion order */
      readonly expanded: readonly CellCoord[];
      readonly stats: PathSearchStats;
    }
  | {
      readonly status: "unreachable";
      readonly expanded: readonly CellCoord[];
      readonly stats: PathSearchStats;
    };

/**
 * Find a path from `start` to `goal`.
 *
 * Unreachable goals are a result, not an error. Throws EngineError if
 * `start` or `goal` is outside the grid or blocked.
 */
export function findPath(
  graph: GridGraph,
  start: CellCoord,
  goal: CellCoord,
  strategy: PathStrategy,
  options: PathSearchOptions = {},
): PathResult {
  graph.assertOpen(start, "Start cell");
  graph.assertOpen(goal, "Goal cell");

  const run = new PathSearchRun(graph, graph.keyOf(goal), options.trace);
  try {
    return strategy === "bfs"
      ? run.breadthFirst(graph.keyOf(start))
      : run.depthFirst(graph.keyOf(start));
  } finally {
    run.dispose();
  }
}

export function bfs(
  graph: GridGraph,
  start: CellCoord,
  goal: CellCoord,
  options?: PathSearchOptions,
): PathResult {
  return findPath(graph, start, goal, "bfs", options);
}

export function dfs(
  graph: GridGraph,
  start: CellCoord,
  goal: CellCoord,
  options?: PathSearchOptions,
): PathResult {
  return findPath(graph, start, goal, "dfs", options);
}

/**
 * State owned by a single findPath call.
 */
class PathSearchRun {
  private readonly arena = new SearchArena<number>();
  private readonly marked: CellBitSet;
  private readonly expanded: CellCoord[] = [];
  private maxFrontierSize = 0;

  constructor(
    private readonly graph: GridGraph,
    private readonly goalKey: number,
    private readonly trace: TraceSink<PathTraceEvent> | undefined,
  ) {
    this.marked = new CellBitSet(graph.rows, graph.cols);
  }

  breadthFirst(startKey: number): PathResult {
    const frontier = new FastQueue<number>();
    this.marked.add(startKey);
    frontier.enqueue(this.arena.add(startKey, NO_PARENT));
    this.trackFrontier(frontier.length);

    for (let handle = frontier.dequeue(); handle !== undefined; handle = frontier.dequeue()) {
      const key = this.expand(handle);
      if (key === this.goalKey) return this.found(handle);

      for (const next of this.graph.neighborKeys(key)) {
        if (this.marked.add(next)) {
          frontier.enqueue(this.arena.add(next, handle));
        }
      }

      this.trackFrontier(frontier.length);
      this.emitFrontier(frontier.toArray());
    }

    return this.unreachable();
  }

  depthFirst(startKey: number): PathResult {
    const stack: number[] = [this.arena.add(startKey, NO_PARENT)];
    this.trackFrontier(stack.length);

    for (let handle = stack.pop(); handle !== undefined; handle = stack.pop()) {
      const key = this.arena.item(handle);
      // A cell can sit on the stack more than once; only the first pop expands it
      if (!this.marked.add(key)) continue;

      this.expand(handle);
      if (key === this.goalKey) return this.found(handle);

      const neighbors = this.graph.neighborKeys(key);
      for (let i = neighbors.length - 1; i >= 0; i--) {
        const next = neighbors[i];
        if (next !== undefined && !this.marked.has(next)) {
          stack.push(this.arena.add(next, handle));
        }
      }

      this.trackFrontier(stack.length);
      this.emitFrontier([...stack].reverse());
    }

    return this.unreachable();
  }

  dispose(): void {
    this.arena.clear();
  }

  private expand(handle: number): number {
    const key = this.arena.item(handle);
    const cell = this.graph.cellAt(key);
    this.expanded.push(cell);
    if (this.trace?.enabled) {
      this.trace.emit({ kind: "visited", node: cell, depth: this.arena.depth(handle) });
    }
    return key;
  }

  private emitFrontier(handles: readonly number[]): void {
    if (!this.trace?.enabled) return;
    this.trace.emit({
      kind: "frontier",
      nodes: handles.map((h) => this.graph.cellAt(this.arena.item(h))),
    });
  }

  private trackFrontier(size: number): void {
    if (size > this.maxFrontierSize) this.maxFrontierSize = size;
  }

  private stats(): PathSearchStats {
    return {
      expandedCount: this.expanded.length,
      discoveredCount: this.arena.size,
      maxFrontierSize: this.maxFrontierSize,
    };
  }

  private found(handle: number): PathResult {
    return {
      status: "found",
      path: this.arena.pathTo(handle).map((key) => this.graph.cellAt(key)),
      expanded: this.expanded,
      stats: this.stats(),
    };
  }

  private unreachable(): PathResult {
    return { status: "unreachable", expanded: this.expanded, stats: this.stats() };
  }
}
