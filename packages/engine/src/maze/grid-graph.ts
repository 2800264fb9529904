/**
 * Maze graph over a rectangular grid.
 *
 * Adjacency is the open 4-neighbourhood plus teleporter edges. Blocked
 * cells are stored in a flat Uint8Array; teleporters in a map keyed by the
 * row-major cell key.
 */

import {
  type CellCoord,
  EngineError,
  ENGINE_LIMITS,
  type MazeDescriptor,
  parseMazeDescriptor,
  Result,
  type TeleporterLink,
} from "@algoquest/contracts";
import { FastQueue } from "../core/data-structures";

/**
 * Neighbour expansion order: up, right, down, left.
 * Teleporter targets follow, in declaration order.
 */
export const DIRECTIONS_4: readonly CellCoord[] = [
  { row: -1, col: 0 },
  { row: 0, col: 1 },
  { row: 1, col: 0 },
  { row: 0, col: -1 },
];

export interface MazeProblem {
  readonly graph: GridGraph;
  readonly start: CellCoord;
  readonly goal: CellCoord;
}

export class GridGraph {
  readonly rows: number;
  readonly cols: number;
  private readonly blocked: Uint8Array;
  private readonly jumps = new Map<number, number[]>();
  private readonly links: readonly TeleporterLink[];

  constructor(
    rows: number,
    cols: number,
    blocked: readonly CellCoord[] = [],
    teleporters: readonly TeleporterLink[] = [],
  ) {
    const max = ENGINE_LIMITS.MAZE.MAX_DIMENSION;
    if (
      !Number.isInteger(rows) ||
      !Number.isInteger(cols) ||
      rows <= 0 ||
      cols <= 0 ||
      rows > max ||
      cols > max
    ) {
      throw EngineError.mazeInvalid(`Invalid maze dimensions: ${rows}x${cols}`, { rows, cols });
    }

    this.rows = rows;
    this.cols = cols;
    this.blocked = new Uint8Array(rows * cols);

    for (const cell of blocked) {
      this.assertInBounds(cell, "Blocked cell");
      this.blocked[this.keyOf(cell)] = 1;
    }

    for (const link of teleporters) {
      this.assertOpen(link.from, "Teleporter entry");
      this.assertOpen(link.to, "Teleporter exit");
      const from = this.keyOf(link.from);
      const to = this.keyOf(link.to);
      if (from === to) {
        throw EngineError.mazeInvalid(
          `Teleporter at (${link.from.row}, ${link.from.col}) points to itself`,
          { from: link.from },
        );
      }
      if (areAdjacent(link.from, link.to)) {
        throw EngineError.mazeInvalid(
          `Teleporter (${link.from.row}, ${link.from.col}) -> (${link.to.row}, ${link.to.col}) joins adjacent cells`,
          { from: link.from, to: link.to },
        );
      }
      this.addJump(from, to);
      if (link.bidirectional ?? true) {
        this.addJump(to, from);
      }
    }
    this.links = teleporters.map((link) => ({ ...link }));
  }

  /**
   * Validate a maze descriptor and build its graph. Start and goal must be
   * open cells inside the grid.
   */
  static fromDescriptor(input: unknown): Result<MazeProblem, EngineError> {
    return parseMazeDescriptor(input).flatMap((descriptor: MazeDescriptor) =>
      Result.fromThrowable(
        () => {
          const graph = new GridGraph(
            descriptor.rows,
            descriptor.cols,
            descriptor.blocked,
            descriptor.teleporters ?? [],
          );
          graph.assertOpen(descriptor.start, "Start cell");
          graph.assertOpen(descriptor.goal, "Goal cell");
          return { graph, start: descriptor.start, goal: descriptor.goal };
        },
        (e) =>
          EngineError.isEngineError(e)
            ? e
            : EngineError.mazeInvalid(e instanceof Error ? e.message : String(e)),
      ),
    );
  }

  get cellCount(): number {
    return this.rows * this.cols;
  }

  get teleporters(): readonly TeleporterLink[] {
    return this.links;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  isInBounds(cell: CellCoord): boolean {
    return (
      Number.isInteger(cell.row) &&
      Number.isInteger(cell.col) &&
      cell.row >= 0 &&
      cell.row < this.rows &&
      cell.col >= 0 &&
      cell.col < this.cols
    );
  }

  isBlocked(cell: CellCoord): boolean {
    return this.blocked[this.keyOf(cell)] === 1;
  }

  isOpen(cell: CellCoord): boolean {
    return this.isInBounds(cell) && !this.isBlocked(cell);
  }

  keyOf(cell: CellCoord): number {
    return cell.row * this.cols + cell.col;
  }

  cellAt(key: number): CellCoord {
    return { row: Math.floor(key / this.cols), col: key % this.cols };
  }

  /**
   * Throw if the cell is outside the grid or blocked.
   */
  assertOpen(cell: CellCoord, label: string): void {
    this.assertInBounds(cell, label);
    if (this.isBlocked(cell)) {
      throw new EngineError(
        "MAZE_CELL_BLOCKED",
        `${label} (${cell.row}, ${cell.col}) is blocked`,
        { row: cell.row, col: cell.col },
      );
    }
  }

  // ===========================================================================
  // ADJACENCY
  // ===========================================================================

  /**
   * Keys of the cells reachable in one step from `key`, in expansion order.
   */
  neighborKeys(key: number): number[] {
    const row = Math.floor(key / this.cols);
    const col = key % this.cols;
    const result: number[] = [];

    for (const dir of DIRECTIONS_4) {
      const r = row + dir.row;
      const c = col + dir.col;
      if (r < 0 || r >= this.rows || c < 0 || c >= this.cols) continue;
      const next = r * this.cols + c;
      if (this.blocked[next] === 0) result.push(next);
    }

    const jumps = this.jumps.get(key);
    if (jumps) result.push(...jumps);
    return result;
  }

  neighbors(cell: CellCoord): CellCoord[] {
    return this.neighborKeys(this.keyOf(cell)).map((key) => this.cellAt(key));
  }

  /**
   * Edge test used to validate paths: 4-adjacent open cells or a teleporter.
   */
  hasEdge(from: CellCoord, to: CellCoord): boolean {
    if (!this.isOpen(from) || !this.isOpen(to)) return false;
    return this.neighborKeys(this.keyOf(from)).includes(this.keyOf(to));
  }

  /**
   * Unit-cost BFS distances from `source` to every reachable cell, keyed by
   * cell key. Unreachable cells are absent.
   */
  distancesFrom(source: CellCoord): ReadonlyMap<number, number> {
    this.assertOpen(source, "Source cell");
    const sourceKey = this.keyOf(source);
    const distances = new Map<number, number>([[sourceKey, 0]]);
    const queue = FastQueue.from([sourceKey]);

    for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
      const nextDistance = (distances.get(current) ?? 0) + 1;
      for (const neighbor of this.neighborKeys(current)) {
        if (!distances.has(neighbor)) {
          distances.set(neighbor, nextDistance);
          queue.enqueue(neighbor);
        }
      }
    }

    return distances;
  }

  /**
   * ASCII view: `#` blocked, `.` open, `T` teleporter endpoint,
   * `S`/`G` for the optional start and goal.
   */
  render(start?: CellCoord, goal?: CellCoord): string {
    const glyphs: string[] = [];
    for (let key = 0; key < this.cellCount; key++) {
      glyphs.push(this.blocked[key] === 1 ? "#" : ".");
    }
    for (const link of this.links) {
      glyphs[this.keyOf(link.from)] = "T";
      glyphs[this.keyOf(link.to)] = "T";
    }
    if (start) glyphs[this.keyOf(start)] = "S";
    if (goal) glyphs[this.keyOf(goal)] = "G";

    const lines: string[] = [];
    for (let row = 0; row < this.rows; row++) {
      lines.push(glyphs.slice(row * this.cols, (row + 1) * this.cols).join(""));
    }
    return lines.join("\n");
  }

  private addJump(from: number, to: number): void {
    const existing = this.jumps.get(from);
    if (existing) {
      if (!existing.includes(to)) existing.push(to);
    } else {
      this.jumps.set(from, [to]);
    }
  }

  private assertInBounds(cell: CellCoord, label: string): void {
    if (!this.isInBounds(cell)) {
      throw new EngineError(
        "MAZE_CELL_OUT_OF_BOUNDS",
        `${label} (${cell.row}, ${cell.col}) is outside the ${this.rows}x${this.cols} grid`,
        { row: cell.row, col: cell.col, rows: this.rows, cols: this.cols },
      );
    }
  }
}

export function areAdjacent(a: CellCoord, b: CellCoord): boolean {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col) === 1;
}
