import {
  type CellCoord,
  EngineError,
  ENGINE_LIMITS,
  type MazeDescriptor,
  SeededRandom,
  type TeleporterLink,
} from "@algoquest/contracts";
import { areAdjacent, DIRECTIONS_4 } from "./grid-graph";

export interface MazeGenerationOptions {
  /** Odd, at least 5 */
  readonly rows: number;
  /** Odd, at least 5 */
  readonly cols: number;
  readonly seed: number;
  /** Bidirectional teleporters placed on random open cells */
  readonly teleporterPairs?: number;
}

interface CarveFrame {
  readonly row: number;
  readonly col: number;
  readonly directions: readonly CellCoord[];
  next: number;
}

/**
 * Generate a perfect maze with a seeded recursive backtracker.
 *
 * Cells with odd row and column are rooms; the backtracker opens the wall
 * between two rooms as it walks. Start is (1, 1), goal the bottom-right
 * room. The same options always give the same descriptor.
 */
export function generateMaze(options: MazeGenerationOptions): MazeDescriptor {
  const { rows, cols, seed } = options;
  const teleporterPairs = options.teleporterPairs ?? 0;
  validateOptions(rows, cols, teleporterPairs);

  const rng = new SeededRandom(seed);
  const open = new Uint8Array(rows * cols);
  const start: CellCoord = { row: 1, col: 1 };
  const goal: CellCoord = { row: rows - 2, col: cols - 2 };

  open[start.row * cols + start.col] = 1;
  const stack: CarveFrame[] = [
    { ...start, directions: rng.shuffle(DIRECTIONS_4), next: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame === undefined) break;

    const dir = frame.directions[frame.next++];
    if (dir === undefined) {
      stack.pop();
      continue;
    }

    const row = frame.row + dir.row * 2;
    const col = frame.col + dir.col * 2;
    if (row < 1 || row > rows - 2 || col < 1 || col > cols - 2) continue;
    if (open[row * cols + col] === 1) continue;

    open[(frame.row + dir.row) * cols + (frame.col + dir.col)] = 1;
    open[row * cols + col] = 1;
    stack.push({ row, col, directions: rng.shuffle(DIRECTIONS_4), next: 0 });
  }

  const blocked: CellCoord[] = [];
  const candidates: CellCoord[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      if (open[row * cols + col] === 0) {
        blocked.push({ row, col });
      } else if (!isSameCell({ row, col }, start) && !isSameCell({ row, col }, goal)) {
        candidates.push({ row, col });
      }
    }
  }

  return {
    rows,
    cols,
    blocked,
    teleporters: placeTeleporters(rng, candidates, teleporterPairs),
    start,
    goal,
  };
}

function placeTeleporters(
  rng: SeededRandom,
  candidates: readonly CellCoord[],
  pairs: number,
): TeleporterLink[] {
  if (pairs === 0) return [];
  if (candidates.length < pairs * 2) {
    throw EngineError.mazeInvalid(
      `Not enough open cells for ${pairs} teleporter pairs`,
      { pairs, openCells: candidates.length },
    );
  }

  // Each cell pairs with the first later unused cell that is not a 4-neighbour
  const picked = rng.shuffle(candidates);
  const used = new Set<number>();
  const links: TeleporterLink[] = [];
  for (let i = 0; i < picked.length && links.length < pairs; i++) {
    const from = picked[i];
    if (from === undefined || used.has(i)) continue;
    for (let j = i + 1; j < picked.length; j++) {
      const to = picked[j];
      if (to === undefined || used.has(j) || areAdjacent(from, to)) continue;
      used.add(i).add(j);
      links.push({ from, to, bidirectional: true });
      break;
    }
  }

  if (links.length < pairs) {
    throw EngineError.mazeInvalid(
      `Could only place ${links.length} of ${pairs} teleporter pairs between non-adjacent cells`,
      { pairs, placed: links.length },
    );
  }
  return links;
}

function validateOptions(rows: number, cols: number, teleporterPairs: number): void {
  for (const [label, value] of [["rows", rows], ["cols", cols]] as const) {
    if (
      !Number.isInteger(value) ||
      value < 5 ||
      value % 2 === 0 ||
      value > ENGINE_LIMITS.MAZE.MAX_DIMENSION
    ) {
      throw EngineError.mazeInvalid(
        `Generated maze ${label} must be an odd integer between 5 and ${ENGINE_LIMITS.MAZE.MAX_DIMENSION}, got ${value}`,
        { [label]: value },
      );
    }
  }
  if (!Number.isInteger(teleporterPairs) || teleporterPairs < 0) {
    throw EngineError.mazeInvalid(`Invalid teleporter pair count: ${teleporterPairs}`);
  }
}

function isSameCell(a: CellCoord, b: CellCoord): boolean {
  return a.row === b.row && a.col === b.col;
}
