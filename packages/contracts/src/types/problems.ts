/**
 * Problem descriptors handed to the engine by level code.
 *
 * All descriptors are plain, JSON-serializable data so a snapshot can be
 * passed by value into a worker before a search starts.
 */

// =============================================================================
// SHARED
// =============================================================================

/** Integer (row, column) coordinate, row 0 at the top. */
export interface CellCoord {
  readonly row: number;
  readonly col: number;
}

export type Player = "A" | "B";

export function opponent(player: Player): Player {
  return player === "A" ? "B" : "A";
}

// =============================================================================
// MAZE
// =============================================================================

/**
 * Zero-cost jump between two non-adjacent cells.
 * `bidirectional` defaults to true; set it to false for a one-way edge.
 */
export interface TeleporterLink {
  readonly from: CellCoord;
  readonly to: CellCoord;
  readonly bidirectional?: boolean;
}

export interface MazeDescriptor {
  readonly rows: number;
  readonly cols: number;
  readonly blocked: readonly CellCoord[];
  readonly teleporters?: readonly TeleporterLink[];
  readonly start: CellCoord;
  readonly goal: CellCoord;
}

// =============================================================================
// WATER JUGS
// =============================================================================

export interface JugDescriptor {
  readonly capacities: readonly number[];
  readonly target: number;
  /** Starting fill levels, all-empty when omitted */
  readonly initialLevels?: readonly number[];
}

// =============================================================================
// BOARDS
// =============================================================================

export type BoardVariant = "plain" | "special-tile" | "strategy";

/**
 * Special tic-tac-toe tiles. Claiming one triggers its effect once.
 * - double: the mover plays again
 * - block: the point-mirrored cell becomes blocked if it is empty
 * - swap: the placed mark belongs to the opponent
 */
export type SpecialTileKind = "double" | "block" | "swap";

export interface SpecialTile {
  readonly row: number;
  readonly col: number;
  readonly kind: SpecialTileKind;
}

/**
 * Board setup. `marks` is one string per row using `.` (empty),
 * `#` (blocked), `A` and `B`. Omitted marks mean the variant's
 * starting position.
 */
export interface BoardDescriptor {
  readonly variant: BoardVariant;
  readonly size: number;
  readonly marks?: readonly string[];
  readonly specialTiles?: readonly SpecialTile[];
  readonly toMove?: Player;
}

// =============================================================================
// SEARCH CONFIGURATION & SETTINGS
// =============================================================================

export type SearchAlgorithm = "minimax" | "alpha-beta";

export interface SearchConfig {
  readonly algorithm: SearchAlgorithm;
  readonly maxDepth: number;
  /** Enables iterative deepening bounded by this many milliseconds */
  readonly timeBudgetMs?: number;
  /** Record a trace for visualization (default true) */
  readonly trace?: boolean;
}

export type DifficultyLevel = "easy" | "medium" | "hard" | "expert";

export type AdversarialGame = "tic-tac-toe" | "strategy";

export interface GameSettings {
  readonly difficulty: DifficultyLevel;
  readonly boardSize?: number;
  readonly timeBudgetMs?: number;
  readonly algorithm?: SearchAlgorithm;
  readonly trace?: boolean;
}
