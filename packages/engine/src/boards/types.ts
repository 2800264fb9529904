import type { BoardVariant, Player } from "@algoquest/contracts";
import type { Move } from "./moves";

// =============================================================================
// STATE
// =============================================================================

export type CellContent = "empty" | "blocked" | Player;

/**
 * Immutable board position. Cells are row-major. `applyMove` always returns
 * a new state, so one state can be shared by sibling branches of a search.
 */
export interface BoardState {
  readonly rows: number;
  readonly cols: number;
  readonly cells: readonly CellContent[];
  readonly toMove: Player;
  readonly moveCount: number;
}

export type Outcome =
  | { readonly status: "ongoing" }
  | { readonly status: "win"; readonly winner: Player }
  | { readonly status: "draw" };

export const ONGOING: Outcome = Object.freeze({ status: "ongoing" });
export const DRAW: Outcome = Object.freeze({ status: "draw" });

// =============================================================================
// BOARD CONTRACT
// =============================================================================

/**
 * Capability contract shared by every game variant. Search code only talks
 * to this interface.
 */
export interface Board {
  readonly variant: BoardVariant;
  readonly rows: number;
  readonly cols: number;

  initialState(toMove?: Player): BoardState;

  /** Empty once the game is over. Order is deterministic. */
  legalMoves(state: BoardState): readonly Move[];

  /**
   * @throws EngineError BOARD_MOVE_ILLEGAL if the move is not legal in `state`
   */
  applyMove(state: BoardState, move: Move): BoardState;

  outcome(state: BoardState): Outcome;

  /** Heuristic score of a non-terminal position, higher is better for `perspective` */
  evaluate(state: BoardState, perspective: Player): number;
}

/**
 * Freeze a freshly built cell array into a state. The array is frozen in
 * place, so callers must not keep writing to it.
 */
export function freezeState(
  rows: number,
  cols: number,
  cells: CellContent[],
  toMove: Player,
  moveCount: number,
): BoardState {
  return Object.freeze({
    rows,
    cols,
    cells: Object.freeze(cells),
    toMove,
    moveCount,
  });
}
