import {
  type BoardVariant,
  EngineError,
  ENGINE_LIMITS,
  opponent,
  type Player,
} from "@algoquest/contracts";
import { type Move, type PlacementMove, formatMove, placeAt } from "./moves";
import {
  type Board,
  type BoardState,
  type CellContent,
  DRAW,
  freezeState,
  ONGOING,
  type Outcome,
} from "./types";

const CENTRE_BONUS = 2;

/**
 * N×N tic-tac-toe. A player wins by filling a whole row, column or main
 * diagonal; the game is drawn when no empty cell is left.
 */
export class TicTacToeBoard implements Board {
  readonly variant: BoardVariant = "plain";
  readonly rows: number;
  readonly cols: number;
  protected readonly lines: readonly (readonly number[])[];

  constructor(readonly size: number) {
    const { MIN_SIZE, MAX_SIZE } = ENGINE_LIMITS.TIC_TAC_TOE;
    if (!Number.isInteger(size) || size < MIN_SIZE || size > MAX_SIZE) {
      throw EngineError.boardConfigInvalid(
        `Tic-tac-toe size must be between ${MIN_SIZE} and ${MAX_SIZE}, got ${size}`,
        { size },
      );
    }
    this.rows = size;
    this.cols = size;
    this.lines = buildLines(size);
  }

  initialState(toMove: Player = "A"): BoardState {
    const cells: CellContent[] = new Array<CellContent>(this.size * this.size).fill("empty");
    return freezeState(this.rows, this.cols, cells, toMove, 0);
  }

  legalMoves(state: BoardState): readonly PlacementMove[] {
    if (this.outcome(state).status !== "ongoing") return [];
    const moves: PlacementMove[] = [];
    state.cells.forEach((cell, index) => {
      if (cell === "empty") moves.push(placeAt(index));
    });
    return moves;
  }

  applyMove(state: BoardState, move: Move): BoardState {
    if (move.kind !== "place") {
      throw EngineError.illegalMove(`${this.variant} boards only accept placements`, {
        move: formatMove(move, this.cols),
      });
    }
    if (state.cells[move.index] !== "empty") {
      throw EngineError.illegalMove(`Cell ${formatMove(move, this.cols)} is not empty`, {
        index: move.index,
      });
    }
    if (this.outcome(state).status !== "ongoing") {
      throw EngineError.illegalMove("The game is already over", { index: move.index });
    }
    return this.place(state, move.index);
  }

  outcome(state: BoardState): Outcome {
    for (const line of this.lines) {
      const first = state.cells[line[0] ?? 0];
      if (first !== "A" && first !== "B") continue;
      if (line.every((index) => state.cells[index] === first)) {
        return { status: "win", winner: first };
      }
    }
    return state.cells.includes("empty") ? ONGOING : DRAW;
  }

  /**
   * Sum over open lines: own mark count when the opponent has no mark on
   * the line, minus the opponent's count when we have none. Lines with a
   * blocked cell can never be won and score 0.
   */
  evaluate(state: BoardState, perspective: Player): number {
    const rival = opponent(perspective);
    let score = 0;

    for (const line of this.lines) {
      let own = 0;
      let theirs = 0;
      let dead = false;
      for (const index of line) {
        const cell = state.cells[index];
        if (cell === perspective) own++;
        else if (cell === rival) theirs++;
        else if (cell === "blocked") dead = true;
      }
      if (dead || (own > 0 && theirs > 0)) continue;
      score += own - theirs;
    }

    if (this.size === 3) {
      const centre = state.cells[4];
      if (centre === perspective) score += CENTRE_BONUS;
      else if (centre === rival) score -= CENTRE_BONUS;
    }

    return score;
  }

  /**
   * Put the mover's mark on an empty cell and pass the turn. Variants with
   * tile effects override this.
   */
  protected place(state: BoardState, index: number): BoardState {
    const cells = [...state.cells];
    cells[index] = state.toMove;
    return freezeState(this.rows, this.cols, cells, opponent(state.toMove), state.moveCount + 1);
  }
}

function buildLines(size: number): number[][] {
  const lines: number[][] = [];
  for (let r = 0; r < size; r++) {
    lines.push(Array.from({ length: size }, (_, c) => r * size + c));
  }
  for (let c = 0; c < size; c++) {
    lines.push(Array.from({ length: size }, (_, r) => r * size + c));
  }
  lines.push(Array.from({ length: size }, (_, i) => i * size + i));
  lines.push(Array.from({ length: size }, (_, i) => i * size + (size - 1 - i)));
  return lines;
}
