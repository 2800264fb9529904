import {
  type BoardVariant,
  EngineError,
  ENGINE_LIMITS,
  opponent,
  type Player,
} from "@algoquest/contracts";
import { type Move, type StepMove, formatMove, movesEqual } from "./moves";
import {
  type Board,
  type BoardState,
  type CellContent,
  DRAW,
  freezeState,
  ONGOING,
  type Outcome,
} from "./types";

const MATERIAL_WEIGHT = 10;
const ADVANCE_WEIGHT = 2;

/**
 * Two-army strategy board.
 *
 * B starts on the top two rows and moves down, A on the bottom two rows and
 * moves up, pieces on cells where row + col is even. A piece steps straight
 * ahead into an empty cell, or diagonally ahead into an empty cell or onto
 * an enemy piece, capturing it. Reaching the far row or taking the last
 * enemy piece wins; a side to move with no legal step draws.
 */
export class StrategyBoard implements Board {
  readonly variant: BoardVariant = "strategy";
  readonly rows: number;
  readonly cols: number;

  constructor(readonly size: number) {
    const { MIN_SIZE, MAX_SIZE } = ENGINE_LIMITS.STRATEGY;
    if (!Number.isInteger(size) || size < MIN_SIZE || size > MAX_SIZE) {
      throw EngineError.boardConfigInvalid(
        `Strategy board size must be between ${MIN_SIZE} and ${MAX_SIZE}, got ${size}`,
        { size },
      );
    }
    this.rows = size;
    this.cols = size;
  }

  initialState(toMove: Player = "A"): BoardState {
    const cells: CellContent[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if ((row + col) % 2 !== 0) cells.push("empty");
        else if (row < 2) cells.push("B");
        else if (row >= this.size - 2) cells.push("A");
        else cells.push("empty");
      }
    }
    return freezeState(this.rows, this.cols, cells, toMove, 0);
  }

  legalMoves(state: BoardState): readonly StepMove[] {
    if (this.outcome(state).status !== "ongoing") return [];
    return this.generateSteps(state, state.toMove);
  }

  applyMove(state: BoardState, move: Move): BoardState {
    if (move.kind !== "step") {
      throw EngineError.illegalMove("Strategy boards only accept steps", {
        move: formatMove(move, this.cols),
      });
    }
    const legal = this.legalMoves(state).some((candidate) => movesEqual(candidate, move));
    if (!legal) {
      throw EngineError.illegalMove(`Illegal step ${formatMove(move, this.cols)}`, {
        from: move.from,
        to: move.to,
        toMove: state.toMove,
      });
    }

    const cells = [...state.cells];
    cells[move.to] = state.toMove;
    cells[move.from] = "empty";
    return freezeState(this.rows, this.cols, cells, opponent(state.toMove), state.moveCount + 1);
  }

  outcome(state: BoardState): Outcome {
    const lastRow = (this.size - 1) * this.size;
    let countA = 0;
    let countB = 0;

    for (let index = 0; index < state.cells.length; index++) {
      const cell = state.cells[index];
      if (cell === "A") {
        if (index < this.size) return { status: "win", winner: "A" };
        countA++;
      } else if (cell === "B") {
        if (index >= lastRow) return { status: "win", winner: "B" };
        countB++;
      }
    }

    if (countA === 0) return { status: "win", winner: "B" };
    if (countB === 0) return { status: "win", winner: "A" };
    return this.generateSteps(state, state.toMove).length === 0 ? DRAW : ONGOING;
  }

  /**
   * Own minus opponent of: material, rows advanced from the home edge and
   * distance from the centre column.
   */
  evaluate(state: BoardState, perspective: Player): number {
    const centre = Math.floor(this.size / 2);
    let score = 0;

    state.cells.forEach((cell, index) => {
      if (cell !== "A" && cell !== "B") return;
      const row = Math.floor(index / this.size);
      const col = index % this.size;
      const advanced = cell === "A" ? this.size - 1 - row : row;
      const value =
        MATERIAL_WEIGHT + ADVANCE_WEIGHT * advanced - Math.abs(col - centre);
      score += cell === perspective ? value : -value;
    });

    return score;
  }

  /**
   * Steps for `player` in row-major order of the moving piece, targets in
   * ascending cell order (left diagonal, straight, right diagonal).
   */
  private generateSteps(state: BoardState, player: Player): StepMove[] {
    const forward = player === "A" ? -1 : 1;
    const rival = opponent(player);
    const steps: StepMove[] = [];

    state.cells.forEach((cell, from) => {
      if (cell !== player) return;
      const row = Math.floor(from / this.size) + forward;
      if (row < 0 || row >= this.size) return;
      const col = from % this.size;

      for (const dc of [-1, 0, 1]) {
        const c = col + dc;
        if (c < 0 || c >= this.size) continue;
        const to = row * this.size + c;
        const target = state.cells[to];
        if (target === "empty") {
          steps.push({ kind: "step", from, to, capture: false });
        } else if (dc !== 0 && target === rival) {
          steps.push({ kind: "step", from, to, capture: true });
        }
      }
    });

    return steps;
  }
}
