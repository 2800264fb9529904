import {
  type BoardDescriptor,
  EngineError,
  parseBoardDescriptor,
  type Player,
  Result,
} from "@algoquest/contracts";
import { SpecialTileBoard } from "./special-tile-board";
import { StrategyBoard } from "./strategy-board";
import { TicTacToeBoard } from "./tic-tac-toe";
import { type Board, type BoardState, type CellContent, freezeState } from "./types";

export interface GameSetup {
  readonly board: Board;
  readonly state: BoardState;
}

const MARK_CONTENT: Record<string, CellContent> = {
  ".": "empty",
  "#": "blocked",
  A: "A",
  B: "B",
};

/**
 * Validate a board descriptor and build the board and its starting state.
 */
export function createGame(input: unknown): Result<GameSetup, EngineError> {
  return parseBoardDescriptor(input).flatMap((descriptor: BoardDescriptor) =>
    Result.fromThrowable(
      () => {
        const board = createBoard(descriptor);
        const toMove = descriptor.toMove ?? "A";
        const state = descriptor.marks
          ? stateFromMarks(board, descriptor.marks, toMove)
          : board.initialState(toMove);
        return { board, state };
      },
      (e) =>
        EngineError.isEngineError(e)
          ? e
          : EngineError.boardConfigInvalid(e instanceof Error ? e.message : String(e)),
    ),
  );
}

export function createBoard(descriptor: BoardDescriptor): Board {
  switch (descriptor.variant) {
    case "plain":
      return new TicTacToeBoard(descriptor.size);
    case "special-tile":
      return new SpecialTileBoard(descriptor.size, descriptor.specialTiles ?? []);
    case "strategy":
      return new StrategyBoard(descriptor.size);
  }
}

/**
 * Build a position from mark rows (`.` empty, `#` blocked, `A`, `B`).
 * Placement variants count every mark on the board as a move played.
 */
export function stateFromMarks(
  board: Board,
  marks: readonly string[],
  toMove: Player,
): BoardState {
  if (marks.length !== board.rows || marks.some((row) => row.length !== board.cols)) {
    throw EngineError.boardConfigInvalid(
      `Marks must be ${board.rows} rows of ${board.cols} cells`,
      { marks: [...marks] },
    );
  }

  const cells: CellContent[] = [];
  for (const row of marks) {
    for (const char of row) {
      const content = MARK_CONTENT[char];
      if (content === undefined) {
        throw EngineError.boardConfigInvalid(`Unknown mark '${char}'`, { mark: char });
      }
      cells.push(content);
    }
  }

  const moveCount =
    board.variant === "strategy" ? 0 : cells.filter((c) => c === "A" || c === "B").length;
  return freezeState(board.rows, board.cols, cells, toMove, moveCount);
}

/**
 * Inverse of `stateFromMarks`.
 */
export function stateToMarks(state: BoardState): string[] {
  const glyph: Record<CellContent, string> = { empty: ".", blocked: "#", A: "A", B: "B" };
  const rows: string[] = [];
  for (let row = 0; row < state.rows; row++) {
    rows.push(
      state.cells
        .slice(row * state.cols, (row + 1) * state.cols)
        .map((cell) => glyph[cell])
        .join(""),
    );
  }
  return rows;
}
