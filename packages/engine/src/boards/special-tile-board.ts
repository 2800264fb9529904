import {
  type BoardVariant,
  EngineError,
  opponent,
  type SpecialTile,
  type SpecialTileKind,
} from "@algoquest/contracts";
import { TicTacToeBoard } from "./tic-tac-toe";
import { type BoardState, freezeState } from "./types";

/**
 * Tic-tac-toe with special tiles. A tile fires once, when its cell is
 * claimed:
 * - double: the mover plays again
 * - block: the point-mirrored cell becomes blocked if it is still empty
 * - swap: the placed mark belongs to the opponent
 */
export class SpecialTileBoard extends TicTacToeBoard {
  override readonly variant: BoardVariant = "special-tile";
  private readonly tileAt = new Map<number, SpecialTileKind>();

  constructor(size: number, tiles: readonly SpecialTile[]) {
    super(size);
    for (const tile of tiles) {
      if (tile.row < 0 || tile.row >= size || tile.col < 0 || tile.col >= size) {
        throw EngineError.boardConfigInvalid(
          `Special tile (${tile.row}, ${tile.col}) is outside the board`,
          { tile },
        );
      }
      const index = tile.row * size + tile.col;
      if (this.tileAt.has(index)) {
        throw EngineError.boardConfigInvalid(
          `Duplicate special tile at (${tile.row}, ${tile.col})`,
          { tile },
        );
      }
      this.tileAt.set(index, tile.kind);
    }
  }

  tileKind(index: number): SpecialTileKind | undefined {
    return this.tileAt.get(index);
  }

  protected override place(state: BoardState, index: number): BoardState {
    const kind = this.tileAt.get(index);
    const mover = state.toMove;
    const cells = [...state.cells];

    cells[index] = kind === "swap" ? opponent(mover) : mover;

    if (kind === "block") {
      const row = Math.floor(index / this.size);
      const col = index % this.size;
      const mirror = (this.size - 1 - row) * this.size + (this.size - 1 - col);
      if (cells[mirror] === "empty") cells[mirror] = "blocked";
    }

    const next = kind === "double" ? mover : opponent(mover);
    return freezeState(this.rows, this.cols, cells, next, state.moveCount + 1);
  }
}
