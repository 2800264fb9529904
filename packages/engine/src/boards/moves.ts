/**
 * Board moves. Placement games use a cell index, movement games a
 * (from, to) pair. Cell indices are row-major.
 */

export interface PlacementMove {
  readonly kind: "place";
  readonly index: number;
}

export interface StepMove {
  readonly kind: "step";
  readonly from: number;
  readonly to: number;
  readonly capture: boolean;
}

export type Move = PlacementMove | StepMove;

export function placeAt(index: number): PlacementMove {
  return { kind: "place", index };
}

/**
 * Total order over moves: placements before steps, then by cell index.
 */
export function compareMoves(a: Move, b: Move): number {
  if (a.kind !== b.kind) return a.kind === "place" ? -1 : 1;
  if (a.kind === "place" && b.kind === "place") return a.index - b.index;
  if (a.kind === "step" && b.kind === "step") {
    return a.from !== b.from ? a.from - b.from : a.to - b.to;
  }
  return 0;
}

export function movesEqual(a: Move, b: Move): boolean {
  if (a.kind === "place" && b.kind === "place") return a.index === b.index;
  if (a.kind === "step" && b.kind === "step") {
    return a.from === b.from && a.to === b.to && a.capture === b.capture;
  }
  return false;
}

/**
 * `(row,col)` for placements, `(row,col)-(row,col)` for steps with `x` in
 * place of `-` on a capture.
 */
export function formatMove(move: Move, cols: number): string {
  const cell = (index: number) => `(${Math.floor(index / cols)},${index % cols})`;
  if (move.kind === "place") return cell(move.index);
  return `${cell(move.from)}${move.capture ? "x" : "-"}${cell(move.to)}`;
}
