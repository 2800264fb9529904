import { type CellCoord, EngineError, type TeleporterLink } from "@algoquest/contracts";
import type { Clock } from "../src/core/clock";
import { GridGraph } from "../src/maze/grid-graph";

export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return EngineError.isEngineError(error) ? error.code : `non-engine: ${String(error)}`;
  }
  return undefined;
}

/**
 * Grid from ASCII rows, `#` for blocked cells.
 */
export function gridFromAscii(
  lines: readonly string[],
  teleporters: readonly TeleporterLink[] = [],
): GridGraph {
  const blocked: CellCoord[] = [];
  lines.forEach((line, row) => {
    [...line].forEach((char, col) => {
      if (char === "#") blocked.push({ row, col });
    });
  });
  return new GridGraph(lines.length, lines[0]?.length ?? 0, blocked, teleporters);
}

export function fixedClock(time = 0): Clock {
  return { now: () => time };
}

/**
 * Clock that returns `start`, then advances by `step` on every read.
 */
export function steppingClock(step: number, start = 0): Clock {
  let time = start;
  return {
    now: () => {
      const current = time;
      time += step;
      return current;
    },
  };
}

export function cell(row: number, col: number): CellCoord {
  return { row, col };
}
