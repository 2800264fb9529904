import type { Move } from "../boards/moves";
import type { Clock } from "../core/clock";
import type { TraceEvent, TraceListener } from "../core/trace";

/**
 * Position in the game tree, identified by the moves leading to it from
 * the root. `depthLimit` is the iteration that produced the node, so
 * events from successive iterative-deepening passes can be told apart.
 */
export interface GameTreeNode {
  readonly path: readonly Move[];
  readonly ply: number;
  readonly maximizing: boolean;
  readonly depthLimit: number;
}

export type GameTraceEvent = TraceEvent<GameTreeNode>;

export interface SearchStats {
  /** Nodes entered, root included */
  readonly nodesVisited: number;
  /** Child moves skipped by alpha-beta cutoffs */
  readonly nodesPruned: number;
  /** nodesPruned / (nodesVisited + nodesPruned), 0 when both are 0 */
  readonly pruningRatio: number;
  readonly leafEvaluations: number;
  readonly maxPlyReached: number;
  readonly averageBranchingFactor: number;
  readonly elapsedMs: number;
}

export interface DecisionResult {
  readonly move: Move;
  readonly score: number;
  /** Depth of the deepest fully completed iteration */
  readonly depthReached: number;
  /** The time budget expired before `maxDepth` was completed */
  readonly timedOut: boolean;
  /** Events of the deepest completed iteration, empty when tracing is off */
  readonly trace: readonly GameTraceEvent[];
  readonly stats: SearchStats;
}

export interface ChooseMoveOptions {
  readonly clock?: Clock;
  /**
   * Streams every event as it happens, including those of an iteration
   * later abandoned on timeout.
   */
  readonly onTrace?: TraceListener<GameTraceEvent>;
}
