/**
 * Adversarial Search
 *
 * Depth-limited minimax and alpha-beta over any Board, with optional
 * iterative deepening under a time budget.
 *
 * Whether a node maximises is decided by whose turn it is, not by
 * alternating layers, so variants that grant an extra turn are searched
 * correctly. At the root the best move only changes on a strictly greater
 * score, so ties go to the first move in `legalMoves` order. Alpha-beta
 * never narrows beta at the root, which keeps its chosen move and score
 * identical to minimax.
 */

import {
  EngineError,
  ENGINE_LIMITS,
  parseSearchConfig,
  type Player,
  type SearchAlgorithm,
  type SearchConfig,
} from "@algoquest/contracts";
import { type Move, formatMove } from "../boards/moves";
import type { Board, BoardState, Outcome } from "../boards/types";
import { type Clock, systemClock } from "../core/clock";
import { BufferedTraceSink, createTraceSink, FanOutTraceSink, type TraceSink } from "../core/trace";
import { ENGINE_CONFIG } from "../config";
import type {
  ChooseMoveOptions,
  DecisionResult,
  GameTraceEvent,
  GameTreeNode,
  SearchStats,
} from "./types";

/**
 * Thrown on node entry once the deadline has passed. Only the deepening
 * loop catches it.
 */
class SearchDeadlineExceeded extends Error {
  override readonly name = "SearchDeadlineExceeded";
}

interface Deadline {
  readonly clock: Clock;
  readonly at: number;
}

interface IterationResult {
  readonly move: Move;
  readonly score: number;
  readonly depth: number;
  /** Some leaf was scored by the heuristic because it hit the depth limit */
  readonly hitDepthCutoff: boolean;
  readonly trace: readonly GameTraceEvent[];
  readonly counters: IterationCounters;
}

interface IterationCounters {
  nodesVisited: number;
  nodesPruned: number;
  leafEvaluations: number;
  maxPlyReached: number;
  expandedNodes: number;
  childrenGenerated: number;
}

/**
 * Score of a finished game from `player`'s point of view. Wins found at a
 * lower ply score higher.
 */
export function terminalScore(outcome: Outcome, player: Player, ply: number): number {
  if (outcome.status !== "win") return 0;
  const magnitude = ENGINE_CONFIG.SEARCH.WIN_SCORE - ply;
  return outcome.winner === player ? magnitude : -magnitude;
}

/**
 * Pick a move for `player`, who must be the side to move.
 *
 * With `timeBudgetMs` set, depths 1..maxDepth are searched in turn and the
 * result of the deepest completed depth is returned. Depth 1 always
 * completes, whatever the budget.
 *
 * @throws EngineError GAME_OVER if the game is finished or has no legal move
 * @throws EngineError BOARD_MOVE_ILLEGAL if it is not `player`'s turn
 * @throws EngineError SEARCH_CONFIG_INVALID for a malformed config
 */
export function chooseMove(
  board: Board,
  state: BoardState,
  player: Player,
  config: SearchConfig,
  options: ChooseMoveOptions = {},
): DecisionResult {
  const validated = parseSearchConfig(config).getOrThrow();
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();

  const outcome = board.outcome(state);
  if (outcome.status !== "ongoing") {
    throw EngineError.gameOver("Cannot search a finished game", { outcome });
  }
  if (state.toMove !== player) {
    throw EngineError.illegalMove(`It is ${state.toMove}'s turn, not ${player}'s`, {
      toMove: state.toMove,
      player,
    });
  }
  const rootMoves = board.legalMoves(state);
  if (rootMoves.length === 0) {
    throw EngineError.gameOver(`${player} has no legal move`, { player });
  }

  const maxDepth = clampDepth(validated.maxDepth);
  const recordTrace = validated.trace ?? true;
  const listener: TraceSink<GameTraceEvent> = createTraceSink(options.onTrace);

  const runIteration = (depth: number, deadline: Deadline | undefined): IterationResult => {
    const buffer = createTraceSink<GameTraceEvent>(recordTrace);
    const search = new DepthLimitedSearch(
      board,
      player,
      validated.algorithm,
      depth,
      new FanOutTraceSink([buffer, listener]),
      deadline,
    );
    const best = search.searchRoot(state, rootMoves);
    return {
      ...best,
      depth,
      hitDepthCutoff: search.hitDepthCutoff,
      trace: buffer instanceof BufferedTraceSink ? buffer.getEvents() : [],
      counters: search.counters,
    };
  };

  let completed: IterationResult;
  let timedOut = false;

  if (validated.timeBudgetMs === undefined) {
    completed = runIteration(maxDepth, undefined);
  } else {
    const deadline: Deadline = { clock, at: startedAt + validated.timeBudgetMs };
    completed = runIteration(1, undefined);
    logIteration(completed, board);

    for (let depth = 2; depth <= maxDepth && completed.hitDepthCutoff; depth++) {
      if (clock.now() >= deadline.at) {
        timedOut = true;
        break;
      }
      try {
        completed = runIteration(depth, deadline);
      } catch (error) {
        if (!(error instanceof SearchDeadlineExceeded)) throw error;
        timedOut = true;
        break;
      }
      logIteration(completed, board);
    }

    if (timedOut && completed.depth === 1 && maxDepth > 1) {
      console.warn(
        `[AdversarialSearch] Time budget of ${validated.timeBudgetMs}ms expired after depth 1`,
      );
    }
  }

  return {
    move: completed.move,
    score: completed.score,
    depthReached: completed.depth,
    timedOut,
    trace: completed.trace,
    stats: buildStats(completed.counters, clock.now() - startedAt),
  };
}

function clampDepth(requested: number): number {
  const max = ENGINE_LIMITS.SEARCH.MAX_DEPTH;
  if (requested <= max) return requested;
  console.warn(`[AdversarialSearch] maxDepth ${requested} clamped to ${max}`);
  return max;
}

function logIteration(iteration: IterationResult, board: Board): void {
  if (!ENGINE_CONFIG.DEBUG) return;
  console.debug(
    `[AdversarialSearch] depth ${iteration.depth}: ${formatMove(iteration.move, board.cols)} ` +
      `score=${iteration.score} nodes=${iteration.counters.nodesVisited} ` +
      `pruned=${iteration.counters.nodesPruned}`,
  );
}

function buildStats(counters: IterationCounters, elapsedMs: number): SearchStats {
  const { nodesVisited, nodesPruned } = counters;
  const total = nodesVisited + nodesPruned;
  return {
    nodesVisited,
    nodesPruned,
    pruningRatio: total === 0 ? 0 : nodesPruned / total,
    leafEvaluations: counters.leafEvaluations,
    maxPlyReached: counters.maxPlyReached,
    averageBranchingFactor:
      counters.expandedNodes === 0 ? 0 : counters.childrenGenerated / counters.expandedNodes,
    elapsedMs,
  };
}

/**
 * One fixed-depth pass. Owns its counters and trace sink.
 */
class DepthLimitedSearch {
  readonly counters: IterationCounters = {
    nodesVisited: 0,
    nodesPruned: 0,
    leafEvaluations: 0,
    maxPlyReached: 0,
    expandedNodes: 0,
    childrenGenerated: 0,
  };
  hitDepthCutoff = false;
  private readonly pruning: boolean;

  constructor(
    private readonly board: Board,
    private readonly player: Player,
    algorithm: SearchAlgorithm,
    private readonly depthLimit: number,
    private readonly sink: TraceSink<GameTraceEvent>,
    private readonly deadline: Deadline | undefined,
  ) {
    this.pruning = algorithm === "alpha-beta";
  }

  searchRoot(state: BoardState, moves: readonly Move[]): { move: Move; score: number } {
    this.enter(state, [], 0);
    this.counters.expandedNodes++;
    this.counters.childrenGenerated += moves.length;

    let alpha = -Infinity;
    const beta = Infinity;
    let best: { move: Move; score: number } | undefined;

    for (const move of moves) {
      const score = this.value(this.board.applyMove(state, move), [move], 1, alpha, beta);
      if (best === undefined || score > best.score) {
        best = { move, score };
      }
      if (this.pruning) alpha = Math.max(alpha, best.score);
    }

    if (best === undefined) {
      throw EngineError.gameOver(`${this.player} has no legal move`, { player: this.player });
    }
    return best;
  }

  private value(
    state: BoardState,
    path: readonly Move[],
    ply: number,
    alpha: number,
    beta: number,
  ): number {
    const maximizing = this.enter(state, path, ply);

    const outcome = this.board.outcome(state);
    if (outcome.status !== "ongoing") {
      const score = terminalScore(outcome, this.player, ply);
      return this.leaf(path, ply, maximizing, score, alpha, beta, true);
    }
    if (ply >= this.depthLimit) {
      this.hitDepthCutoff = true;
      const score = this.board.evaluate(state, this.player);
      return this.leaf(path, ply, maximizing, score, alpha, beta, false);
    }

    const moves = this.board.legalMoves(state);
    this.counters.expandedNodes++;
    this.counters.childrenGenerated += moves.length;

    let best = maximizing ? -Infinity : Infinity;
    for (let i = 0; i < moves.length; i++) {
      const move = moves[i];
      if (move === undefined) continue;
      const child = this.board.applyMove(state, move);
      const score = this.value(child, [...path, move], ply + 1, alpha, beta);

      if (maximizing) {
        best = Math.max(best, score);
        if (this.pruning) alpha = Math.max(alpha, best);
      } else {
        best = Math.min(best, score);
        if (this.pruning) beta = Math.min(beta, best);
      }

      if (this.pruning && alpha >= beta) {
        this.prune(state, path, ply + 1, moves.slice(i + 1), alpha, beta);
        break;
      }
    }
    return best;
  }

  /**
   * Count and trace entry into a node. Returns whether it maximises.
   */
  private enter(state: BoardState, path: readonly Move[], ply: number): boolean {
    if (this.deadline && this.deadline.clock.now() >= this.deadline.at) {
      throw new SearchDeadlineExceeded(`Deadline passed at depth ${this.depthLimit}`);
    }

    const maximizing = state.toMove === this.player;
    this.counters.nodesVisited++;
    if (ply > this.counters.maxPlyReached) this.counters.maxPlyReached = ply;
    if (this.sink.enabled) {
      this.sink.emit({ kind: "visited", node: this.node(path, ply, maximizing), depth: ply });
    }
    return maximizing;
  }

  private leaf(
    path: readonly Move[],
    ply: number,
    maximizing: boolean,
    score: number,
    alpha: number,
    beta: number,
    terminal: boolean,
  ): number {
    this.counters.leafEvaluations++;
    if (this.sink.enabled) {
      this.sink.emit({
        kind: "evaluated",
        node: this.node(path, ply, maximizing),
        score,
        alpha,
        beta,
        terminal,
      });
    }
    return score;
  }

  private prune(
    parent: BoardState,
    path: readonly Move[],
    ply: number,
    skipped: readonly Move[],
    alpha: number,
    beta: number,
  ): void {
    this.counters.nodesPruned += skipped.length;
    if (!this.sink.enabled) return;

    for (const move of skipped) {
      const child = this.board.applyMove(parent, move);
      this.sink.emit({
        kind: "pruned",
        node: this.node([...path, move], ply, child.toMove === this.player),
        alpha,
        beta,
      });
    }
  }

  private node(path: readonly Move[], ply: number, maximizing: boolean): GameTreeNode {
    return { path, ply, maximizing, depthLimit: this.depthLimit };
  }
}
