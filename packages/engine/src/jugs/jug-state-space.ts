/**
 * Water Jug State Space
 *
 * States are tuples of fill levels. Transitions fill a jug, empty a jug or
 * pour one jug into another until the source is empty or the destination
 * is full. Moves that would not change the state are never generated.
 *
 * Successor order is fixed: fills by jug index, empties by jug index, then
 * pours by (source, destination). BFS over this order is what makes
 * `solve` and `hint` deterministic.
 */

import {
  EngineError,
  type JugDescriptor,
  parseJugDescriptor,
  Result,
} from "@algoquest/contracts";
import { FastQueue, NO_PARENT, SearchArena } from "../core/data-structures";
import type { TraceSink, VisitedEvent } from "../core/trace";

export type JugState = readonly number[];

export type JugMove =
  | { readonly kind: "fill"; readonly jug: number }
  | { readonly kind: "empty"; readonly jug: number }
  | { readonly kind: "pour"; readonly from: number; readonly to: number; readonly amount: number };

export type InfeasibleReason = "not-multiple-of-gcd" | "exceeds-capacity";

export type Feasibility =
  | { readonly feasible: true }
  | { readonly feasible: false; readonly reason: InfeasibleReason };

export type JugSolution =
  | {
      readonly status: "solved";
      readonly moves: readonly JugMove[];
      /** Initial state followed by the state after each move */
      readonly states: readonly JugState[];
      readonly statesExplored: number;
    }
  | { readonly status: "infeasible"; readonly reason: InfeasibleReason }
  | { readonly status: "unreachable"; readonly statesExplored: number };

export type JugHint =
  | { readonly status: "move"; readonly move: JugMove; readonly remaining: number }
  | { readonly status: "solved" }
  | { readonly status: "infeasible"; readonly reason: InfeasibleReason }
  | { readonly status: "unreachable" };

export interface JugSuccessor {
  readonly move: JugMove;
  readonly state: JugState;
}

export type JugTraceEvent = VisitedEvent<JugState>;

export interface JugSolveOptions {
  readonly trace?: TraceSink<JugTraceEvent>;
}

export interface JugPuzzle {
  readonly space: JugStateSpace;
  readonly initialState: JugState;
}

// =============================================================================
// FEASIBILITY
// =============================================================================

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * A target is reachable from all-empty jugs iff it is a multiple of the gcd
 * of the capacities and fits in the largest jug.
 */
export function checkFeasibility(capacities: readonly number[], target: number): Feasibility {
  const largest = Math.max(...capacities);
  if (target > largest) return { feasible: false, reason: "exceeds-capacity" };

  const divisor = capacities.reduce((acc, cap) => gcd(acc, cap), 0);
  if (divisor === 0 || target % divisor !== 0) {
    return { feasible: false, reason: "not-multiple-of-gcd" };
  }
  return { feasible: true };
}

export function isFeasible(capacities: readonly number[], target: number): boolean {
  return checkFeasibility(capacities, target).feasible;
}

// =============================================================================
// STATE SPACE
// =============================================================================

export class JugStateSpace {
  readonly capacities: readonly number[];
  readonly target: number;
  private readonly strides: readonly number[];

  /**
   * @throws EngineError JUG_CONFIG_INVALID for non-positive capacities, a
   * negative target or a state space over ENGINE_LIMITS.JUGS.MAX_STATES
   */
  constructor(capacities: readonly number[], target: number) {
    parseJugDescriptor({ capacities, target }).getOrThrow();
    this.capacities = [...capacities];
    this.target = target;

    const strides: number[] = [];
    let stride = 1;
    for (const capacity of capacities) {
      strides.push(stride);
      stride *= capacity + 1;
    }
    this.strides = strides;
  }

  static fromDescriptor(input: unknown): Result<JugPuzzle, EngineError> {
    return parseJugDescriptor(input).map((descriptor: JugDescriptor) => {
      const space = new JugStateSpace(descriptor.capacities, descriptor.target);
      return {
        space,
        initialState: descriptor.initialLevels ? [...descriptor.initialLevels] : space.emptyState,
      };
    });
  }

  get jugCount(): number {
    return this.capacities.length;
  }

  /** Upper bound on distinct states: the product of (capacity + 1) */
  get stateCount(): number {
    return this.capacities.reduce((acc, cap) => acc * (cap + 1), 1);
  }

  get emptyState(): JugState {
    return this.capacities.map(() => 0);
  }

  feasibility(): Feasibility {
    return checkFeasibility(this.capacities, this.target);
  }

  isGoal(state: JugState): boolean {
    return state.some((level) => level === this.target);
  }

  /**
   * Dense integer key of a state (mixed radix over capacity + 1).
   */
  keyOf(state: JugState): number {
    let key = 0;
    for (let i = 0; i < state.length; i++) {
      key += (state[i] ?? 0) * (this.strides[i] ?? 0);
    }
    return key;
  }

  /**
   * @throws EngineError JUG_STATE_INVALID if the tuple does not fit the jugs
   */
  assertValidState(state: JugState): void {
    if (state.length !== this.capacities.length) {
      throw new EngineError(
        "JUG_STATE_INVALID",
        `Expected ${this.capacities.length} levels, got ${state.length}`,
        { state: [...state] },
      );
    }
    state.forEach((level, i) => {
      const capacity = this.capacities[i] ?? 0;
      if (!Number.isInteger(level) || level < 0 || level > capacity) {
        throw new EngineError(
          "JUG_STATE_INVALID",
          `Jug ${i + 1} level ${level} is outside 0..${capacity}`,
          { state: [...state], jug: i },
        );
      }
    });
  }

  successors(state: JugState): JugSuccessor[] {
    const result: JugSuccessor[] = [];
    const n = this.capacities.length;

    for (let jug = 0; jug < n; jug++) {
      if ((state[jug] ?? 0) < (this.capacities[jug] ?? 0)) {
        const move: JugMove = { kind: "fill", jug };
        result.push({ move, state: this.transition(state, move) });
      }
    }
    for (let jug = 0; jug < n; jug++) {
      if ((state[jug] ?? 0) > 0) {
        const move: JugMove = { kind: "empty", jug };
        result.push({ move, state: this.transition(state, move) });
      }
    }
    for (let from = 0; from < n; from++) {
      for (let to = 0; to < n; to++) {
        if (from === to) continue;
        const amount = this.pourAmount(state, from, to);
        if (amount === 0) continue;
        const move: JugMove = { kind: "pour", from, to, amount };
        result.push({ move, state: this.transition(state, move) });
      }
    }

    return result;
  }

  /**
   * Apply a move to a state, returning a new tuple. A pour moves
   * `min(source, destination free space)`; the move's `amount` is ignored.
   */
  apply(state: JugState, move: JugMove): JugState {
    this.assertValidState(state);
    this.assertJugIndex(move.kind === "pour" ? move.from : move.jug);
    if (move.kind === "pour") {
      this.assertJugIndex(move.to);
      if (move.from === move.to) {
        throw new EngineError("JUG_STATE_INVALID", "Cannot pour a jug into itself", {
          jug: move.from,
        });
      }
    }
    return this.transition(state, move);
  }

  // ===========================================================================
  // SOLVING
  // ===========================================================================

  /**
   * Shortest move sequence from `initial` (all-empty by default) to a state
   * where some jug holds the target.
   *
   * From all-empty jugs an infeasible target is reported without searching.
   * From custom levels the search runs until the reachable space is
   * exhausted and reports "unreachable".
   */
  solve(initial: JugState = this.emptyState, options: JugSolveOptions = {}): JugSolution {
    this.assertValidState(initial);

    if (initial.every((level) => level === 0)) {
      const feasibility = this.feasibility();
      if (!feasibility.feasible) return { status: "infeasible", reason: feasibility.reason };
    }

    const outcome = this.search(initial, options.trace);
    if (outcome.path === undefined) {
      return { status: "unreachable", statesExplored: outcome.explored };
    }

    const moves: JugMove[] = [];
    const states: JugState[] = [];
    for (const step of outcome.path) {
      states.push(step.state);
      if (step.move) moves.push(step.move);
    }
    return { status: "solved", moves, states, statesExplored: outcome.explored };
  }

  /**
   * First move of a shortest solution from `current`. Always the same move
   * for the same state.
   */
  hint(current: JugState): JugHint {
    this.assertValidState(current);

    const feasibility = this.feasibility();
    if (!feasibility.feasible) return { status: "infeasible", reason: feasibility.reason };
    if (this.isGoal(current)) return { status: "solved" };

    const { path } = this.search(current, undefined);
    const first = path?.[1]?.move;
    if (path === undefined || first === undefined) return { status: "unreachable" };
    return { status: "move", move: first, remaining: path.length - 1 };
  }

  private search(
    initial: JugState,
    trace: TraceSink<JugTraceEvent> | undefined,
  ): { path?: JugPathStep[]; explored: number } {
    const arena = new SearchArena<JugPathStep>();
    const seen = new Uint8Array(this.stateCount);
    const frontier = new FastQueue<number>();
    let explored = 0;

    seen[this.keyOf(initial)] = 1;
    frontier.enqueue(arena.add({ state: initial }, NO_PARENT));

    try {
      for (let handle = frontier.dequeue(); handle !== undefined; handle = frontier.dequeue()) {
        const { state } = arena.item(handle);
        explored++;
        if (trace?.enabled) {
          trace.emit({ kind: "visited", node: state, depth: arena.depth(handle) });
        }
        if (this.isGoal(state)) return { path: arena.pathTo(handle), explored };

        for (const next of this.successors(state)) {
          const key = this.keyOf(next.state);
          if (seen[key] === 1) continue;
          seen[key] = 1;
          frontier.enqueue(arena.add(next, handle));
        }
      }
      return { explored };
    } finally {
      arena.clear();
    }
  }

  private transition(state: JugState, move: JugMove): JugState {
    const next = [...state];
    switch (move.kind) {
      case "fill":
        next[move.jug] = this.capacities[move.jug] ?? 0;
        break;
      case "empty":
        next[move.jug] = 0;
        break;
      case "pour": {
        const amount = this.pourAmount(state, move.from, move.to);
        next[move.from] = (state[move.from] ?? 0) - amount;
        next[move.to] = (state[move.to] ?? 0) + amount;
        break;
      }
    }
    return next;
  }

  private pourAmount(state: JugState, from: number, to: number): number {
    const source = state[from] ?? 0;
    const space = (this.capacities[to] ?? 0) - (state[to] ?? 0);
    return Math.min(source, space);
  }

  private assertJugIndex(jug: number): void {
    if (!Number.isInteger(jug) || jug < 0 || jug >= this.capacities.length) {
      throw new EngineError("JUG_STATE_INVALID", `No jug at index ${jug}`, { jug });
    }
  }
}

interface JugPathStep {
  readonly state: JugState;
  readonly move?: JugMove;
}

// =============================================================================
// CONVENIENCE
// =============================================================================

export function solveJugs(capacities: readonly number[], target: number): JugSolution {
  return new JugStateSpace(capacities, target).solve();
}

export function jugHint(
  capacities: readonly number[],
  current: JugState,
  target: number,
): JugHint {
  return new JugStateSpace(capacities, target).hint(current);
}

/**
 * Player-facing label, jugs numbered from 1.
 */
export function describeJugMove(move: JugMove): string {
  switch (move.kind) {
    case "fill":
      return `Fill jug ${move.jug + 1}`;
    case "empty":
      return `Empty jug ${move.jug + 1}`;
    case "pour":
      return `Pour ${move.amount}L from jug ${move.from + 1} to jug ${move.to + 1}`;
  }
}
