/**
 * Search Trace Types
 *
 * Ordered record of search-internal events used to replay a search step by
 * step. Events are emitted in exact algorithmic order.
 */

/**
 * A node was expanded (path/jug search) or entered (game tree search).
 */
export interface VisitedEvent<TNode> {
  readonly kind: "visited";
  readonly node: TNode;
  readonly depth: number;
}

/**
 * Frontier contents after an expansion, in the order they will be taken.
 */
export interface FrontierEvent<TNode> {
  readonly kind: "frontier";
  readonly nodes: readonly TNode[];
}

/**
 * A game tree leaf received a score (terminal or heuristic).
 */
export interface EvaluatedEvent<TNode> {
  readonly kind: "evaluated";
  readonly node: TNode;
  readonly score: number;
  readonly alpha: number;
  readonly beta: number;
  readonly terminal: boolean;
}

/**
 * A child was skipped because alpha ≥ beta at its parent.
 * `alpha`/`beta` are the parent's bounds at the moment of the cutoff.
 */
export interface PrunedEvent<TNode> {
  readonly kind: "pruned";
  readonly node: TNode;
  readonly alpha: number;
  readonly beta: number;
}

export type TraceEvent<TNode> =
  | VisitedEvent<TNode>
  | FrontierEvent<TNode>
  | EvaluatedEvent<TNode>
  | PrunedEvent<TNode>;

/**
 * Destination for trace events.
 *
 * Producers check `enabled` before building an event so a disabled sink
 * costs nothing.
 */
export interface TraceSink<TEvent> {
  readonly enabled: boolean;
  emit(event: TEvent): void;
}

export type TraceListener<TEvent> = (event: TEvent, index: number) => void;
