/**
 * Trace sink implementations: batch, streaming, fan-out and no-op.
 */

import type { TraceListener, TraceSink } from "./types";

/**
 * Append-only event buffer.
 *
 * A single consumer can poll it while the producer is still running with
 * `readFrom(cursor)`: events are never reordered or removed, so a cursor
 * stays valid until `clear()`.
 */
export class BufferedTraceSink<TEvent> implements TraceSink<TEvent> {
  readonly enabled = true;
  private readonly events: TEvent[] = [];

  emit(event: TEvent): void {
    this.events.push(event);
  }

  get size(): number {
    return this.events.length;
  }

  getEvents(): readonly TEvent[] {
    return this.events;
  }

  /**
   * Events appended since `cursor`, plus the cursor to pass next time.
   */
  readFrom(cursor: number): { events: readonly TEvent[]; cursor: number } {
    const start = Math.max(0, Math.min(cursor, this.events.length));
    return {
      events: this.events.slice(start),
      cursor: this.events.length,
    };
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Streaming sink that hands each event to a listener as it happens.
 */
export class CallbackTraceSink<TEvent> implements TraceSink<TEvent> {
  readonly enabled = true;
  private index = 0;

  constructor(private readonly listener: TraceListener<TEvent>) {}

  emit(event: TEvent): void {
    this.listener(event, this.index++);
  }
}

/**
 * Forwards every event to each enabled target, in order.
 */
export class FanOutTraceSink<TEvent> implements TraceSink<TEvent> {
  readonly enabled: boolean;
  private readonly targets: readonly TraceSink<TEvent>[];

  constructor(targets: readonly TraceSink<TEvent>[]) {
    this.targets = targets.filter((target) => target.enabled);
    this.enabled = this.targets.length > 0;
  }

  emit(event: TEvent): void {
    for (const target of this.targets) {
      target.emit(event);
    }
  }
}

export class NoOpTraceSink<TEvent> implements TraceSink<TEvent> {
  readonly enabled = false;

  emit(_event: TEvent): void {}
}

/**
 * Create a trace sink: a listener gives a streaming sink, `true` a buffer,
 * anything else a no-op.
 */
export function createTraceSink<TEvent>(
  option: boolean | TraceListener<TEvent> | undefined,
): TraceSink<TEvent> {
  if (typeof option === "function") return new CallbackTraceSink(option);
  return option === true ? new BufferedTraceSink<TEvent>() : new NoOpTraceSink<TEvent>();
}
