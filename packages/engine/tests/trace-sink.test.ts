import { describe, expect, it } from "vitest";
import {
  BufferedTraceSink,
  CallbackTraceSink,
  createTraceSink,
  FanOutTraceSink,
  NoOpTraceSink,
} from "../src/core/trace";

describe("BufferedTraceSink", () => {
  it("supports incremental reads with a cursor", () => {
    const sink = new BufferedTraceSink<string>();
    sink.emit("a");
    sink.emit("b");
    sink.emit("c");

    const first = sink.readFrom(0);
    expect(first.events).toEqual(["a", "b", "c"]);
    expect(first.cursor).toBe(3);

    sink.emit("d");
    const second = sink.readFrom(first.cursor);
    expect(second.events).toEqual(["d"]);
    expect(second.cursor).toBe(4);

    expect(sink.readFrom(10)).toEqual({ events: [], cursor: 4 });
  });

  it("clears", () => {
    const sink = new BufferedTraceSink<number>();
    sink.emit(1);
    sink.clear();
    expect(sink.size).toBe(0);
    expect(sink.getEvents()).toEqual([]);
  });
});

describe("CallbackTraceSink", () => {
  it("passes a zero-based index with each event", () => {
    const seen: Array<[string, number]> = [];
    const sink = new CallbackTraceSink<string>((event, index) => seen.push([event, index]));
    sink.emit("x");
    sink.emit("y");
    expect(seen).toEqual([
      ["x", 0],
      ["y", 1],
    ]);
  });
});

describe("FanOutTraceSink", () => {
  it("forwards to enabled targets only", () => {
    const buffer = new BufferedTraceSink<number>();
    const fanOut = new FanOutTraceSink<number>([new NoOpTraceSink(), buffer]);
    fanOut.emit(7);
    expect(fanOut.enabled).toBe(true);
    expect(buffer.getEvents()).toEqual([7]);
  });

  it("is disabled when no target is enabled", () => {
    expect(new FanOutTraceSink<number>([new NoOpTraceSink()]).enabled).toBe(false);
  });
});

describe("createTraceSink", () => {
  it("picks the sink from the option", () => {
    expect(createTraceSink<number>(true)).toBeInstanceOf(BufferedTraceSink);
    expect(createTraceSink<number>(() => undefined)).toBeInstanceOf(CallbackTraceSink);
    expect(createTraceSink<number>(undefined).enabled).toBe(false);
    expect(createTraceSink<number>(false)).toBeInstanceOf(NoOpTraceSink);
  });
});
