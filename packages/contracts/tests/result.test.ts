import { describe, expect, it } from "vitest";
import { Err, Ok, Result } from "../src";

describe("Result", () => {
  it("maps ok values and skips errors", () => {
    expect(Ok<number, string>(2).map((n) => n * 3).value).toBe(6);
    expect(Err<number, string>("nope").map((n) => n * 3).error).toBe("nope");
  });

  it("chains with flatMap", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);
    expect(Ok<number, string>(8).flatMap(half).flatMap(half).value).toBe(2);
    expect(Ok<number, string>(6).flatMap(half).flatMap(half).error).toBe("3 is odd");
  });

  it("matches both branches", () => {
    const render = (r: Result<number, string>) =>
      r.match(
        (v) => `ok:${v}`,
        (e) => `err:${e}`,
      );
    expect(render(Ok(1))).toBe("ok:1");
    expect(render(Err("x"))).toBe("err:x");
  });

  it("captures thrown errors with fromThrowable", () => {
    const res = Result.fromThrowable(
      () => {
        throw new Error("boom");
      },
      (e) => (e instanceof Error ? e.message : "unknown"),
    );
    expect(res.isErr()).toBe(true);
    expect(res.error).toBe("boom");
  });

  it("throws on the wrong accessor", () => {
    expect(() => Ok(1).error).toThrow("Cannot access error of Ok Result");
    expect(() => Err("x").value).toThrow("Cannot access value of Err Result");
    expect(() => Err(new Error("bad")).getOrThrow()).toThrow("bad");
  });

  it("serializes to JSON", () => {
    expect(Ok(3).toJSON()).toEqual({ success: true, value: 3 });
    expect(Err("e").toJSON()).toEqual({ success: false, error: "e" });
    expect(Err<number, string>("e").getOrElse(9)).toBe(9);
  });
});
