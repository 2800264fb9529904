import { describe, expect, it } from "vitest";
import {
  buildGameSettings,
  EngineError,
  parseBoardDescriptor,
  parseJugDescriptor,
  parseMazeDescriptor,
  parseSearchConfig,
} from "../src";

describe("buildGameSettings", () => {
  it("defaults the difficulty", () => {
    const res = buildGameSettings({});
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.difficulty).toBe("medium");
    expect(res.value.timeBudgetMs).toBeUndefined();
  });

  it("keeps explicit overrides", () => {
    const res = buildGameSettings({ difficulty: "expert", timeBudgetMs: 750, boardSize: 7 });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual({ difficulty: "expert", timeBudgetMs: 750, boardSize: 7 });
  });

  it("accepts a trace flag", () => {
    const res = buildGameSettings({ difficulty: "hard", trace: true });
    expect(res.value).toEqual({ difficulty: "hard", trace: true });
  });

  it("reports invalid settings as SETTINGS_INVALID", () => {
    const res = buildGameSettings({ timeBudgetMs: -5 });
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("SETTINGS_INVALID");
  });
});

describe("descriptor parsers", () => {
  it("map schema failures to the matching error code", () => {
    expect(parseMazeDescriptor({ rows: 2 }).error.code).toBe("MAZE_INVALID");
    expect(parseJugDescriptor({ capacities: [0], target: 1 }).error.code).toBe(
      "JUG_CONFIG_INVALID",
    );
    expect(parseBoardDescriptor({ variant: "plain", size: 0 }).error.code).toBe(
      "BOARD_CONFIG_INVALID",
    );
    expect(parseSearchConfig({ algorithm: "minimax", maxDepth: 0 }).error.code).toBe(
      "SEARCH_CONFIG_INVALID",
    );
  });

  it("lists every issue in the error details", () => {
    const res = parseJugDescriptor({ capacities: [0, -1], target: -2 });
    expect(res.success).toBe(false);
    const issues = res.error.details?.issues;
    expect(Array.isArray(issues)).toBe(true);
    expect((issues as unknown[]).length).toBe(3);
  });

  it("names the failing path in the message", () => {
    const res = parseJugDescriptor({ capacities: [4, 3], target: 2, initialLevels: [5, 0] });
    expect(res.error.message).toBe("Jug descriptor: initialLevels.0: Jug 1 holds 5 but its capacity is 4");
  });

  it("returns the parsed descriptor on success", () => {
    const res = parseJugDescriptor({ capacities: [5, 3], target: 4 });
    expect(res.success).toBe(true);
    expect(res.value).toEqual({ capacities: [5, 3], target: 4 });
  });
});

describe("EngineError", () => {
  it("serializes code and details", () => {
    const error = EngineError.gameOver("Game already finished", { winner: "A" });
    expect(error).toBeInstanceOf(Error);
    expect(EngineError.isEngineError(error)).toBe(true);
    expect(error.toJSON()).toEqual({
      name: "EngineError",
      code: "GAME_OVER",
      message: "Game already finished",
      details: { winner: "A" },
    });
  });

  it("omits details when there are none", () => {
    const error = EngineError.create("MAZE_INVALID", "bad maze");
    expect(error.toJSON()).toEqual({
      name: "EngineError",
      code: "MAZE_INVALID",
      message: "bad maze",
    });
  });
});
