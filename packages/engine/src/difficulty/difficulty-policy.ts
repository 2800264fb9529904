/**
 * Difficulty Policy
 *
 * Pure mapping from a difficulty level to the board and search settings of
 * an AI opponent. Consulted once per AI turn. Presets leave tracing off;
 * the visualizer turns it on through `settings.trace`.
 */

import {
  type AdversarialGame,
  type BoardDescriptor,
  buildGameSettings,
  type BuildSettingsInput,
  type DifficultyLevel,
  EngineError,
  ENGINE_LIMITS,
  type GameSettings,
  Result,
  type SearchConfig,
  type SpecialTile,
} from "@algoquest/contracts";

export interface DifficultyProfile {
  readonly boardSize: number;
  readonly specialTiles: readonly SpecialTile[];
  readonly search: SearchConfig;
}

export const DIFFICULTY_PRESETS = {
  "tic-tac-toe": {
    easy: {
      boardSize: 3,
      specialTiles: [],
      search: { algorithm: "alpha-beta", maxDepth: 1, trace: false },
    },
    medium: {
      boardSize: 3,
      specialTiles: [{ row: 0, col: 0, kind: "double" }],
      search: { algorithm: "alpha-beta", maxDepth: 3, trace: false },
    },
    hard: {
      boardSize: 3,
      specialTiles: [
        { row: 0, col: 0, kind: "double" },
        { row: 2, col: 2, kind: "block" },
      ],
      search: { algorithm: "alpha-beta", maxDepth: 9, trace: false },
    },
    expert: {
      boardSize: 4,
      specialTiles: [
        { row: 0, col: 0, kind: "double" },
        { row: 3, col: 3, kind: "block" },
        { row: 1, col: 2, kind: "swap" },
      ],
      search: { algorithm: "alpha-beta", maxDepth: 4, trace: false },
    },
  },
  strategy: {
    easy: {
      boardSize: 5,
      specialTiles: [],
      search: { algorithm: "alpha-beta", maxDepth: 2, timeBudgetMs: 1000, trace: false },
    },
    medium: {
      boardSize: 6,
      specialTiles: [],
      search: { algorithm: "alpha-beta", maxDepth: 3, timeBudgetMs: 1500, trace: false },
    },
    hard: {
      boardSize: 6,
      specialTiles: [],
      search: { algorithm: "alpha-beta", maxDepth: 4, timeBudgetMs: 2000, trace: false },
    },
    expert: {
      boardSize: 7,
      specialTiles: [],
      search: { algorithm: "alpha-beta", maxDepth: 5, timeBudgetMs: 3000, trace: false },
    },
  },
} as const satisfies Record<AdversarialGame, Record<DifficultyLevel, DifficultyProfile>>;

export function searchConfigFor(game: AdversarialGame, level: DifficultyLevel): SearchConfig {
  return { ...DIFFICULTY_PRESETS[game][level].search };
}

/**
 * Preset for `settings.difficulty`, with the settings' board size, time
 * budget, algorithm and trace flag taking precedence. Tiles that fall
 * outside an overridden board are dropped.
 */
export function applySettings(game: AdversarialGame, settings: GameSettings): DifficultyProfile {
  const preset: DifficultyProfile = DIFFICULTY_PRESETS[game][settings.difficulty];
  const boardSize = settings.boardSize ?? preset.boardSize;
  const limits = game === "strategy" ? ENGINE_LIMITS.STRATEGY : ENGINE_LIMITS.TIC_TAC_TOE;

  if (boardSize < limits.MIN_SIZE || boardSize > limits.MAX_SIZE) {
    throw new EngineError(
      "SETTINGS_INVALID",
      `Board size for ${game} must be between ${limits.MIN_SIZE} and ${limits.MAX_SIZE}, got ${boardSize}`,
      { game, boardSize },
    );
  }

  const timeBudgetMs = settings.timeBudgetMs ?? preset.search.timeBudgetMs;
  return {
    boardSize,
    specialTiles: preset.specialTiles.filter(
      (tile) => tile.row < boardSize && tile.col < boardSize,
    ),
    search: {
      algorithm: settings.algorithm ?? preset.search.algorithm,
      maxDepth: preset.search.maxDepth,
      trace: settings.trace ?? preset.search.trace ?? false,
      ...(timeBudgetMs !== undefined && { timeBudgetMs }),
    },
  };
}

/**
 * Validate raw settings and resolve them against the presets of `game`.
 */
export function resolveDifficulty(
  game: AdversarialGame,
  input: BuildSettingsInput,
): Result<DifficultyProfile, EngineError> {
  return buildGameSettings(input).flatMap((settings) =>
    Result.fromThrowable(
      () => applySettings(game, settings),
      (e) =>
        EngineError.isEngineError(e)
          ? e
          : EngineError.create("SETTINGS_INVALID", e instanceof Error ? e.message : String(e)),
    ),
  );
}

/**
 * Board descriptor for a resolved profile. Tic-tac-toe uses the
 * special-tile variant whenever the profile has tiles.
 */
export function boardDescriptorFor(
  game: AdversarialGame,
  profile: DifficultyProfile,
): BoardDescriptor {
  if (game === "strategy") return { variant: "strategy", size: profile.boardSize };
  if (profile.specialTiles.length === 0) return { variant: "plain", size: profile.boardSize };
  return {
    variant: "special-tile",
    size: profile.boardSize,
    specialTiles: [...profile.specialTiles],
  };
}
