import type { z } from "zod";
import { BoardDescriptorSchema } from "../schemas/board";
import { JugDescriptorSchema } from "../schemas/jug";
import { MazeDescriptorSchema } from "../schemas/maze";
import { GameSettingsSchema, SearchConfigSchema } from "../schemas/settings";
import { EngineError, type EngineErrorCode } from "../types/error";
import type {
  BoardDescriptor,
  GameSettings,
  JugDescriptor,
  MazeDescriptor,
  SearchConfig,
} from "../types/problems";
import { Err, Ok, type Result } from "../types/result";

function parseWith<T>(
  schema: z.ZodType<T>,
  code: EngineErrorCode,
  subject: string,
  input: unknown,
): Result<T, EngineError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) return Err(EngineError.fromZod(code, subject, parsed.error));
  return Ok(parsed.data);
}

export function parseMazeDescriptor(input: unknown): Result<MazeDescriptor, EngineError> {
  return parseWith(MazeDescriptorSchema, "MAZE_INVALID", "Maze descriptor", input);
}

export function parseJugDescriptor(input: unknown): Result<JugDescriptor, EngineError> {
  return parseWith(JugDescriptorSchema, "JUG_CONFIG_INVALID", "Jug descriptor", input);
}

export function parseBoardDescriptor(input: unknown): Result<BoardDescriptor, EngineError> {
  return parseWith(BoardDescriptorSchema, "BOARD_CONFIG_INVALID", "Board descriptor", input);
}

export function parseSearchConfig(input: unknown): Result<SearchConfig, EngineError> {
  return parseWith(SearchConfigSchema, "SEARCH_CONFIG_INVALID", "Search config", input);
}

export type BuildSettingsInput = Partial<GameSettings>;

/**
 * Build game settings from whatever the settings screen stored,
 * defaulting the difficulty to "medium".
 */
export function buildGameSettings(
  input: BuildSettingsInput,
): Result<GameSettings, EngineError> {
  const candidate: GameSettings = {
    ...input,
    difficulty: input.difficulty ?? "medium",
  };
  return parseWith(GameSettingsSchema, "SETTINGS_INVALID", "Game settings", candidate);
}
