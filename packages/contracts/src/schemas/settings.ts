import { z } from "zod";
import { ENGINE_LIMITS } from "../limits";

export const SearchAlgorithmSchema = z.enum(["minimax", "alpha-beta"]);

export const DifficultyLevelSchema = z.enum(["easy", "medium", "hard", "expert"]);

const TimeBudgetSchema = z
  .number()
  .int("Time budget must be whole milliseconds")
  .positive({ message: "Time budget must be positive" })
  .max(ENGINE_LIMITS.SEARCH.MAX_TIME_BUDGET_MS);

/**
 * Search configuration. `maxDepth` has no upper bound here: the engine
 * clamps it to ENGINE_LIMITS.SEARCH.MAX_DEPTH and warns.
 */
export const SearchConfigSchema = z.object({
  algorithm: SearchAlgorithmSchema,
  maxDepth: z
    .number()
    .int("Search depth must be an integer")
    .min(1, { message: "Search depth must be at least 1" }),
  timeBudgetMs: TimeBudgetSchema.optional(),
  trace: z.boolean().optional(),
});

export const GameSettingsSchema = z.object({
  difficulty: DifficultyLevelSchema,
  boardSize: z.number().int().positive().optional(),
  timeBudgetMs: TimeBudgetSchema.optional(),
  algorithm: SearchAlgorithmSchema.optional(),
  trace: z.boolean().optional(),
});

export type ValidatedSearchConfig = z.infer<typeof SearchConfigSchema>;
export type ValidatedGameSettings = z.infer<typeof GameSettingsSchema>;
