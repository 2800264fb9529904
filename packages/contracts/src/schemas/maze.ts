import { z } from "zod";
import { ENGINE_LIMITS } from "../limits";

const Dimension = z
  .number()
  .int("Maze dimensions must be integers")
  .min(1, { message: "Maze dimensions must be positive" })
  .max(ENGINE_LIMITS.MAZE.MAX_DIMENSION);

export const CellCoordSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export const TeleporterLinkSchema = z.object({
  from: CellCoordSchema,
  to: CellCoordSchema,
  bidirectional: z.boolean().optional(),
});

/**
 * Structural maze validation. Bounds and blocked-cell checks need the whole
 * grid and are done by GridGraph so they carry their own error codes.
 */
export const MazeDescriptorSchema = z.object({
  rows: Dimension,
  cols: Dimension,
  blocked: z.array(CellCoordSchema),
  teleporters: z.array(TeleporterLinkSchema).optional(),
  start: CellCoordSchema,
  goal: CellCoordSchema,
});

export type ValidatedMazeDescriptor = z.infer<typeof MazeDescriptorSchema>;
