import { z } from "zod";
import { ENGINE_LIMITS } from "../limits";

export const PlayerSchema = z.enum(["A", "B"]);

export const SpecialTileSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
  kind: z.enum(["double", "block", "swap"]),
});

export const BoardDescriptorSchema = z
  .object({
    variant: z.enum(["plain", "special-tile", "strategy"]),
    size: z
      .number()
      .int("Board size must be an integer")
      .positive({ message: "Board size must be positive" }),
    marks: z
      .array(
        z.string().regex(/^[.#AB]+$/, {
          message: "Marks may only contain '.', '#', 'A' and 'B'",
        }),
      )
      .optional(),
    specialTiles: z.array(SpecialTileSchema).optional(),
    toMove: PlayerSchema.optional(),
  })
  .superRefine((data, ctx) => {
    const limits =
      data.variant === "strategy"
        ? ENGINE_LIMITS.STRATEGY
        : ENGINE_LIMITS.TIC_TAC_TOE;
    if (data.size < limits.MIN_SIZE || data.size > limits.MAX_SIZE) {
      ctx.addIssue({
        code: "custom",
        message: `Board size for ${data.variant} must be between ${limits.MIN_SIZE} and ${limits.MAX_SIZE}`,
        path: ["size"],
      });
      return;
    }

    if (data.marks !== undefined) {
      if (data.marks.length !== data.size) {
        ctx.addIssue({
          code: "custom",
          message: `Expected ${data.size} rows of marks, got ${data.marks.length}`,
          path: ["marks"],
        });
      }
      data.marks.forEach((row, i) => {
        if (row.length !== data.size) {
          ctx.addIssue({
            code: "custom",
            message: `Row ${i} has ${row.length} cells, expected ${data.size}`,
            path: ["marks", i],
          });
        }
      });
    }

    const tiles = data.specialTiles ?? [];
    if (tiles.length > 0 && data.variant !== "special-tile") {
      ctx.addIssue({
        code: "custom",
        message: "Special tiles are only allowed on the special-tile variant",
        path: ["specialTiles"],
      });
      return;
    }
    const seen = new Set<number>();
    tiles.forEach((tile, i) => {
      if (tile.row >= data.size || tile.col >= data.size) {
        ctx.addIssue({
          code: "custom",
          message: `Special tile (${tile.row}, ${tile.col}) is outside the board`,
          path: ["specialTiles", i],
        });
      }
      const key = tile.row * data.size + tile.col;
      if (seen.has(key)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate special tile at (${tile.row}, ${tile.col})`,
          path: ["specialTiles", i],
        });
      }
      seen.add(key);
    });
  });

export type ValidatedBoardDescriptor = z.infer<typeof BoardDescriptorSchema>;
