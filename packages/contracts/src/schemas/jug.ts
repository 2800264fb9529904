import { z } from "zod";
import { ENGINE_LIMITS } from "../limits";

const { MAX_JUGS, MAX_CAPACITY, MAX_STATES } = ENGINE_LIMITS.JUGS;

export const JugDescriptorSchema = z
  .object({
    capacities: z
      .array(
        z
          .number()
          .int("Capacities must be integers")
          .min(1, { message: "Capacities must be positive" })
          .max(MAX_CAPACITY),
      )
      .min(1, { message: "At least one jug is required" })
      .max(MAX_JUGS, { message: `At most ${MAX_JUGS} jugs are supported` }),
    target: z
      .number()
      .int("Target must be an integer")
      .min(0, { message: "Target must be non-negative" }),
    initialLevels: z.array(z.number().int().min(0)).optional(),
  })
  .superRefine((data, ctx) => {
    const stateCount = data.capacities.reduce((acc, cap) => acc * (cap + 1), 1);
    if (stateCount > MAX_STATES) {
      ctx.addIssue({
        code: "custom",
        message: `State space too large (${stateCount} states, max ${MAX_STATES})`,
        path: ["capacities"],
      });
    }

    if (data.initialLevels === undefined) return;
    if (data.initialLevels.length !== data.capacities.length) {
      ctx.addIssue({
        code: "custom",
        message: "One initial level is required per jug",
        path: ["initialLevels"],
      });
      return;
    }
    data.initialLevels.forEach((level, i) => {
      const capacity = data.capacities[i] ?? 0;
      if (level > capacity) {
        ctx.addIssue({
          code: "custom",
          message: `Jug ${i + 1} holds ${level} but its capacity is ${capacity}`,
          path: ["initialLevels", i],
        });
      }
    });
  });

export type ValidatedJugDescriptor = z.infer<typeof JugDescriptorSchema>;
