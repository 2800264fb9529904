export const ENGINE_CONFIG = {
  SEARCH: {
    /** Terminal win score before the ply adjustment that prefers quicker wins */
    WIN_SCORE: 1_000_000,
  },

  /** Enables per-depth debug logging from the adversarial search */
  DEBUG: process.env.ALGOQUEST_DEBUG === "1",
} as const;
