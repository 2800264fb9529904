export const ENGINE_LIMITS = {
  MAZE: {
    MAX_DIMENSION: 256,
  },

  TIC_TAC_TOE: {
    MIN_SIZE: 3,
    MAX_SIZE: 6,
  },

  STRATEGY: {
    MIN_SIZE: 5,
    MAX_SIZE: 8,
  },

  SEARCH: {
    MAX_DEPTH: 16,
    MAX_TIME_BUDGET_MS: 60_000,
  },

  JUGS: {
    MAX_JUGS: 5,
    MAX_CAPACITY: 1000,
    MAX_STATES: 1_000_000,
  },
} as const;
