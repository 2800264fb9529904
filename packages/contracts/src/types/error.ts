import type { ZodError } from "zod";

/**
 * Error codes for engine operations.
 * Using discriminated union for type-safe error handling.
 */
export type EngineErrorCode =
  | "MAZE_INVALID"
  | "MAZE_CELL_OUT_OF_BOUNDS"
  | "MAZE_CELL_BLOCKED"
  | "JUG_CONFIG_INVALID"
  | "JUG_STATE_INVALID"
  | "BOARD_CONFIG_INVALID"
  | "BOARD_MOVE_ILLEGAL"
  | "SEARCH_CONFIG_INVALID"
  | "SETTINGS_INVALID"
  | "GAME_OVER";

/**
 * A single schema issue, flattened for serialization.
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Unified error type for every engine operation.
 *
 * Unreachable goals, infeasible jug targets and search timeouts are result
 * variants, not errors. An EngineError always means the caller handed the
 * engine something it cannot work with.
 *
 * @example
 * ```typescript
 * throw new EngineError(
 *   "MAZE_CELL_BLOCKED",
 *   "Start cell (0, 2) is blocked",
 *   { row: 0, col: 2 },
 * );
 * ```
 */
export class EngineError extends Error {
  override readonly name = "EngineError";

  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }

  static create(
    code: EngineErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): EngineError {
    return new EngineError(code, message, details);
  }

  static mazeInvalid(message: string, details?: Record<string, unknown>): EngineError {
    return new EngineError("MAZE_INVALID", message, details);
  }

  static jugConfigInvalid(message: string, details?: Record<string, unknown>): EngineError {
    return new EngineError("JUG_CONFIG_INVALID", message, details);
  }

  static boardConfigInvalid(message: string, details?: Record<string, unknown>): EngineError {
    return new EngineError("BOARD_CONFIG_INVALID", message, details);
  }

  static illegalMove(message: string, details?: Record<string, unknown>): EngineError {
    return new EngineError("BOARD_MOVE_ILLEGAL", message, details);
  }

  static gameOver(message: string, details?: Record<string, unknown>): EngineError {
    return new EngineError("GAME_OVER", message, details);
  }

  /**
   * Wrap a failed schema parse. The first issue becomes the message, all of
   * them are kept in `details.issues`.
   */
  static fromZod(code: EngineErrorCode, subject: string, error: ZodError): EngineError {
    const issues: ValidationIssue[] = error.issues.map((issue) => ({
      path: issue.path.map((segment) => String(segment)).join("."),
      message: issue.message,
    }));
    const first = issues[0];
    const summary = first
      ? `${subject}: ${first.path ? `${first.path}: ` : ""}${first.message}`
      : `${subject} is invalid`;
    return new EngineError(code, summary, { issues });
  }

  static isEngineError(error: unknown): error is EngineError {
    return error instanceof EngineError;
  }

  toJSON(): {
    name: string;
    code: EngineErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
