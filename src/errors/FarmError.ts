/**
 * @fileoverview Error types raised while loading and solving a farm.
 *
 * Three kinds of failure reach the caller:
 * - StructuralError: the farm description is malformed or contradictory.
 *   Raised by the loader before any pathfinding runs.
 * - UnsolvableError: the farm is well formed but no agent can reach end.
 * - ConfigError: solver configuration failed validation.
 *
 * A first hop that cannot host a disjoint route is not an error; the
 * selector records it as skipped and moves on.
 *
 * @module errors/FarmError
 */

/**
 * Error codes for malformed farm descriptions.
 */
export type StructuralErrorCode =
  | "INVALID_AGENT_COUNT"
  | "MALFORMED_LINE"
  | "INVALID_ROOM"
  | "DUPLICATE_ROOM"
  | "DUPLICATE_COORDINATES"
  | "UNKNOWN_ROOM"
  | "SELF_TUNNEL"
  | "MISSING_START"
  | "MISSING_END"
  | "DUPLICATE_START"
  | "DUPLICATE_END"
  | "START_IS_END"
  | "DANGLING_COMMAND";

/**
 * Error codes for farms with no schedule.
 */
export type UnsolvableErrorCode = "NO_START_TUNNELS" | "NO_ROUTE" | "SCHEDULE_STALLED";

export type ConfigErrorCode = "CONFIG_INVALID";

export type FarmErrorCode = StructuralErrorCode | UnsolvableErrorCode | ConfigErrorCode;

/**
 * Base error for everything the farm pipeline reports to the user.
 *
 * @example
 * throw new StructuralError("UNKNOWN_ROOM", "Tunnel references unknown room: x", { room: "x" }, 7);
 */
export class FarmError extends Error {
  readonly name: string = "FarmError";

  constructor(
    public readonly code: FarmErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The farm description cannot be turned into a graph.
 */
export class StructuralError extends FarmError {
  readonly name = "StructuralError";

  constructor(
    code: StructuralErrorCode,
    message: string,
    details?: Record<string, unknown>,
    /** 1-based input line, when the problem belongs to one line */
    public readonly line?: number
  ) {
    super(code, line !== undefined ? `line ${line}: ${message}` : message, details);
  }
}

/**
 * The graph is valid but no schedule can move the agents to end.
 */
export class UnsolvableError extends FarmError {
  readonly name = "UnsolvableError";

  constructor(code: UnsolvableErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class ConfigError extends FarmError {
  readonly name = "ConfigError";

  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", message, details);
  }
}

/**
 * Type guard for errors raised by this package.
 */
export function isFarmError(value: unknown): value is FarmError {
  return value instanceof FarmError;
}
