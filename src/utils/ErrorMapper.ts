/**
 * @fileoverview Error mapping for the command-line entry point.
 *
 * Turns whatever escapes the pipeline into a message on stderr and a
 * process exit code, instead of an unhandled rejection.
 *
 * @module utils/ErrorMapper
 */

import { isFarmError, StructuralError, UnsolvableError } from "../errors";

/** Exit code for malformed input or configuration */
export const EXIT_INVALID_INPUT = 1;
/** Exit code for a valid farm with no schedule */
export const EXIT_UNSOLVABLE = 2;
/** Exit code for anything unexpected (EX_SOFTWARE) */
export const EXIT_INTERNAL = 70;

/**
 * Error handling utilities for the CLI.
 *
 * @example
 * ErrorMapper.wrapMain(async () => {
 *   // read, solve, report
 * })(process.argv.slice(2));
 */
export const ErrorMapper = {
  /**
   * Maps an error to its exit code.
   */
  exitCodeFor(error: unknown): number {
    if (error instanceof UnsolvableError) return EXIT_UNSOLVABLE;
    if (isFarmError(error)) return EXIT_INVALID_INPUT;
    return EXIT_INTERNAL;
  },

  /**
   * Formats an error for the user. Farm errors print their message only;
   * anything else prints its stack when one is available.
   */
  describe(error: unknown): string {
    if (isFarmError(error)) {
      return `ERROR: ${error.message}`;
    }
    if (error instanceof Error) {
      return `Unexpected error: ${error.message}\n${error.stack ?? ""}`;
    }
    return `Unexpected error: ${String(error)}`;
  },

  /**
   * Wraps an async entry point so errors become a message plus an exit code.
   * Structural errors are reported before any solving happened, so the
   * message alone is enough.
   */
  wrapMain<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
      try {
        await fn(...args);
      } catch (e) {
        console.error(ErrorMapper.describe(e));
        if (e instanceof StructuralError && e.details) {
          console.error(`  details: ${JSON.stringify(e.details)}`);
        }
        process.exitCode = ErrorMapper.exitCodeFor(e);
      }
    };
  },
};
