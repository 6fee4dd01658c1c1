/**
 * @fileoverview Utilities module exports.
 *
 * @module utils
 */

export { ErrorMapper, EXIT_INVALID_INPUT, EXIT_UNSOLVABLE, EXIT_INTERNAL } from "./ErrorMapper";

export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./Logger";
