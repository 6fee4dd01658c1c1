/**
 * @fileoverview Error module exports.
 *
 * @module errors
 */

export {
  FarmError,
  StructuralError,
  UnsolvableError,
  ConfigError,
  isFarmError,
  type FarmErrorCode,
  type StructuralErrorCode,
  type UnsolvableErrorCode,
  type ConfigErrorCode,
} from "./FarmError";
