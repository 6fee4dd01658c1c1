/**
 * @fileoverview Configuration module exports.
 *
 * @module config
 */

export {
  SolverConfigSchema,
  DEFAULT_SOLVER_CONFIG,
  CONFIG_ENV_VARS,
  configFromEnv,
  resolveSolverConfig,
  type SolverConfig,
} from "./SolverConfig";
