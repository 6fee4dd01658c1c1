/**
 * @fileoverview Solver configuration.
 *
 * Values come from three layers, highest precedence first:
 * 1. Explicit overrides (CLI flags)
 * 2. Environment variables (FARM_*)
 * 3. DEFAULT_SOLVER_CONFIG
 *
 * The merged result is validated with zod; any problem becomes a single
 * ConfigError.
 *
 * @module config/SolverConfig
 */

import { z } from "zod";
import { ConfigError } from "../errors";

export const SolverConfigSchema = z.object({
  /**
   * How routes are chosen from the candidates.
   * - disjoint: greedy vertex-disjoint selection (default)
   * - per-neighbor: shortest route per first hop, overlaps allowed
   */
  strategy: z.enum(["disjoint", "per-neighbor"]),
  enumerateAllRoutes: z.boolean(),
  maxCandidateRoutes: z
    .number()
    .int({ message: "maxCandidateRoutes must be an integer" })
    .positive({ message: "maxCandidateRoutes must be positive" }),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export type SolverConfig = z.infer<typeof SolverConfigSchema>;

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  strategy: "disjoint",
  enumerateAllRoutes: false,
  maxCandidateRoutes: 1000,
  logLevel: "warn",
};

/** Environment variable names read by resolveSolverConfig */
export const CONFIG_ENV_VARS = {
  strategy: "FARM_STRATEGY",
  enumerateAllRoutes: "FARM_ALL_ROUTES",
  maxCandidateRoutes: "FARM_MAX_ROUTES",
  logLevel: "FARM_LOG_LEVEL",
} as const;

type Env = Record<string, string | undefined>;

function readEnvFlag(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (value === "1" || value === "true" || value === "yes") return true;
  if (value === "0" || value === "false" || value === "no" || value === "") return false;
  return raw;
}

function readEnvNumber(raw: string): number | string {
  return /^-?\d+$/.test(raw.trim()) ? Number(raw.trim()) : raw;
}

/**
 * Extracts the configuration layer held in environment variables.
 * Values that cannot be coerced are passed through unchanged so that
 * validation reports them.
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  const layer: Record<string, unknown> = {};

  const strategy = env[CONFIG_ENV_VARS.strategy];
  if (strategy !== undefined) layer.strategy = strategy.trim();

  const allRoutes = env[CONFIG_ENV_VARS.enumerateAllRoutes];
  if (allRoutes !== undefined) layer.enumerateAllRoutes = readEnvFlag(allRoutes);

  const maxRoutes = env[CONFIG_ENV_VARS.maxCandidateRoutes];
  if (maxRoutes !== undefined) layer.maxCandidateRoutes = readEnvNumber(maxRoutes);

  const logLevel = env[CONFIG_ENV_VARS.logLevel];
  if (logLevel !== undefined) layer.logLevel = logLevel.trim().toLowerCase();

  return layer;
}

/**
 * Merges defaults, environment and overrides, then validates the result.
 */
export function resolveSolverConfig(
  overrides: Record<string, unknown> = {},
  env: Env = {}
): SolverConfig {
  const merged = {
    ...DEFAULT_SOLVER_CONFIG,
    ...configFromEnv(env),
    ...overrides,
  };

  const parsed = SolverConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}
