/**
 * @fileoverview Public API.
 *
 * Routes agents through a farm of rooms and tunnels from start to end in
 * as few turns as possible, one agent per intermediate room at a time.
 *
 * ```typescript
 * import { loadFarm, solveFarm, SolutionReporter } from "farm-router";
 *
 * const { description, graph } = loadFarm(text);
 * const solution = solveFarm(graph, description.agentCount);
 * console.log(SolutionReporter.generateReport(graph, solution).moveLines.join("\n"));
 * ```
 *
 * @module index
 */

export * from "./config";
export * from "./errors";
export * from "./farm";
export * from "./routing";
export * from "./scheduling";
export * from "./solver";
export * from "./report";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./utils";
