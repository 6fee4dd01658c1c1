/**
 * @fileoverview End-to-end solving pipeline.
 *
 * graph -> candidate routes -> route selection -> agent allocation
 *       -> turn schedule -> statistics
 *
 * Every stage is a deterministic function of its input: solving the same
 * farm twice yields the same schedule.
 *
 * @module solver/FarmSolver
 */

import { DEFAULT_SOLVER_CONFIG, SolverConfig } from "../config";
import { UnsolvableError } from "../errors";
import { FarmGraph, GraphAnalyzer } from "../farm";
import {
  CandidateRoutes,
  Route,
  RouteSelection,
  SkippedHop,
  findCandidateRoutes,
  selectDisjointRoutes,
  selectPerNeighborRoutes,
} from "../routing";
import {
  AgentAllocation,
  Schedule,
  ScheduleStats,
  allocateAgents,
  computeStats,
  scheduleTurns,
} from "../scheduling";
import { createLogger } from "../utils/Logger";

const log = createLogger("FarmSolver");

export interface FarmSolution {
  /** Candidate routes per first hop, in tunnel declaration order */
  candidates: CandidateRoutes[];
  /** Routes the agents travel, in selection order */
  routes: Route[];
  /** First hops that contributed no route */
  skipped: SkippedHop[];
  allocation: AgentAllocation;
  schedule: Schedule;
  stats: ScheduleStats;
}

function selectRoutes(graph: FarmGraph, candidates: CandidateRoutes[], config: SolverConfig): RouteSelection {
  switch (config.strategy) {
    case "disjoint":
      return selectDisjointRoutes(graph);
    case "per-neighbor":
      return selectPerNeighborRoutes(candidates);
  }
}

/**
 * Solves a farm: which routes, which agent on which route, and every move.
 *
 * @throws UnsolvableError when start has no tunnels or end cannot be reached
 */
export function solveFarm(
  graph: FarmGraph,
  agentCount: number,
  config: SolverConfig = DEFAULT_SOLVER_CONFIG
): FarmSolution {
  const metrics = GraphAnalyzer.analyzeGraph(graph);
  for (const problem of metrics.problems) {
    log.info(problem);
  }

  if (metrics.startDegree === 0) {
    throw new UnsolvableError("NO_START_TUNNELS", `Start room ${graph.startName} has no tunnels`, {
      start: graph.startName,
    });
  }
  if (!metrics.endReachable) {
    throw new UnsolvableError("NO_ROUTE", `No route from ${graph.startName} to ${graph.endName}`, {
      start: graph.startName,
      end: graph.endName,
    });
  }
  log.debug(`Shortest distance ${metrics.shortestDistance}, at most ${metrics.routeCeiling} disjoint routes`);

  const candidates = findCandidateRoutes(graph, {
    enumerateAll: config.enumerateAllRoutes,
    limit: config.maxCandidateRoutes,
  });

  const { routes, skipped } = selectRoutes(graph, candidates, config);
  if (routes.length === 0) {
    throw new UnsolvableError("NO_ROUTE", `No route from ${graph.startName} to ${graph.endName}`);
  }
  if (skipped.length > 0) {
    log.info(`${skipped.length} of ${graph.degree(graph.startId)} first hops yielded no route`);
  }

  const allocation = allocateAgents(agentCount, routes);
  const schedule = scheduleTurns(graph, routes, allocation);
  const stats = computeStats(agentCount, routes, allocation, schedule);

  log.info(
    `Solved with ${routes.length} routes in ${stats.turnCount} turns (lower bound ${stats.lowerBound})`
  );

  return { candidates, routes, skipped, allocation, schedule, stats };
}
