/**
 * @fileoverview Summary statistics for a computed schedule.
 *
 * @module scheduling/ScheduleStats
 */

import { maxBy, sumBy } from "lodash";
import { Route } from "../routing";
import { AgentAllocation } from "./AgentAllocator";
import { Schedule } from "./TurnScheduler";

export interface ScheduleStats {
  agentCount: number;
  /** Selected routes */
  routeCount: number;
  /** Selected routes carrying at least one agent */
  usedRouteCount: number;
  turnCount: number;
  /** Fewest turns any schedule over the used routes could take */
  lowerBound: number;
  /** lowerBound / turnCount; 1 means the schedule meets the bound */
  efficiency: number;
  /** Longest used route, in tunnels */
  longestRoute: number;
}

/**
 * Theoretical minimum turn count over a set of routes that all carry
 * agents:
 *
 *   ceil((agents + sum of route lengths - route count) / route count)
 *
 * Each route admits one new agent per turn, so with perfectly balanced
 * routes the last agent arrives at that turn. A direct start-end route is
 * counted like any other; its agents all arrive on turn 1, so a schedule
 * using one can finish below this figure.
 */
export function lowerBound(agentCount: number, routes: Route[]): number {
  if (routes.length === 0) {
    throw new RangeError("Lower bound is undefined without routes");
  }

  const totalLength = sumBy(routes, route => route.length);
  return Math.ceil((agentCount + totalLength - routes.length) / routes.length);
}

/**
 * Statistics over the routes the allocation actually uses; a selected
 * route left empty does not slow any agent down, so it is not part of
 * the bound.
 */
export function computeStats(
  agentCount: number,
  routes: Route[],
  allocation: AgentAllocation,
  schedule: Schedule
): ScheduleStats {
  const used = routes.filter((_, index) => (allocation.counts[index] ?? 0) > 0);
  const bound = used.length > 0 ? lowerBound(agentCount, used) : 0;

  return {
    agentCount,
    routeCount: routes.length,
    usedRouteCount: used.length,
    turnCount: schedule.turnCount,
    lowerBound: bound,
    efficiency: schedule.turnCount > 0 ? bound / schedule.turnCount : 1,
    longestRoute: maxBy(used, route => route.length)?.length ?? 0,
  };
}
