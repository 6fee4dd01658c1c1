/**
 * @fileoverview Assignment of agents to selected routes.
 *
 * Agents are assigned one at a time, in id order, to the route with the
 * smallest finish load:
 *
 *   load = route length + agents already on the route
 *
 * Each intermediate room holds one agent, so a route releases at most one
 * agent into its first room per turn; the load is the turn at which the
 * next agent sent down that route would arrive at end. Ties go to the
 * lowest route index.
 *
 * Greedy, with no search over assignments.
 *
 * @module scheduling/AgentAllocator
 */

import { UnsolvableError } from "../errors";
import { Route, isDirectRoute } from "../routing";

export interface AgentAllocation {
  /** Route index per agent; entry i belongs to agent i + 1 */
  assignments: number[];
  /** Number of agents per route, indexed like the routes */
  counts: number[];
}

/**
 * Turn at which the next agent sent down `route` would arrive at end,
 * given `assigned` agents already on it.
 */
export function finishLoad(route: Route, assigned: number): number {
  return route.length + assigned;
}

/**
 * Turn at which the last assigned agent on each route reaches end,
 * or 0 for a route with no agents. A direct start-end route has no room to
 * queue in, so all of its agents arrive on turn 1.
 */
export function expectedFinishTurns(routes: Route[], counts: number[]): number[] {
  return routes.map((route, index) => {
    const count = counts[index] ?? 0;
    if (count === 0) return 0;
    return isDirectRoute(route) ? 1 : route.length + count - 1;
  });
}

export function allocateAgents(agentCount: number, routes: Route[]): AgentAllocation {
  if (routes.length === 0) {
    throw new UnsolvableError("NO_ROUTE", "Cannot allocate agents: no route to end");
  }

  const counts = new Array<number>(routes.length).fill(0);
  const assignments: number[] = [];

  for (let agent = 0; agent < agentCount; agent++) {
    let best = 0;
    let bestLoad = finishLoad(routes[0], counts[0]);

    for (let index = 1; index < routes.length; index++) {
      const load = finishLoad(routes[index], counts[index]);
      if (load < bestLoad) {
        best = index;
        bestLoad = load;
      }
    }

    counts[best]++;
    assignments.push(best);
  }

  return { assignments, counts };
}
