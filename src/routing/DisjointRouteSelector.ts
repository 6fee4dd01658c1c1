/**
 * @fileoverview Greedy selection of vertex-disjoint routes.
 *
 * One route per first hop, no two routes sharing an intermediate room.
 *
 * First hops are tried in ascending order of their own degree: a room with
 * few tunnels has few ways to reach end, so it claims its route before
 * busier rooms block them. Equal degrees keep tunnel declaration order.
 * Each accepted route's intermediate rooms are blocked for later searches.
 *
 * This is a single pass with no backtracking. The result is locally
 * maximal, not necessarily a maximum disjoint set; a first hop that finds
 * no route is skipped for good.
 *
 * @module routing/DisjointRouteSelector
 */

import { sortBy } from "lodash";
import { FarmGraph } from "../farm";
import { createLogger } from "../utils/Logger";
import { Route, firstHopOf, intermediateRooms, routeNames } from "./Route";
import { findShortestRoute, shortestPerFirstHop, CandidateRoutes } from "./PathFinder";

const log = createLogger("DisjointRouteSelector");

/**
 * A first hop that did not contribute a route.
 */
export interface SkippedHop {
  firstHop: number;
  reason: "blocked" | "unreachable";
}

export interface RouteSelection {
  /** Accepted routes in selection order */
  routes: Route[];
  /** First hops that yielded no route, in the order they were tried */
  skipped: SkippedHop[];
}

/**
 * Neighbors of start in the order the selector tries them.
 */
export function orderFirstHops(graph: FarmGraph): number[] {
  return sortBy([...graph.neighbors(graph.startId)], hop => graph.degree(hop));
}

/**
 * Selects disjoint routes greedily. An empty selection means no route
 * exists; the caller decides how to report that.
 */
export function selectDisjointRoutes(graph: FarmGraph): RouteSelection {
  const blocked = graph.createRoomSet();
  const routes: Route[] = [];
  const skipped: SkippedHop[] = [];

  for (const hop of orderFirstHops(graph)) {
    if (blocked.has(hop)) {
      skipped.push({ firstHop: hop, reason: "blocked" });
      log.info(`Skipping first hop ${graph.nameOf(hop)}: already used by another route`);
      continue;
    }

    const route = findShortestRoute(graph, hop, blocked);
    if (!route) {
      skipped.push({ firstHop: hop, reason: "unreachable" });
      log.info(`Skipping first hop ${graph.nameOf(hop)}: no disjoint route to ${graph.endName}`);
      continue;
    }

    routes.push(route);
    blocked.addAll(intermediateRooms(route));
    log.debug(`Accepted route ${routeNames(graph, route).join(" -> ")} (length ${route.length})`);
  }

  return { routes, skipped };
}

/**
 * Alternative strategy: the shortest candidate for every first hop with no
 * disjointness constraint. Routes may share rooms; the scheduler's
 * occupancy rule still applies.
 */
export function selectPerNeighborRoutes(candidates: CandidateRoutes[]): RouteSelection {
  const routes = shortestPerFirstHop(candidates.flatMap(candidate => candidate.routes));
  const covered = new Set(routes.map(firstHopOf));
  const skipped: SkippedHop[] = candidates
    .filter(candidate => !covered.has(candidate.firstHop))
    .map(candidate => ({ firstHop: candidate.firstHop, reason: "unreachable" as const }));

  return { routes, skipped };
}

/**
 * True when no two routes share an intermediate room.
 */
export function areDisjoint(routes: Route[]): boolean {
  const seen = new Set<number>();
  for (const route of routes) {
    for (const room of intermediateRooms(route)) {
      if (seen.has(room)) return false;
      seen.add(room);
    }
  }
  return true;
}
