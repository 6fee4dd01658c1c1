/**
 * @fileoverview Breadth-first route search from start to end.
 *
 * Every search is forced through one first hop (a neighbor of start), so
 * routes can be compared and selected per first hop.
 *
 * Two modes:
 * - findShortestRoute: one shortest route, optionally avoiding blocked
 *   rooms. Visited marks are global to the search, which keeps it linear
 *   in the graph size and still yields a minimum tunnel count.
 * - findAllRoutes: every simple route, shortest first. Exponential in the
 *   worst case, so it is capped.
 *
 * Ties between equally short routes always go to the route whose rooms
 * were reached first in tunnel declaration order.
 *
 * @module routing/PathFinder
 */

import { FarmGraph, RoomSet } from "../farm";
import { createLogger } from "../utils/Logger";
import { Route, createRoute, firstHopOf } from "./Route";

const log = createLogger("PathFinder");

/** Frontier size at which route enumeration stops expanding */
export const DEFAULT_MAX_FRONTIER = 100_000;

/**
 * Result of enumerating routes through one first hop.
 */
export interface RouteEnumeration {
  routes: Route[];
  /** True when the limit or the frontier cap cut the enumeration short */
  truncated: boolean;
}

/**
 * Routes discovered through one first hop.
 */
export interface CandidateRoutes {
  firstHop: number;
  routes: Route[];
  truncated: boolean;
}

export interface CandidateOptions {
  /** Enumerate every simple route instead of one shortest per first hop */
  enumerateAll: boolean;
  /** Maximum routes kept per first hop when enumerating */
  limit: number;
}

function isStartNeighbor(graph: FarmGraph, room: number): boolean {
  return graph.neighbors(graph.startId).includes(room);
}

/**
 * Finds the shortest route start -> firstHop -> ... -> end avoiding the
 * blocked rooms. Returns null when firstHop is not a neighbor of start,
 * is itself blocked, or cannot reach end.
 */
export function findShortestRoute(graph: FarmGraph, firstHop: number, blocked?: RoomSet): Route | null {
  const { startId, endId } = graph;

  if (!isStartNeighbor(graph, firstHop)) return null;
  if (firstHop === endId) return createRoute([startId, endId]);
  if (blocked?.has(firstHop)) return null;

  const visited = graph.createRoomSet();
  const parent = new Int32Array(graph.size).fill(-1);
  visited.add(startId).add(firstHop);
  parent[firstHop] = startId;

  const queue = [firstHop];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];

    for (const next of graph.neighbors(current)) {
      if (visited.has(next)) continue;
      if (next !== endId && blocked?.has(next)) continue;

      visited.add(next);
      parent[next] = current;

      if (next === endId) {
        const rooms: number[] = [];
        for (let id = endId; id !== -1; id = parent[id]) {
          rooms.push(id);
        }
        return createRoute(rooms.reverse());
      }
      queue.push(next);
    }
  }

  return null;
}

/**
 * Enumerates simple routes through firstHop in breadth-first order, so
 * shorter routes come first. Stops after `limit` routes, or when the
 * frontier grows past `maxFrontier` partial paths.
 */
export function findAllRoutes(
  graph: FarmGraph,
  firstHop: number,
  limit: number,
  maxFrontier: number = DEFAULT_MAX_FRONTIER
): RouteEnumeration {
  const { startId, endId } = graph;
  if (!isStartNeighbor(graph, firstHop)) return { routes: [], truncated: false };

  const routes: Route[] = [];
  const queue: number[][] = [[startId, firstHop]];

  for (let head = 0; head < queue.length; head++) {
    const path = queue[head];
    const last = path[path.length - 1];

    if (last === endId) {
      routes.push(createRoute(path));
      if (routes.length >= limit) {
        return { routes, truncated: head < queue.length - 1 };
      }
      continue;
    }

    for (const next of graph.neighbors(last)) {
      if (path.includes(next)) continue;
      if (queue.length - head > maxFrontier) {
        log.warn(
          `Route enumeration through ${graph.nameOf(firstHop)} stopped: frontier exceeded ${maxFrontier} paths`
        );
        return { routes, truncated: true };
      }
      queue.push([...path, next]);
    }
    // drop the consumed path so the queue does not hold every prefix
    queue[head] = [];
  }

  return { routes, truncated: false };
}

/**
 * Collects candidate routes for every neighbor of start, in tunnel
 * declaration order.
 */
export function findCandidateRoutes(graph: FarmGraph, options: CandidateOptions): CandidateRoutes[] {
  return graph.neighbors(graph.startId).map(firstHop => {
    if (options.enumerateAll) {
      const { routes, truncated } = findAllRoutes(graph, firstHop, options.limit);
      return { firstHop, routes, truncated };
    }
    const route = findShortestRoute(graph, firstHop);
    return { firstHop, routes: route ? [route] : [], truncated: false };
  });
}

/**
 * Keeps the first shortest route for each first hop, in order of first
 * appearance.
 */
export function shortestPerFirstHop(routes: Route[]): Route[] {
  const best = new Map<number, Route>();
  for (const route of routes) {
    const hop = firstHopOf(route);
    const current = best.get(hop);
    if (!current || route.length < current.length) {
      best.set(hop, route);
    }
  }
  return Array.from(best.values());
}
