/**
 * @fileoverview Routing module exports.
 *
 * Route search and selection between start and end.
 *
 * @module routing
 */

export {
  type Route,
  createRoute,
  firstHopOf,
  intermediateRooms,
  routeNames,
  isDirectRoute,
} from "./Route";

export {
  findShortestRoute,
  findAllRoutes,
  findCandidateRoutes,
  shortestPerFirstHop,
  DEFAULT_MAX_FRONTIER,
  type RouteEnumeration,
  type CandidateRoutes,
  type CandidateOptions,
} from "./PathFinder";

export {
  selectDisjointRoutes,
  selectPerNeighborRoutes,
  orderFirstHops,
  areDisjoint,
  type RouteSelection,
  type SkippedHop,
} from "./DisjointRouteSelector";
