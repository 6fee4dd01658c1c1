/**
 * @fileoverview Route value type and helpers.
 *
 * A route is a simple path from start to end, stored as room ids.
 *
 * @module routing/Route
 */

import { FarmGraph } from "../farm";

export interface Route {
  /** Room ids from start to end, inclusive */
  rooms: number[];
  /** Tunnel count (rooms.length - 1) */
  length: number;
}

export function createRoute(rooms: number[]): Route {
  return { rooms, length: rooms.length - 1 };
}

/**
 * The room right after start.
 */
export function firstHopOf(route: Route): number {
  return route.rooms[1];
}

/**
 * Rooms strictly between start and end.
 */
export function intermediateRooms(route: Route): number[] {
  return route.rooms.slice(1, -1);
}

export function routeNames(graph: FarmGraph, route: Route): string[] {
  return route.rooms.map(id => graph.nameOf(id));
}

/**
 * True when the route is a direct start-end tunnel, which has no
 * intermediate room and so no occupancy limit.
 */
export function isDirectRoute(route: Route): boolean {
  return route.length === 1;
}
