/**
 * Graph Analyzer - Computes metrics on farm graph structure
 *
 * Provides analysis tools for:
 * - Structure metrics (room count, tunnel count, degrees)
 * - Start/end connectivity
 * - Graph health checks reported before solving
 */

import { max, min, sum } from "lodash";
import { FarmGraph } from "./FarmGraph";

export interface FarmMetrics {
  // Structural metrics
  roomCount: number;
  tunnelCount: number;
  averageDegree: number;
  maxDegree: number;
  minDegree: number;
  isolatedRooms: string[];

  // Start/end metrics
  startDegree: number;
  endDegree: number;
  endReachable: boolean;
  /** Tunnel count of the shortest start-end route, or null when unreachable */
  shortestDistance: number | null;
  /** No set of disjoint routes can be larger than this */
  routeCeiling: number;

  // Health metrics
  hasProblems: boolean;
  problems: string[];
}

export class GraphAnalyzer {
  /**
   * Analyze the overall graph structure.
   */
  static analyzeGraph(graph: FarmGraph): FarmMetrics {
    const problems: string[] = [];
    const degrees = graph.rooms().map(room => graph.degree(room.id));
    const isolatedRooms = graph
      .rooms()
      .filter(room => graph.degree(room.id) === 0)
      .map(room => room.name);

    const distances = this.distancesFrom(graph, graph.startId);
    const endDistance = distances[graph.endId];
    const endReachable = endDistance >= 0;

    const startDegree = graph.degree(graph.startId);
    const endDegree = graph.degree(graph.endId);

    if (startDegree === 0) {
      problems.push(`Start room ${graph.startName} has no tunnels`);
    }
    if (endDegree === 0) {
      problems.push(`End room ${graph.endName} has no tunnels`);
    }
    if (!endReachable && startDegree > 0 && endDegree > 0) {
      problems.push(`End room ${graph.endName} is not reachable from ${graph.startName}`);
    }
    if (isolatedRooms.length > 0) {
      problems.push(`${isolatedRooms.length} isolated rooms (degree = 0)`);
    }

    return {
      roomCount: graph.size,
      tunnelCount: graph.tunnelCount,
      averageDegree: sum(degrees) / (degrees.length || 1),
      maxDegree: max(degrees) ?? 0,
      minDegree: min(degrees) ?? 0,
      isolatedRooms,
      startDegree,
      endDegree,
      endReachable,
      shortestDistance: endReachable ? endDistance : null,
      routeCeiling: endReachable ? Math.min(startDegree, endDegree) : 0,
      hasProblems: problems.length > 0,
      problems,
    };
  }

  /**
   * Whether `to` can be reached from `from` through any tunnels.
   */
  static isReachable(graph: FarmGraph, from: number, to: number): boolean {
    return this.distancesFrom(graph, from)[to] >= 0;
  }

  /**
   * Breadth-first tunnel counts from one room to every room; -1 marks
   * rooms that cannot be reached.
   */
  static distancesFrom(graph: FarmGraph, from: number): number[] {
    const distances = new Array<number>(graph.size).fill(-1);
    distances[from] = 0;
    const queue = [from];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      for (const neighbor of graph.neighbors(current)) {
        if (distances[neighbor] === -1) {
          distances[neighbor] = distances[current] + 1;
          queue.push(neighbor);
        }
      }
    }

    return distances;
  }
}
