/**
 * @fileoverview Human-readable solution report generation.
 *
 * Formats the candidate routes, the selected routes with their agent
 * counts, the move list and summary statistics. The move lines alone are
 * the classic output: one line per turn, `L<agent>-<room>` separated by
 * spaces.
 */

import { FarmGraph } from "../farm";
import { routeNames } from "../routing";
import { ScheduleStats, expectedFinishTurns, formatSchedule } from "../scheduling";
import { FarmSolution } from "../solver";

/**
 * Selected route with its allocation.
 */
export interface RouteReport {
  /** 1-based route number in selection order */
  routeNumber: number;
  rooms: string[];
  length: number;
  agents: number;
  /** Turn at which the last agent on this route reaches end */
  expectedFinish: number;
}

/**
 * Complete solution report
 */
export interface SolutionReport {
  /** Every candidate route as room names */
  candidates: string[][];
  routes: RouteReport[];
  /** First hops that contributed no route, with the reason */
  skipped: string[];
  /** One line per turn */
  moveLines: string[];
  stats: ScheduleStats;
  /** Formatted text output */
  formattedText: string;
}

/**
 * SolutionReporter generates the report handed to the console.
 *
 * Output format shows:
 * - All candidate routes
 * - Selected routes with agents per route
 * - Move lines
 * - Turn count against the lower bound
 */
export class SolutionReporter {
  /**
   * Generate a complete report for a solution.
   */
  static generateReport(graph: FarmGraph, solution: FarmSolution): SolutionReport {
    const candidates = solution.candidates.flatMap(candidate =>
      candidate.routes.map(route => routeNames(graph, route))
    );
    const routes = this.generateRouteReports(graph, solution);
    const skipped = solution.skipped.map(hop => `${graph.nameOf(hop.firstHop)} (${hop.reason})`);
    const moveLines = formatSchedule(solution.schedule);

    return {
      candidates,
      routes,
      skipped,
      moveLines,
      stats: solution.stats,
      formattedText: this.formatReport(candidates, routes, skipped, moveLines, solution),
    };
  }

  static formatSummary(stats: ScheduleStats): string {
    const efficiency = (stats.efficiency * 100).toFixed(1);
    return `Turns: ${stats.turnCount} (lower bound: ${stats.lowerBound}, efficiency: ${efficiency}%)`;
  }

  private static generateRouteReports(graph: FarmGraph, solution: FarmSolution): RouteReport[] {
    const { routes, allocation } = solution;
    const finishes = expectedFinishTurns(routes, allocation.counts);

    return routes.map((route, index) => ({
      routeNumber: index + 1,
      rooms: routeNames(graph, route),
      length: route.length,
      agents: allocation.counts[index],
      expectedFinish: finishes[index],
    }));
  }

  private static formatReport(
    candidates: string[][],
    routes: RouteReport[],
    skipped: string[],
    moveLines: string[],
    solution: FarmSolution
  ): string {
    const lines: string[] = [];

    lines.push("All routes found:");
    candidates.forEach((rooms, i) => {
      lines.push(`Route ${i + 1}: [${rooms.join(" ")}] (length: ${rooms.length - 1})`);
    });
    if (solution.candidates.some(candidate => candidate.truncated)) {
      lines.push("(route enumeration was truncated)");
    }

    lines.push("");
    lines.push("Selected routes:");
    for (const route of routes) {
      lines.push(
        `Route ${route.routeNumber}: [${route.rooms.join(" ")}] ` +
          `(length: ${route.length}, agents: ${route.agents})`
      );
    }
    if (skipped.length > 0) {
      lines.push(`Skipped first hops: ${skipped.join(", ")}`);
    }

    lines.push("");
    lines.push("Moves:");
    for (const line of moveLines) {
      lines.push(line);
    }

    lines.push("");
    lines.push(this.formatSummary(solution.stats));

    return lines.join("\n");
  }
}
