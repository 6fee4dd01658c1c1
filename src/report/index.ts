/**
 * @fileoverview Report module exports.
 *
 * @module report
 */

export { SolutionReporter, type SolutionReport, type RouteReport } from "./SolutionReporter";
