/**
 * @fileoverview Solver module exports.
 *
 * @module solver
 */

export { solveFarm, type FarmSolution } from "./FarmSolver";
