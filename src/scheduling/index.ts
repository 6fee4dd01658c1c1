/**
 * @fileoverview Scheduling module exports.
 *
 * Agent allocation, turn simulation and schedule statistics.
 *
 * @module scheduling
 */

export {
  allocateAgents,
  finishLoad,
  expectedFinishTurns,
  type AgentAllocation,
} from "./AgentAllocator";

export {
  scheduleTurns,
  createAgents,
  formatMove,
  formatTurn,
  formatSchedule,
  type Agent,
  type Move,
  type Schedule,
} from "./TurnScheduler";

export { lowerBound, computeStats, type ScheduleStats } from "./ScheduleStats";
