/**
 * @fileoverview Turn-by-turn movement of agents from start to end.
 *
 * Each turn, every agent still on its way is considered in increasing id
 * order and moves one room forward when the destination is end or is
 * free. Intermediate rooms hold one agent at a time; end and start hold
 * any number. A room is free again as soon as its occupant moves on,
 * including earlier in the same turn.
 *
 * An agent that cannot move waits and retries next turn. Lower ids win
 * contested rooms.
 *
 * @module scheduling/TurnScheduler
 */

import { FarmGraph } from "../farm";
import { UnsolvableError } from "../errors";
import { Route } from "../routing";
import { createLogger } from "../utils/Logger";
import { AgentAllocation } from "./AgentAllocator";

const log = createLogger("TurnScheduler");

const EMPTY = -1;

/**
 * An agent during the simulation.
 */
export interface Agent {
  /** 1-based agent id */
  id: number;
  route: Route;
  /** Index into route.rooms; 0 is start */
  position: number;
}

/**
 * One agent entering one room.
 */
export interface Move {
  agentId: number;
  roomId: number;
  /** Destination room name */
  room: string;
}

export interface Schedule {
  /** Moves per turn; turn 1 is turns[0] */
  turns: Move[][];
  turnCount: number;
}

function isFinished(agent: Agent): boolean {
  return agent.position >= agent.route.rooms.length - 1;
}

/**
 * Places every agent at start of its assigned route.
 */
export function createAgents(routes: Route[], allocation: AgentAllocation): Agent[] {
  return allocation.assignments.map((routeIndex, index) => ({
    id: index + 1,
    route: routes[routeIndex],
    position: 0,
  }));
}

/**
 * Runs the simulation until every agent is at end.
 *
 * Throws UnsolvableError when a turn passes with agents remaining and none
 * able to move, which only happens if routes overlap in opposite
 * directions.
 */
export function scheduleTurns(graph: FarmGraph, routes: Route[], allocation: AgentAllocation): Schedule {
  const agents = createAgents(routes, allocation);
  const occupant = new Int32Array(graph.size).fill(EMPTY);
  const { startId, endId } = graph;
  const turns: Move[][] = [];
  let remaining = agents.filter(agent => !isFinished(agent)).length;

  while (remaining > 0) {
    const moves: Move[] = [];

    for (const agent of agents) {
      if (isFinished(agent)) continue;

      const current = agent.route.rooms[agent.position];
      const next = agent.route.rooms[agent.position + 1];

      if (next !== endId && occupant[next] !== EMPTY) continue;

      if (current !== startId) occupant[current] = EMPTY;
      if (next !== endId) occupant[next] = agent.id;
      agent.position++;
      moves.push({ agentId: agent.id, roomId: next, room: graph.nameOf(next) });

      if (isFinished(agent)) remaining--;
    }

    if (moves.length === 0) {
      throw new UnsolvableError(
        "SCHEDULE_STALLED",
        `Schedule stalled on turn ${turns.length + 1} with ${remaining} agents still moving`,
        { turn: turns.length + 1, remaining }
      );
    }

    turns.push(moves);
    log.debug(`Turn ${turns.length}: ${formatTurn(moves)}`);
  }

  return { turns, turnCount: turns.length };
}

/**
 * Movement notation: `L<agentId>-<room>`.
 */
export function formatMove(move: Move): string {
  return `L${move.agentId}-${move.room}`;
}

export function formatTurn(moves: Move[]): string {
  return moves.map(formatMove).join(" ");
}

/**
 * One line per turn.
 */
export function formatSchedule(schedule: Schedule): string[] {
  return schedule.turns.map(formatTurn);
}
