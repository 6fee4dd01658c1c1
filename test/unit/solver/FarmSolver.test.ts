/**
 * @fileoverview Tests for the end-to-end solving pipeline.
 *
 * Fixture farms pin exact schedules; seeded grid farms check the route,
 * occupancy and lower-bound invariants across many shapes.
 */

import { expect } from "chai";
import { loadFarm, GraphAnalyzer } from "../../../src/farm";
import { solveFarm } from "../../../src/solver";
import { resolveSolverConfig } from "../../../src/config";
import { UnsolvableError } from "../../../src/errors";
import { areDisjoint, intermediateRooms } from "../../../src/routing";
import { formatSchedule } from "../../../src/scheduling";
import { buildGraph, chainGraph, loadFixtureText, names, randomGridGraph } from "../helpers";

describe("FarmSolver", () => {
  describe("solveFarm()", () => {
    it("should queue agents through a single intermediate room", () => {
      const { description, graph } = loadFarm(loadFixtureText("single-room.txt"));
      const solution = solveFarm(graph, description.agentCount);

      expect(solution.routes.map((route) => names(graph, route))).to.deep.equal([["start", "1", "end"]]);
      expect(solution.allocation.counts).to.deep.equal([2]);
      expect(formatSchedule(solution.schedule)).to.deep.equal(["L1-1", "L1-end L2-1", "L2-end"]);
      expect(solution.stats.turnCount).to.equal(3);
      expect(solution.stats.lowerBound).to.equal(3);
    });

    it("should split agents across two equal routes and meet the lower bound", () => {
      const { description, graph } = loadFarm(loadFixtureText("two-routes.txt"));
      const solution = solveFarm(graph, description.agentCount);

      expect(solution.allocation.counts).to.deep.equal([2, 2]);
      expect(formatSchedule(solution.schedule)).to.deep.equal([
        "L1-a L2-c",
        "L1-b L2-d L3-a L4-c",
        "L1-end L2-end L3-b L4-d",
        "L3-end L4-end",
      ]);
      expect(solution.stats.turnCount).to.equal(4);
      expect(solution.stats.lowerBound).to.equal(4);
      expect(solution.stats.efficiency).to.equal(1);
    });

    it("should finish two routes of length 2 in three turns", () => {
      const graph = buildGraph(["start", "a", "b", "end"], ["start-a", "a-end", "start-b", "b-end"]);
      const solution = solveFarm(graph, 4);

      expect(formatSchedule(solution.schedule)).to.deep.equal([
        "L1-a L2-b",
        "L1-end L2-end L3-a L4-b",
        "L3-end L4-end",
      ]);
      expect(solution.stats.lowerBound).to.equal(3);
    });

    it("should balance agents between a direct tunnel and a longer route", () => {
      const graph = buildGraph(["start", "end", "a"], ["start-end", "start-a", "a-end"]);
      const solution = solveFarm(graph, 3);

      expect(solution.routes.map((route) => names(graph, route))).to.deep.equal([
        ["start", "end"],
        ["start", "a", "end"],
      ]);
      expect(solution.allocation.counts).to.deep.equal([2, 1]);
      expect(formatSchedule(solution.schedule)).to.deep.equal(["L1-end L2-end L3-a", "L3-end"]);
      // ceil((3 + 3 - 2) / 2)
      expect(solution.stats.lowerBound).to.equal(2);
    });

    it("should solve a farm with hundreds of thousands of rooms", () => {
      const graph = chainGraph(300_000);
      const solution = solveFarm(graph, 2);

      expect(solution.routes).to.have.length(1);
      expect(solution.routes[0].length).to.equal(300_000);
      expect(solution.stats.turnCount).to.equal(300_001);
    }).timeout(30_000);

    it("should use both routes the degree ordering makes available", () => {
      const { description, graph } = loadFarm(loadFixtureText("greedy-order.txt"));
      const solution = solveFarm(graph, description.agentCount);

      expect(solution.allocation.assignments).to.deep.equal([0, 1, 0]);
      expect(formatSchedule(solution.schedule)).to.deep.equal([
        "L1-y L2-x",
        "L1-m L2-n L3-y",
        "L1-end L2-end L3-m",
        "L3-end",
      ]);
    });

    it("should report a start room without tunnels as unsolvable", () => {
      const { description, graph } = loadFarm(loadFixtureText("isolated-start.txt"));

      expect(() => solveFarm(graph, description.agentCount))
        .to.throw(UnsolvableError, "Start room start has no tunnels")
        .with.property("code", "NO_START_TUNNELS");
    });

    it("should report an unreachable end as unsolvable", () => {
      const graph = buildGraph(["start", "a", "b", "end"], ["start-a", "b-end"]);

      expect(() => solveFarm(graph, 3))
        .to.throw(UnsolvableError, "No route from start to end")
        .with.property("code", "NO_ROUTE");
    });

    it("should list candidates and skipped first hops", () => {
      const graph = buildGraph(["start", "a", "b", "m", "end"], ["start-a", "start-b", "a-m", "b-m", "m-end"]);
      const solution = solveFarm(graph, 2);

      expect(solution.candidates.map((candidate) => candidate.routes.map((route) => names(graph, route)))).to.deep.equal(
        [[["start", "a", "m", "end"]], [["start", "b", "m", "end"]]]
      );
      expect(solution.skipped.map((hop) => graph.nameOf(hop.firstHop))).to.deep.equal(["b"]);
      expect(formatSchedule(solution.schedule)).to.deep.equal(["L1-a", "L1-m L2-a", "L1-end L2-m", "L2-end"]);
    });

    it("should share rooms under the per-neighbor strategy", () => {
      const graph = buildGraph(["start", "a", "b", "m", "end"], ["start-a", "start-b", "a-m", "b-m", "m-end"]);
      const solution = solveFarm(graph, 2, resolveSolverConfig({ strategy: "per-neighbor" }));

      expect(solution.routes).to.have.length(2);
      expect(formatSchedule(solution.schedule)).to.deep.equal(["L1-a L2-b", "L1-m", "L1-end L2-m", "L2-end"]);
    });

    it("should produce identical schedules on repeated runs", () => {
      const { description, graph } = loadFarm(loadFixtureText("greedy-order.txt"));
      const first = formatSchedule(solveFarm(graph, description.agentCount).schedule);
      const second = formatSchedule(solveFarm(graph, description.agentCount).schedule);

      expect(second).to.deep.equal(first);
    });
  });

  describe("properties on generated grid farms", () => {
    const seeds = Array.from({ length: 40 }, (_, i) => i + 1);

    for (const seed of seeds) {
      it(`should hold for grid farm #${seed}`, () => {
        const graph = randomGridGraph(seed, 5, 4);
        const agentCount = (seed % 9) + 1;
        const { startId, endId } = graph;

        if (!GraphAnalyzer.isReachable(graph, startId, endId)) {
          expect(() => solveFarm(graph, agentCount)).to.throw(UnsolvableError);
          return;
        }

        const solution = solveFarm(graph, agentCount);
        const { routes, schedule, stats } = solution;

        expect(routes.length).to.be.greaterThan(0);
        for (const route of routes) {
          expect(route.rooms[0]).to.equal(startId);
          expect(route.rooms[route.rooms.length - 1]).to.equal(endId);
          expect(new Set(route.rooms).size).to.equal(route.rooms.length);
          expect(route.length).to.be.at.least(1);
          for (let i = 1; i < route.rooms.length; i++) {
            expect(graph.neighbors(route.rooms[i - 1])).to.include(route.rooms[i]);
          }
        }
        expect(areDisjoint(routes)).to.be.true;

        expect(stats.turnCount).to.be.at.least(stats.lowerBound);
        expect(stats.turnCount).to.be.at.least(stats.longestRoute);

        for (const turn of schedule.turns) {
          const destinations = turn.filter((move) => move.roomId !== endId).map((move) => move.roomId);
          expect(new Set(destinations).size).to.equal(destinations.length);
        }

        const arrivals = schedule.turns.flat().filter((move) => move.roomId === endId);
        expect(arrivals.map((move) => move.agentId).sort((a, b) => a - b)).to.deep.equal(
          Array.from({ length: agentCount }, (_, i) => i + 1)
        );

        const blocked = new Set(routes.flatMap(intermediateRooms));
        expect(blocked.has(startId) || blocked.has(endId)).to.be.false;

        expect(formatSchedule(solveFarm(graph, agentCount).schedule)).to.deep.equal(formatSchedule(schedule));
      });
    }
  });
});
