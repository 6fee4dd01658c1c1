/**
 * @fileoverview Unit tests for route helpers.
 */

import { expect } from "chai";
import { createRoute, firstHopOf, intermediateRooms, isDirectRoute, routeNames } from "../../../src/routing";
import { buildGraph, routeOf } from "../helpers";

describe("Route", () => {
  const graph = buildGraph(["start", "a", "b", "end"], ["start-a", "a-b", "b-end", "start-end"]);

  it("should count tunnels as length", () => {
    expect(createRoute([0, 1, 2, 3]).length).to.equal(3);
  });

  it("should expose the first hop and intermediate rooms", () => {
    const route = routeOf(graph, ["start", "a", "b", "end"]);

    expect(firstHopOf(route)).to.equal(1);
    expect(intermediateRooms(route)).to.deep.equal([1, 2]);
    expect(routeNames(graph, route)).to.deep.equal(["start", "a", "b", "end"]);
  });

  it("should recognize a direct start-end tunnel", () => {
    const direct = routeOf(graph, ["start", "end"]);

    expect(isDirectRoute(direct)).to.be.true;
    expect(firstHopOf(direct)).to.equal(graph.endId);
    expect(intermediateRooms(direct)).to.deep.equal([]);
    expect(isDirectRoute(routeOf(graph, ["start", "a", "b", "end"]))).to.be.false;
  });
});
