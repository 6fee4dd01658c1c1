import * as fs from "fs";
import * as path from "path";
import { FarmGraph, RoomDeclaration } from "../../src/farm";
import { Route, createRoute } from "../../src/routing";

const FIXTURES_DIR = path.join(__dirname, "../fixtures");

export function loadFixtureText(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), "utf-8");
}

/**
 * Builds a graph from room names and "a-b" tunnels. Rooms get distinct
 * coordinates (index, 0). Start and end default to "start" and "end".
 */
export function buildGraph(
  rooms: string[],
  tunnels: string[],
  start = "start",
  end = "end"
): FarmGraph {
  const declarations: RoomDeclaration[] = rooms.map((name, index) => ({ name, x: index, y: 0 }));
  return FarmGraph.fromDescription({
    agentCount: 1,
    rooms: declarations,
    tunnels: tunnels.map((tunnel): [string, string] => {
      const [a, b] = tunnel.split("-");
      return [a, b];
    }),
    start,
    end,
  });
}

export function ids(graph: FarmGraph, names: string[]): number[] {
  return names.map(name => {
    const id = graph.idOf(name);
    if (id === undefined) throw new Error(`No room named ${name}`);
    return id;
  });
}

export function id(graph: FarmGraph, name: string): number {
  return ids(graph, [name])[0];
}

export function routeOf(graph: FarmGraph, names: string[]): Route {
  return createRoute(ids(graph, names));
}

export function names(graph: FarmGraph, route: Route | null): string[] | null {
  return route ? route.rooms.map(room => graph.nameOf(room)) : null;
}

/**
 * Small deterministic PRNG (mulberry32) for generated graphs.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Grid farm with randomly dropped tunnels. Start is the top-left room and
 * end the bottom-right one; the graph may be disconnected.
 */
export function randomGridGraph(seed: number, width: number, height: number, keep = 0.65): FarmGraph {
  const random = seededRandom(seed);
  const rooms: RoomDeclaration[] = [];
  const tunnels: Array<[string, string]> = [];
  const name = (x: number, y: number) => `r${x}_${y}`;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      rooms.push({ name: name(x, y), x, y });
      if (x + 1 < width && random() < keep) tunnels.push([name(x, y), name(x + 1, y)]);
      if (y + 1 < height && random() < keep) tunnels.push([name(x, y), name(x, y + 1)]);
    }
  }

  return FarmGraph.fromDescription({
    agentCount: 1,
    rooms,
    tunnels,
    start: name(0, 0),
    end: name(width - 1, height - 1),
  });
}

/**
 * start - r1 - r2 - ... - r<length-1> - end, one tunnel per step.
 */
export function chainGraph(length: number): FarmGraph {
  const rooms = ["start", ...Array.from({ length: length - 1 }, (_, i) => `r${i + 1}`), "end"];
  return FarmGraph.fromDescription({
    agentCount: 1,
    rooms: rooms.map((name, index) => ({ name, x: index, y: 0 })),
    tunnels: rooms.slice(1).map((name, index): [string, string] => [rooms[index], name]),
    start: "start",
    end: "end",
  });
}
