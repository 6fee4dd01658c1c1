/**
 * @fileoverview Farm graph model: rooms, tunnels and adjacency.
 *
 * Rooms live in an arena indexed by integer id (declaration order). The
 * adjacency list is keyed by the same ids, so searches work on numbers and
 * RoomSet bitsets rather than names and hashed sets.
 *
 * A FarmGraph is immutable once built. It is handed read-only to the
 * routing and scheduling stages.
 *
 * @module farm/FarmGraph
 */

import { StructuralError } from "../errors";
import { RoomSet } from "./RoomSet";

/**
 * A room as declared in the farm description.
 */
export interface RoomDeclaration {
  name: string;
  x: number;
  y: number;
}

/**
 * Validated output of the loader; the only input the graph is built from.
 */
export interface FarmDescription {
  /** Number of agents waiting in start */
  agentCount: number;
  /** Rooms in declaration order */
  rooms: RoomDeclaration[];
  /** Tunnels in declaration order, as pairs of room names */
  tunnels: Array<[string, string]>;
  start: string;
  end: string;
}

/**
 * A room in the arena.
 */
export interface Room {
  id: number;
  name: string;
  x: number;
  y: number;
}

function coordinateKey(x: number, y: number): string {
  return `${x},${y}`;
}

export class FarmGraph {
  private readonly roomList: Room[];
  private readonly adjacency: number[][];
  private readonly idsByName: Map<string, number>;

  readonly startId: number;
  readonly endId: number;
  readonly tunnelCount: number;

  private constructor(
    rooms: Room[],
    adjacency: number[][],
    idsByName: Map<string, number>,
    startId: number,
    endId: number,
    tunnelCount: number
  ) {
    this.roomList = rooms;
    this.adjacency = adjacency;
    this.idsByName = idsByName;
    this.startId = startId;
    this.endId = endId;
    this.tunnelCount = tunnelCount;
  }

  /**
   * Builds a graph, enforcing the structural invariants: unique names,
   * unique coordinates, known tunnel endpoints, start and end declared
   * and distinct. A tunnel declared twice is kept once.
   */
  static fromDescription(description: FarmDescription): FarmGraph {
    const rooms: Room[] = [];
    const idsByName = new Map<string, number>();
    const roomsByCoordinate = new Map<string, string>();

    for (const decl of description.rooms) {
      if (idsByName.has(decl.name)) {
        throw new StructuralError("DUPLICATE_ROOM", `Room declared twice: ${decl.name}`, { room: decl.name });
      }
      const key = coordinateKey(decl.x, decl.y);
      const holder = roomsByCoordinate.get(key);
      if (holder !== undefined) {
        throw new StructuralError(
          "DUPLICATE_COORDINATES",
          `Rooms ${holder} and ${decl.name} share coordinates ${decl.x} ${decl.y}`,
          { rooms: [holder, decl.name], x: decl.x, y: decl.y }
        );
      }
      roomsByCoordinate.set(key, decl.name);
      const id = rooms.length;
      rooms.push({ id, name: decl.name, x: decl.x, y: decl.y });
      idsByName.set(decl.name, id);
    }

    const startId = idsByName.get(description.start);
    if (startId === undefined) {
      throw new StructuralError("MISSING_START", `Start room is not declared: ${description.start}`);
    }
    const endId = idsByName.get(description.end);
    if (endId === undefined) {
      throw new StructuralError("MISSING_END", `End room is not declared: ${description.end}`);
    }
    if (startId === endId) {
      throw new StructuralError("START_IS_END", `Start and end are the same room: ${description.start}`);
    }

    const adjacency: number[][] = rooms.map(() => []);
    const seen = new Set<string>();
    let tunnelCount = 0;

    for (const [a, b] of description.tunnels) {
      const idA = idsByName.get(a);
      const idB = idsByName.get(b);
      if (idA === undefined || idB === undefined) {
        const missing = idA === undefined ? a : b;
        throw new StructuralError("UNKNOWN_ROOM", `Tunnel ${a}-${b} references unknown room: ${missing}`, {
          room: missing,
        });
      }
      if (idA === idB) {
        throw new StructuralError("SELF_TUNNEL", `Tunnel connects room to itself: ${a}`, { room: a });
      }
      const key = idA < idB ? `${idA}|${idB}` : `${idB}|${idA}`;
      if (seen.has(key)) continue;
      seen.add(key);
      adjacency[idA].push(idB);
      adjacency[idB].push(idA);
      tunnelCount++;
    }

    return new FarmGraph(rooms, adjacency, idsByName, startId, endId, tunnelCount);
  }

  get size(): number {
    return this.roomList.length;
  }

  get startName(): string {
    return this.roomList[this.startId].name;
  }

  get endName(): string {
    return this.roomList[this.endId].name;
  }

  hasRoom(name: string): boolean {
    return this.idsByName.has(name);
  }

  idOf(name: string): number | undefined {
    return this.idsByName.get(name);
  }

  room(id: number): Room {
    const room = this.roomList[id];
    if (!room) {
      throw new RangeError(`Unknown room id: ${id}`);
    }
    return room;
  }

  nameOf(id: number): string {
    return this.room(id).name;
  }

  /**
   * Neighbor ids in tunnel declaration order.
   */
  neighbors(id: number): readonly number[] {
    return this.adjacency[id] ?? [];
  }

  degree(id: number): number {
    return this.neighbors(id).length;
  }

  rooms(): readonly Room[] {
    return this.roomList;
  }

  /**
   * An empty RoomSet sized for this graph.
   */
  createRoomSet(): RoomSet {
    return new RoomSet(this.size);
  }
}
