/**
 * @fileoverview Line-oriented parser for farm descriptions.
 *
 * Grammar, one item per line:
 *
 * ```
 * 3              agent count (first non-comment line)
 * ##start        marks the next room as start
 * hall 0 0       room: name x y
 * ##end
 * exit 5 0
 * hall-exit      tunnel: a-b
 * # comment      ignored
 * ```
 *
 * Unknown `##` commands are ignored. Tunnels may name rooms declared
 * further down; endpoints are resolved once the whole input is read.
 *
 * @module farm/FarmParser
 */

import { StructuralError } from "../errors";
import { createLogger } from "../utils/Logger";
import { FarmDescription, FarmGraph, RoomDeclaration } from "./FarmGraph";
import { RoomNameSchema, validateFarmDescription } from "./FarmSchema";

const log = createLogger("FarmParser");

type Marker = "start" | "end";

const INTEGER = /^-?\d+$/;

/**
 * A parsed farm: the validated description plus the graph built from it.
 */
export interface LoadedFarm {
  description: FarmDescription;
  graph: FarmGraph;
}

function checkRoomName(name: string, lineNumber: number): void {
  const result = RoomNameSchema.safeParse(name);
  if (!result.success) {
    throw new StructuralError(
      "INVALID_ROOM",
      `${result.error.issues[0]?.message ?? "Invalid room name"}: ${name}`,
      { room: name },
      lineNumber
    );
  }
}

/**
 * Parses farm text into a validated description.
 */
export function parseFarm(text: string): FarmDescription {
  let agentCount: number | null = null;
  let pending: { marker: Marker; line: number } | null = null;
  let start: string | null = null;
  let end: string | null = null;
  const rooms: RoomDeclaration[] = [];
  const declaredAt = new Map<string, number>();
  const tunnels: Array<[string, string]> = [];
  const tunnelLines: number[] = [];

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].replace(/\r$/, "");

    if (line.trim() === "") continue;

    if (line.startsWith("##")) {
      if (agentCount === null) {
        throw new StructuralError(
          "INVALID_AGENT_COUNT",
          `Expected agent count before commands, got: ${line}`,
          undefined,
          lineNumber
        );
      }
      const command = line.slice(2);
      if (command === "start" || command === "end") {
        if (pending) {
          throw new StructuralError(
            "DANGLING_COMMAND",
            `##${pending.marker} (line ${pending.line}) is not followed by a room`,
            { command: pending.marker },
            lineNumber
          );
        }
        pending = { marker: command, line: lineNumber };
      } else {
        log.debug(`Ignoring unknown command on line ${lineNumber}: ${line}`);
      }
      continue;
    }

    if (line.startsWith("#")) continue;

    if (agentCount === null) {
      const count = INTEGER.test(line.trim()) ? Number(line.trim()) : NaN;
      if (!Number.isSafeInteger(count) || count <= 0) {
        throw new StructuralError("INVALID_AGENT_COUNT", `Invalid number of agents: "${line}"`, undefined, lineNumber);
      }
      agentCount = count;
      continue;
    }

    const fields = line.trim().split(/\s+/);

    if (fields.length === 3) {
      const [name, xField, yField] = fields;
      checkRoomName(name, lineNumber);
      if (!INTEGER.test(xField) || !INTEGER.test(yField)) {
        throw new StructuralError(
          "INVALID_ROOM",
          `Room coordinates must be integers: "${line}"`,
          { room: name },
          lineNumber
        );
      }
      if (declaredAt.has(name)) {
        throw new StructuralError(
          "DUPLICATE_ROOM",
          `Room ${name} already declared on line ${declaredAt.get(name)}`,
          { room: name },
          lineNumber
        );
      }
      declaredAt.set(name, lineNumber);
      rooms.push({ name, x: Number(xField), y: Number(yField) });

      if (pending) {
        if (pending.marker === "start") {
          if (start !== null) {
            throw new StructuralError("DUPLICATE_START", `Start declared twice: ${start} and ${name}`, undefined, lineNumber);
          }
          start = name;
        } else {
          if (end !== null) {
            throw new StructuralError("DUPLICATE_END", `End declared twice: ${end} and ${name}`, undefined, lineNumber);
          }
          end = name;
        }
        pending = null;
      }
      continue;
    }

    if (fields.length === 1 && line.includes("-")) {
      if (pending) {
        throw new StructuralError(
          "DANGLING_COMMAND",
          `##${pending.marker} (line ${pending.line}) must be followed by a room, got tunnel "${line}"`,
          { command: pending.marker },
          lineNumber
        );
      }
      const parts = fields[0].split("-");
      if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
        throw new StructuralError("MALFORMED_LINE", `Invalid tunnel line: "${line}"`, undefined, lineNumber);
      }
      const [a, b] = parts;
      if (a === b) {
        throw new StructuralError("SELF_TUNNEL", `Tunnel connects room to itself: ${a}`, { room: a }, lineNumber);
      }
      tunnels.push([a, b]);
      tunnelLines.push(lineNumber);
      continue;
    }

    throw new StructuralError("MALFORMED_LINE", `Unrecognized line: "${line}"`, undefined, lineNumber);
  }

  if (agentCount === null) {
    throw new StructuralError("INVALID_AGENT_COUNT", "Input is empty: missing number of agents");
  }
  if (pending) {
    throw new StructuralError(
      "DANGLING_COMMAND",
      `##${pending.marker} is not followed by a room`,
      { command: pending.marker },
      pending.line
    );
  }
  if (start === null) {
    throw new StructuralError("MISSING_START", "Missing ##start room");
  }
  if (end === null) {
    throw new StructuralError("MISSING_END", "Missing ##end room");
  }

  tunnels.forEach(([a, b], index) => {
    for (const name of [a, b]) {
      if (!declaredAt.has(name)) {
        throw new StructuralError(
          "UNKNOWN_ROOM",
          `Tunnel ${a}-${b} references unknown room: ${name}`,
          { room: name },
          tunnelLines[index]
        );
      }
    }
  });

  return validateFarmDescription({ agentCount, rooms, tunnels, start, end });
}

/**
 * Parses farm text and builds its graph.
 */
export function loadFarm(text: string): LoadedFarm {
  const description = parseFarm(text);
  const graph = FarmGraph.fromDescription(description);
  log.info(
    `Loaded ${graph.size} rooms, ${graph.tunnelCount} tunnels, ${description.agentCount} agents ` +
      `(start=${graph.startName}, end=${graph.endName})`
  );
  if (graph.tunnelCount < description.tunnels.length) {
    log.info(`Ignored ${description.tunnels.length - graph.tunnelCount} duplicate tunnel(s)`);
  }
  return { description, graph };
}
