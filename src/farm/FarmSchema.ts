/**
 * @fileoverview Schema for a parsed farm description.
 *
 * The parser checks each line as it reads it; this schema checks the
 * assembled description before a graph is built from it.
 *
 * @module farm/FarmSchema
 */

import { z } from "zod";
import { StructuralError } from "../errors";
import { FarmDescription } from "./FarmGraph";

/**
 * Room names cannot start with `L` (movement notation) or `#` (comments)
 * and cannot contain `-` (tunnel notation) or whitespace.
 */
export const RoomNameSchema = z
  .string()
  .min(1, { message: "Room name cannot be empty" })
  .regex(/^[^L#]/, { message: "Room name cannot start with 'L' or '#'" })
  .regex(/^[^\s-]+$/, { message: "Room name cannot contain '-' or whitespace" });

export const RoomDeclarationSchema = z.object({
  name: RoomNameSchema,
  x: z.number().int({ message: "Room x coordinate must be an integer" }),
  y: z.number().int({ message: "Room y coordinate must be an integer" }),
});

export const FarmDescriptionSchema = z.object({
  agentCount: z
    .number()
    .int({ message: "Agent count must be an integer" })
    .positive({ message: "Agent count must be positive" })
    .max(Number.MAX_SAFE_INTEGER, { message: "Agent count is too large" }),
  rooms: z.array(RoomDeclarationSchema).min(2, { message: "A farm needs at least a start and an end room" }),
  tunnels: z.array(z.tuple([RoomNameSchema, RoomNameSchema])),
  start: RoomNameSchema,
  end: RoomNameSchema,
});

/**
 * Validates a description, raising a single StructuralError that lists
 * every schema issue.
 */
export function validateFarmDescription(input: unknown): FarmDescription {
  const parsed = FarmDescriptionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new StructuralError("MALFORMED_LINE", `Invalid farm description: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}
