/**
 * @fileoverview Farm module exports.
 *
 * The farm is the graph the agents travel through: rooms, tunnels and the
 * designated start and end rooms, plus the loader that builds it from text.
 *
 * @module farm
 */

export { FarmGraph, type Room, type RoomDeclaration, type FarmDescription } from "./FarmGraph";
export { RoomSet } from "./RoomSet";
export { parseFarm, loadFarm, type LoadedFarm } from "./FarmParser";
export {
  FarmDescriptionSchema,
  RoomDeclarationSchema,
  RoomNameSchema,
  validateFarmDescription,
} from "./FarmSchema";
export { GraphAnalyzer, type FarmMetrics } from "./GraphAnalyzer";
