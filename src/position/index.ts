export { PositionIndex } from "./position-index.js";
export { parsePositions, parsePositionsJson } from "./positions-parser.js";
export type { ParsedPositions, Position, PositionInput, SkippedRow } from "./types.js";
