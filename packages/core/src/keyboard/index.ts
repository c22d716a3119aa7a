export {
  ADJACENT_KEYS,
  SHIFT_MAP,
  UNSHIFT_MAP,
  SHIFT_CHARS,
  baseKey,
  requiresShift,
  adjacentKeys,
} from "./layout.js";
export type { AdjacencyMap } from "./layout.js";
