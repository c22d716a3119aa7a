import { readFileSync } from "node:fs";

/**
 * US QWERTY layout model: which physical keys neighbor each other, and
 * which characters need Shift held on top of a base key.
 *
 * All tables are built once at module load and frozen. Nothing in the
 * package mutates them, so they are shared by reference across models
 * and engines.
 */

/** Neighbor lists keyed by base (unshifted) key, in physical order. */
export type AdjacencyMap = ReadonlyMap<string, readonly string[]>;

function isNeighborTable(value: unknown): value is Record<string, string[]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (neighbors) =>
      Array.isArray(neighbors) &&
      neighbors.every((n) => typeof n === "string" && n.length === 1),
  );
}

function loadAdjacency(): AdjacencyMap {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./qwerty-adjacency.json", import.meta.url), "utf8"),
  );
  if (!isNeighborTable(raw)) {
    throw new Error("keyboard layout: qwerty-adjacency.json is malformed");
  }
  const map = new Map<string, readonly string[]>();
  for (const [key, neighbors] of Object.entries(raw)) {
    map.set(key, Object.freeze([...neighbors]));
  }
  return map;
}

/** Physical neighbors of every base key on a US QWERTY board. */
export const ADJACENT_KEYS: AdjacencyMap = loadAdjacency();

/**
 * Shifted symbol → base key on the same physical key.
 * Letters are added below.
 */
const SYMBOL_SHIFTS: ReadonlyArray<readonly [shifted: string, base: string]> = [
  ["~", "`"],
  ["!", "1"],
  ["@", "2"],
  ["#", "3"],
  ["$", "4"],
  ["%", "5"],
  ["^", "6"],
  ["&", "7"],
  ["*", "8"],
  ["(", "9"],
  [")", "0"],
  ["_", "-"],
  ["+", "="],
  ["{", "["],
  ["}", "]"],
  ["|", "\\"],
  [":", ";"],
  ['"', "'"],
  ["<", ","],
  [">", "."],
  ["?", "/"],
];

const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/** Shifted character → base key, covering symbols and uppercase letters. */
export const SHIFT_MAP: ReadonlyMap<string, string> = new Map([
  ...SYMBOL_SHIFTS,
  ...[...UPPERCASE].map((c): [string, string] => [c, c.toLowerCase()]),
]);

/**
 * Base key → shifted symbol. Only explicit symbol pairs live here;
 * letters are re-shifted by uppercasing.
 */
export const UNSHIFT_MAP: ReadonlyMap<string, string> = new Map(
  SYMBOL_SHIFTS.map(([shifted, base]): [string, string] => [base, shifted]),
);

/** Every character that needs Shift held to be produced. */
export const SHIFT_CHARS: ReadonlySet<string> = new Set(SHIFT_MAP.keys());

/**
 * The physical key that produces `char` without Shift.
 * Base keys and characters outside the layout map to themselves.
 */
export function baseKey(char: string): string {
  return SHIFT_MAP.get(char) ?? char;
}

/** Whether `char` needs Shift held on a US QWERTY board. */
export function requiresShift(char: string): boolean {
  return SHIFT_CHARS.has(char);
}

/**
 * Physical neighbors of the key that produces `char`.
 *
 * A shifted input yields shifted neighbors, so a slip while typing `E`
 * lands on `#`, `$`, `W`, `R`, `S` or `D` rather than their base keys.
 * Characters with no key on the board (space, newline, tab, non-ASCII)
 * return an empty list; callers fall back to typing normally.
 */
export function adjacentKeys(char: string): string[] {
  const neighbors = ADJACENT_KEYS.get(baseKey(char)) ?? [];
  if (!requiresShift(char)) {
    return [...neighbors];
  }
  return neighbors.map((n) => UNSHIFT_MAP.get(n) ?? n.toUpperCase());
}
