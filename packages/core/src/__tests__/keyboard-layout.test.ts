import { describe, it, expect } from "vitest";
import {
  ADJACENT_KEYS,
  SHIFT_MAP,
  UNSHIFT_MAP,
  adjacentKeys,
  baseKey,
  requiresShift,
} from "../keyboard/layout.js";

describe("keyboard layout", () => {
  describe("adjacentKeys", () => {
    it("lists physical neighbors in board order", () => {
      expect(adjacentKeys("e")).toEqual(["3", "4", "w", "r", "s", "d"]);
      expect(adjacentKeys("a")).toEqual(["q", "w", "s", "z"]);
    });

    it("shifts the neighbors of a shifted character", () => {
      expect(adjacentKeys("E")).toEqual(["#", "$", "W", "R", "S", "D"]);
      expect(adjacentKeys("!")).toEqual(["~", "@", "Q"]);
    });

    it("returns nothing for keys off the board", () => {
      expect(adjacentKeys(" ")).toEqual([]);
      expect(adjacentKeys("\n")).toEqual([]);
      expect(adjacentKeys("é")).toEqual([]);
    });

    it("returns a copy the caller may modify", () => {
      const list = adjacentKeys("e");
      list.push("x");
      expect(adjacentKeys("e")).toHaveLength(6);
    });
  });

  describe("shift tables", () => {
    it("maps shifted characters to their base key", () => {
      expect(baseKey("!")).toBe("1");
      expect(baseKey("?")).toBe("/");
      expect(baseKey("Q")).toBe("q");
      expect(baseKey("q")).toBe("q");
      expect(baseKey("é")).toBe("é");
    });

    it("knows which characters need Shift", () => {
      expect(requiresShift("A")).toBe(true);
      expect(requiresShift("%")).toBe(true);
      expect(requiresShift("a")).toBe(false);
      expect(requiresShift("5")).toBe(false);
      expect(requiresShift(" ")).toBe(false);
    });

    it("pairs every symbol both ways", () => {
      for (const [base, shifted] of UNSHIFT_MAP) {
        expect(SHIFT_MAP.get(shifted)).toBe(base);
      }
      expect(SHIFT_MAP.size).toBe(UNSHIFT_MAP.size + 26);
    });
  });

  it("loads the full US QWERTY neighbor table", () => {
    expect(ADJACENT_KEYS.size).toBe(47);
    for (const [key, neighbors] of ADJACENT_KEYS) {
      expect(neighbors.length, key).toBeGreaterThan(0);
      expect(neighbors, key).not.toContain(key);
    }
  });
});
