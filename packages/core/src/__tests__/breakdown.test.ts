import { describe, it, expect } from "vitest";
import { formatBreakdown } from "../timing/breakdown.js";

describe("formatBreakdown", () => {
  it("renders stages in pipeline order without the final value", () => {
    expect(
      formatBreakdown({
        shift: 25,
        base: 70,
        punctuation: 200,
        intraWordFactor: 0.8,
        final: 281,
      }),
    ).toBe("base:70 intraWordFactor:×0.8 punctuation:+200 shift:+25");
  });

  it("marks multipliers with ×", () => {
    expect(formatBreakdown({ base: 52.3, fatigueMultiplier: 1.0125, final: 53 })).toBe(
      "base:52.3 fatigueMultiplier:×1.0125",
    );
  });

  it("renders only the base when nothing else fired", () => {
    expect(formatBreakdown({ base: 70, final: 70 })).toBe("base:70");
  });
});
