import type { TimingSample } from "../timing/model.js";
import type { TypoStats } from "../typo/model.js";

/** Summary of a finished run, delivered with the `complete` event. */
export interface RunStats {
  readonly totalTimeSec: number;
  readonly totalChars: number;
  /** Characters per minute over the wall-clock run time. */
  readonly avgCpm: number;
  /** Words per minute, counting five characters per word. */
  readonly avgWpm: number;
  readonly avgDelayMs: number;
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly typoStats: TypoStats;
}

const roundTo = (value: number, digits: number): number => {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
};

export function buildRunStats(
  samples: readonly TimingSample[],
  typoStats: TypoStats,
  elapsedMs: number,
): RunStats {
  const totalChars = samples.length;
  const totalTimeSec = Math.max(0, elapsedMs) / 1000;
  const cpm = totalTimeSec > 0 ? (totalChars / totalTimeSec) * 60 : 0;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const { delayMs } of samples) {
    sum += delayMs;
    if (delayMs < min) min = delayMs;
    if (delayMs > max) max = delayMs;
  }

  return {
    totalTimeSec: roundTo(totalTimeSec, 2),
    totalChars,
    avgCpm: roundTo(cpm, 1),
    avgWpm: roundTo(cpm / 5, 1),
    avgDelayMs: totalChars > 0 ? roundTo(sum / totalChars, 1) : 0,
    minDelayMs: totalChars > 0 ? roundTo(min, 1) : 0,
    maxDelayMs: totalChars > 0 ? roundTo(max, 1) : 0,
    typoStats: { ...typoStats },
  };
}
