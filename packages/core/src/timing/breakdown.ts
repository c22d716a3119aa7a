import { TIMING_STAGES, type DelayBreakdown } from "./model.js";

/**
 * Render a breakdown as a compact log tag, e.g.
 * `base:68.4 interWord:+131.2 shift:+25`.
 *
 * The final value is left out since it is already the logged delay.
 * Factor stages render as `×f`, additive stages as `+ms`.
 */
export function formatBreakdown(breakdown: DelayBreakdown): string {
  const parts: string[] = [];
  for (const stage of TIMING_STAGES) {
    const value = breakdown[stage];
    if (value === undefined || stage === "final") continue;

    if (stage === "base") {
      parts.push(`base:${value}`);
    } else if (stage.endsWith("Factor") || stage.endsWith("Multiplier")) {
      parts.push(`${stage}:×${value}`);
    } else {
      parts.push(`${stage}:+${value}`);
    }
  }
  return parts.join(" ");
}
