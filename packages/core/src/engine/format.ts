import type { Action } from "../typo/actions.js";
import { formatBreakdown } from "../timing/breakdown.js";
import type { DelayBreakdown } from "../timing/model.js";

const VISIBLE: ReadonlyMap<string, string> = new Map([
  [" ", "␣"],
  ["\n", "↵"],
  ["\t", "⇥"],
]);

/** Printable form of a character for log lines. */
export function visibleChar(char: string): string {
  return VISIBLE.get(char) ?? char;
}

/** Run clock as `SSS.mmm`. */
export function formatElapsed(elapsedMs: number): string {
  return (Math.max(0, elapsedMs) / 1000).toFixed(3).padStart(7, "0");
}

/**
 * One log line for an executed action. Breakdown tags are attached only to
 * normal and corrective keystrokes, whose delay came from the timing model.
 */
export function formatActionLine(
  action: Action,
  elapsedMs: number,
  delayMs: number,
  breakdown: DelayBreakdown,
): string {
  const at = `[${formatElapsed(elapsedMs)}]`;
  switch (action.kind) {
    case "type": {
      const intended =
        action.intended !== undefined ? ` for '${visibleChar(action.intended)}'` : "";
      const line = `${at} '${visibleChar(action.char)}' ${action.label}${intended} (${Math.round(delayMs)}ms)`;
      return action.label === "normal" || action.label === "correction"
        ? `${line} [${formatBreakdown(breakdown)}]`
        : line;
    }
    case "backspace":
      return `${at} backspace x${action.count}`;
    case "pause":
      return `${at} ${action.label} (${Math.round(action.durationMs)}ms)`;
  }
}
