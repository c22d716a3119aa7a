import { requiresShift } from "../keyboard/layout.js";
import type { RandomSource } from "../random/source.js";
import { createRandomSource } from "../random/source.js";
import {
  DEFAULT_TIMING_CONFIG,
  resolveTimingConfig,
  type TimingConfig,
} from "./config.js";

/** Pipeline stages, in the order they are applied. */
export type TimingStage =
  | "base"
  | "newline"
  | "interWord"
  | "intraWordFactor"
  | "punctuation"
  | "shift"
  | "doubleLetterFactor"
  | "burst"
  | "fatigueMultiplier"
  | "final";

export const TIMING_STAGES: readonly TimingStage[] = [
  "base",
  "newline",
  "interWord",
  "intraWordFactor",
  "punctuation",
  "shift",
  "doubleLetterFactor",
  "burst",
  "fatigueMultiplier",
  "final",
];

/**
 * Per-stage contributions to one computed delay. Additive stages hold the
 * milliseconds they added, `*Factor`/`*Multiplier` stages hold the factor
 * they applied. Stages that did not fire are absent.
 */
export type DelayBreakdown = Partial<Record<TimingStage, number>> & {
  readonly base: number;
  readonly final: number;
};

/** The delay for one character plus how it was built. */
export interface DelayResult {
  readonly delayMs: number;
  readonly breakdown: DelayBreakdown;
}

/** One character's timing, as recorded during a run or a dry calculation. */
export interface TimingSample {
  readonly char: string;
  readonly delayMs: number;
  readonly breakdown: DelayBreakdown;
}

/** Previous characters that earn a punctuation pause on the next keystroke. */
export const PUNCTUATION_CHARS: ReadonlySet<string> = new Set([".", ",", "!", "?", ":", ";"]);

/** Nobody types faster than this between two keys (ms). */
export const MIN_DELAY_MS = 15;

const round1 = (value: number): number => Math.round(value * 10) / 10;

/**
 * Computes the pause before each keystroke.
 *
 * The delay for a character runs through a fixed pipeline:
 *
 * 1. base delay with gaussian jitter
 * 2. newline pause, or else
 * 3. word boundary: a pause before a new word, a speed-up inside one
 * 4. punctuation pause (stacks with 2/3)
 * 5. shift penalty
 * 6. repeated-key speed-up
 * 7. burst micro-pause every few keystrokes
 * 8. fatigue slowdown across the text
 * 9. floor at {@link MIN_DELAY_MS}
 *
 * The model is stateful only through its burst countdown; call `reset()`
 * before each new text.
 */
export class TimingModel {
  private readonly _config: TimingConfig;
  private readonly _random: RandomSource;
  private _burstCounter = 0;
  private _burstTarget = 0;

  constructor(config: Partial<TimingConfig> = DEFAULT_TIMING_CONFIG, random?: RandomSource) {
    this._config = resolveTimingConfig(config);
    this._random = random ?? createRandomSource();
    this.reset();
  }

  get config(): TimingConfig {
    return this._config;
  }

  /** Restart the burst countdown. Call before typing a new text. */
  reset(): void {
    this._burstCounter = 0;
    this._burstTarget = this._config.burstEnabled ? this._drawBurstTarget() : 0;
  }

  /**
   * Delay before typing `char`.
   *
   * @param prevChar The character typed just before, undefined at the start.
   * @param index Position of `char` in the text, for fatigue.
   * @param totalLength Length of the whole text, for fatigue.
   */
  calculateDelay(
    char: string,
    prevChar: string | undefined,
    index: number,
    totalLength: number,
  ): DelayResult {
    const cfg = this._config;
    const breakdown: Partial<Record<TimingStage, number>> = {};

    let delay = cfg.baseDelayMs + this._random.gaussian(0, cfg.delayVarianceMs / 2);
    const base = round1(delay);

    if (cfg.newlinePauseEnabled && prevChar === "\n") {
      const add = this._jitteredPause(cfg.newlinePauseMs, 0.3);
      delay += add;
      breakdown.newline = round1(add);
    } else if (cfg.wordBoundaryEnabled) {
      if (prevChar === " ") {
        const add = this._jitteredPause(cfg.interWordPauseMs, 0.2);
        delay += add;
        breakdown.interWord = round1(add);
      } else if (prevChar !== undefined && char !== " ") {
        delay *= cfg.intraWordSpeedFactor;
        breakdown.intraWordFactor = cfg.intraWordSpeedFactor;
      }
    }

    if (
      cfg.punctuationPauseEnabled &&
      prevChar !== undefined &&
      PUNCTUATION_CHARS.has(prevChar)
    ) {
      const add = this._jitteredPause(cfg.punctuationPauseMs, 0.3);
      delay += add;
      breakdown.punctuation = round1(add);
    }

    if (cfg.shiftPenaltyEnabled && requiresShift(char)) {
      delay += cfg.shiftPenaltyMs;
      breakdown.shift = cfg.shiftPenaltyMs;
    }

    if (
      cfg.doubleLetterEnabled &&
      prevChar !== undefined &&
      char.toLowerCase() === prevChar.toLowerCase()
    ) {
      delay *= cfg.doubleLetterSpeedFactor;
      breakdown.doubleLetterFactor = cfg.doubleLetterSpeedFactor;
    }

    if (cfg.burstEnabled && this._advanceBurst()) {
      const add = this._jitteredPause(cfg.burstPauseMs, 0.3);
      delay += add;
      breakdown.burst = round1(add);
    }

    if (cfg.fatigueEnabled && totalLength > 0) {
      const multiplier = 1 + cfg.fatigueFactor * (index / totalLength);
      delay *= multiplier;
      breakdown.fatigueMultiplier = Math.round(multiplier * 10_000) / 10_000;
    }

    const final = Math.max(MIN_DELAY_MS, delay);
    return {
      delayMs: final,
      breakdown: { ...breakdown, base, final: round1(final) },
    };
  }

  /**
   * Reset, then compute one sample per character of `text`, in order.
   * Used for dry runs and diagnostics.
   */
  calculateAll(text: string): TimingSample[] {
    this.reset();
    const samples: TimingSample[] = [];
    let prevChar: string | undefined;
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      const { delayMs, breakdown } = this.calculateDelay(char, prevChar, i, text.length);
      samples.push({ char, delayMs, breakdown });
      prevChar = char;
    }
    return samples;
  }

  /** `mean` scaled by a gaussian of relative spread `spread`, floored at zero. */
  private _jitteredPause(mean: number, spread: number): number {
    return Math.max(0, mean * (1 + this._random.gaussian(0, spread)));
  }

  /** Count one keystroke; true when it ends the current burst. */
  private _advanceBurst(): boolean {
    this._burstCounter++;
    if (this._burstCounter >= this._burstTarget) {
      this._burstCounter = 0;
      this._burstTarget = this._drawBurstTarget();
      return true;
    }
    return false;
  }

  private _drawBurstTarget(): number {
    return this._random.int(this._config.burstLengthMin, this._config.burstLengthMax);
  }
}
