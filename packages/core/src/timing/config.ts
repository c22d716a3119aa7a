/**
 * Inter-keystroke timing profile.
 *
 * Each feature has its own enable flag so a profile can be tuned one
 * effect at a time. Magnitudes are in milliseconds; factors multiply the
 * running delay.
 */
export interface TimingConfig {
  /** Mean delay before each keystroke (ms). */
  readonly baseDelayMs: number;
  /** Spread of the base delay; the gaussian sd is half of this (ms). */
  readonly delayVarianceMs: number;

  readonly wordBoundaryEnabled: boolean;
  /** Multiplier inside a word (< 1 = faster). */
  readonly intraWordSpeedFactor: number;
  /** Extra pause before the first letter of a word (ms). */
  readonly interWordPauseMs: number;

  readonly punctuationPauseEnabled: boolean;
  /** Extra pause after `. , ! ? : ;` (ms). */
  readonly punctuationPauseMs: number;

  readonly newlinePauseEnabled: boolean;
  /** Extra pause after a line break (ms). */
  readonly newlinePauseMs: number;

  readonly shiftPenaltyEnabled: boolean;
  /** Flat cost of reaching for Shift (ms). */
  readonly shiftPenaltyMs: number;

  readonly doubleLetterEnabled: boolean;
  /** Multiplier for repeating the previous key (< 1 = faster). */
  readonly doubleLetterSpeedFactor: number;

  readonly burstEnabled: boolean;
  /** Shortest run of keystrokes between micro-pauses. */
  readonly burstLengthMin: number;
  /** Longest run of keystrokes between micro-pauses. */
  readonly burstLengthMax: number;
  /** Micro-pause at the end of a burst (ms). */
  readonly burstPauseMs: number;

  readonly fatigueEnabled: boolean;
  /** Slowdown reached at the end of the text (0.05 = 5% slower). */
  readonly fatigueFactor: number;
}

export const DEFAULT_TIMING_CONFIG: TimingConfig = {
  baseDelayMs: 70,
  delayVarianceMs: 30,

  wordBoundaryEnabled: true,
  intraWordSpeedFactor: 0.8,
  interWordPauseMs: 120,

  punctuationPauseEnabled: true,
  punctuationPauseMs: 200,

  newlinePauseEnabled: true,
  newlinePauseMs: 400,

  shiftPenaltyEnabled: true,
  shiftPenaltyMs: 25,

  doubleLetterEnabled: false,
  doubleLetterSpeedFactor: 0.6,

  burstEnabled: false,
  burstLengthMin: 2,
  burstLengthMax: 5,
  burstPauseMs: 40,

  fatigueEnabled: false,
  fatigueFactor: 0.05,
};

function nonNegative(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(0, value);
}

function positiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(1, Math.round(value));
}

/**
 * Merge a partial config over the defaults.
 *
 * Non-finite numbers fall back to the defaults, magnitudes and factors are
 * floored at zero, and burst lengths are made whole and ordered. Never
 * throws.
 */
export function resolveTimingConfig(overrides: Partial<TimingConfig> = {}): TimingConfig {
  const d = DEFAULT_TIMING_CONFIG;
  const burstA = positiveInt(overrides.burstLengthMin, d.burstLengthMin);
  const burstB = positiveInt(overrides.burstLengthMax, d.burstLengthMax);

  return {
    baseDelayMs: nonNegative(overrides.baseDelayMs, d.baseDelayMs),
    delayVarianceMs: nonNegative(overrides.delayVarianceMs, d.delayVarianceMs),

    wordBoundaryEnabled: overrides.wordBoundaryEnabled ?? d.wordBoundaryEnabled,
    intraWordSpeedFactor: nonNegative(overrides.intraWordSpeedFactor, d.intraWordSpeedFactor),
    interWordPauseMs: nonNegative(overrides.interWordPauseMs, d.interWordPauseMs),

    punctuationPauseEnabled: overrides.punctuationPauseEnabled ?? d.punctuationPauseEnabled,
    punctuationPauseMs: nonNegative(overrides.punctuationPauseMs, d.punctuationPauseMs),

    newlinePauseEnabled: overrides.newlinePauseEnabled ?? d.newlinePauseEnabled,
    newlinePauseMs: nonNegative(overrides.newlinePauseMs, d.newlinePauseMs),

    shiftPenaltyEnabled: overrides.shiftPenaltyEnabled ?? d.shiftPenaltyEnabled,
    shiftPenaltyMs: nonNegative(overrides.shiftPenaltyMs, d.shiftPenaltyMs),

    doubleLetterEnabled: overrides.doubleLetterEnabled ?? d.doubleLetterEnabled,
    doubleLetterSpeedFactor: nonNegative(
      overrides.doubleLetterSpeedFactor,
      d.doubleLetterSpeedFactor,
    ),

    burstEnabled: overrides.burstEnabled ?? d.burstEnabled,
    burstLengthMin: Math.min(burstA, burstB),
    burstLengthMax: Math.max(burstA, burstB),
    burstPauseMs: nonNegative(overrides.burstPauseMs, d.burstPauseMs),

    fatigueEnabled: overrides.fatigueEnabled ?? d.fatigueEnabled,
    fatigueFactor: nonNegative(overrides.fatigueFactor, d.fatigueFactor),
  };
}
