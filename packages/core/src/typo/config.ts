/** The three kinds of mistake the typo model can make. */
export type TypoClass = "adjacent" | "transposition" | "double-strike";

/** All typo classes, in the order they are offered to the random choice. */
export const ALL_TYPO_CLASSES: readonly TypoClass[] = [
  "adjacent",
  "transposition",
  "double-strike",
];

/**
 * Mistake profile for a run.
 */
export interface TypoConfig {
  /** Chance of a mistake per character, in basis points (30 = 0.30%). */
  readonly typoProbabilityBp: number;

  /** Chance a mistake is noticed and corrected, in percent. */
  readonly revisionProbabilityPct: number;

  /** Hit a physically neighboring key instead of the intended one. */
  readonly adjacentEnabled: boolean;

  /** Swap the current and next character. */
  readonly transpositionEnabled: boolean;

  /** Strike the same key twice. */
  readonly doubleStrikeEnabled: boolean;
}

export const DEFAULT_TYPO_CONFIG: TypoConfig = {
  typoProbabilityBp: 30,
  revisionProbabilityPct: 85,
  adjacentEnabled: true,
  transpositionEnabled: false,
  doubleStrikeEnabled: false,
};

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/**
 * Merge a partial config over the defaults and clamp the probabilities
 * into their units' ranges. Never throws.
 */
export function resolveTypoConfig(overrides: Partial<TypoConfig> = {}): TypoConfig {
  const d = DEFAULT_TYPO_CONFIG;
  return {
    typoProbabilityBp: Math.max(
      0,
      Math.min(10_000, finiteOr(overrides.typoProbabilityBp, d.typoProbabilityBp)),
    ),
    revisionProbabilityPct: Math.max(
      0,
      Math.min(100, finiteOr(overrides.revisionProbabilityPct, d.revisionProbabilityPct)),
    ),
    adjacentEnabled: overrides.adjacentEnabled ?? d.adjacentEnabled,
    transpositionEnabled: overrides.transpositionEnabled ?? d.transpositionEnabled,
    doubleStrikeEnabled: overrides.doubleStrikeEnabled ?? d.doubleStrikeEnabled,
  };
}

/** Typo probability as a fraction in [0, 1]. */
export function typoProbability(config: TypoConfig): number {
  return Math.max(0, Math.min(1, config.typoProbabilityBp / 10_000));
}

/** Revision probability as a fraction in [0, 1]. */
export function revisionProbability(config: TypoConfig): number {
  return Math.max(0, Math.min(1, config.revisionProbabilityPct / 100));
}

/** Enabled typo classes, in ALL_TYPO_CLASSES order. */
export function enabledTypoClasses(config: TypoConfig): TypoClass[] {
  return ALL_TYPO_CLASSES.filter((cls) => {
    switch (cls) {
      case "adjacent":
        return config.adjacentEnabled;
      case "transposition":
        return config.transpositionEnabled;
      case "double-strike":
        return config.doubleStrikeEnabled;
    }
  });
}
