/**
 * Factory functions for creating test configurations.
 *
 * Every factory starts from a profile with all randomness switched off and
 * lets a test turn on only what it exercises. Override any field by
 * passing a partial object.
 */
import {
  resolveEngineConfig,
  resolveTimingConfig,
  resolveTypoConfig,
  type EngineConfig,
  type EngineConfigInput,
  type TimingConfig,
  type TypoConfig,
} from "@humantype/core";

/**
 * A timing profile with every modifier disabled: each delay is exactly
 * `baseDelayMs` (when the gaussian returns its mean).
 *
 * @example
 * ```ts
 * const timing = createTimingConfig({ shiftPenaltyEnabled: true });
 * ```
 */
export function createTimingConfig(overrides: Partial<TimingConfig> = {}): TimingConfig {
  return resolveTimingConfig({
    baseDelayMs: 50,
    delayVarianceMs: 0,
    wordBoundaryEnabled: false,
    punctuationPauseEnabled: false,
    newlinePauseEnabled: false,
    shiftPenaltyEnabled: false,
    doubleLetterEnabled: false,
    burstEnabled: false,
    fatigueEnabled: false,
    ...overrides,
  });
}

/** A typo profile that never makes a mistake unless told to. */
export function createTypoConfig(overrides: Partial<TypoConfig> = {}): TypoConfig {
  return resolveTypoConfig({
    typoProbabilityBp: 0,
    revisionProbabilityPct: 100,
    adjacentEnabled: true,
    transpositionEnabled: false,
    doubleStrikeEnabled: false,
    ...overrides,
  });
}

/**
 * An engine config with no countdown, flat timing and no typos.
 *
 * @example
 * ```ts
 * const config = createEngineConfig({ dryRun: true, typo: { typoProbabilityBp: 500 } });
 * ```
 */
export function createEngineConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return resolveEngineConfig({
    countdownSeconds: 0,
    emissionMode: "simple",
    dryRun: false,
    ...overrides,
    timing: createTimingConfig(overrides.timing),
    typo: createTypoConfig(overrides.typo),
  });
}
