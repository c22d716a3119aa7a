import {
  DEFAULT_TIMING_CONFIG,
  resolveTimingConfig,
  type TimingConfig,
} from "../timing/config.js";
import {
  DEFAULT_TYPO_CONFIG,
  resolveTypoConfig,
  type TypoConfig,
} from "../typo/config.js";

/**
 * How characters reach the keyboard driver.
 *
 * - `simple`: each character is sent atomically
 * - `precise`: Shift is pressed, held and released around the base key
 */
export type EmissionMode = "simple" | "precise";

/**
 * Everything that shapes one run. Captured by value at `start()`.
 */
export interface EngineConfig {
  readonly timing: TimingConfig;
  readonly typo: TypoConfig;
  /** Seconds to wait before the first keystroke. 0 = start immediately. */
  readonly countdownSeconds: number;
  readonly emissionMode: EmissionMode;
  /** Compute everything, emit nothing, sleep never. */
  readonly dryRun: boolean;
}

/** Partial engine config, with partial nested timing and typo configs. */
export interface EngineConfigInput {
  readonly timing?: Partial<TimingConfig>;
  readonly typo?: Partial<TypoConfig>;
  readonly countdownSeconds?: number;
  readonly emissionMode?: EmissionMode;
  readonly dryRun?: boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  timing: DEFAULT_TIMING_CONFIG,
  typo: DEFAULT_TYPO_CONFIG,
  countdownSeconds: 3,
  emissionMode: "simple",
  dryRun: false,
};

/**
 * Merge `input` over `base` (the defaults unless given) and normalize the
 * result. Never throws.
 */
export function resolveEngineConfig(
  input: EngineConfigInput = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  const countdown = input.countdownSeconds ?? base.countdownSeconds;
  return {
    timing: resolveTimingConfig({ ...base.timing, ...input.timing }),
    typo: resolveTypoConfig({ ...base.typo, ...input.typo }),
    countdownSeconds: Number.isFinite(countdown) ? Math.max(0, Math.floor(countdown)) : 0,
    emissionMode: input.emissionMode ?? base.emissionMode,
    dryRun: input.dryRun ?? base.dryRun,
  };
}
