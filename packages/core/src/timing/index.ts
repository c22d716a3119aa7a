export { TimingModel, TIMING_STAGES, PUNCTUATION_CHARS, MIN_DELAY_MS } from "./model.js";
export type { TimingStage, DelayBreakdown, DelayResult, TimingSample } from "./model.js";

export { DEFAULT_TIMING_CONFIG, resolveTimingConfig } from "./config.js";
export type { TimingConfig } from "./config.js";

export { formatBreakdown } from "./breakdown.js";
