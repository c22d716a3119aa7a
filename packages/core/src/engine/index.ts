export { EngineState, ENGINE_TRANSITIONS, ACTIVE_STATES, canTransition } from "./state.js";
export type { EmissionMode, EngineConfig, EngineConfigInput } from "./config.js";
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./config.js";
export type { SleepFn } from "./gate.js";
export { abortableSleep, noSleep, PauseGate } from "./gate.js";
export type {
  KeyboardDriver,
  EmissionSink,
  SpecialKey,
  SinkDependencies,
  SinkSelection,
} from "./sinks.js";
export {
  KEY_NAMES,
  specialKeyFor,
  DryRunSink,
  SimpleSink,
  PreciseSink,
  createEmissionSink,
} from "./sinks.js";
export type { FocusGuard, WindowIdentityProvider } from "./focus.js";
export { IntervalFocusGuard } from "./focus.js";
export type { RunStats } from "./stats.js";
export { buildRunStats } from "./stats.js";
export { visibleChar, formatElapsed, formatActionLine } from "./format.js";
export type { TypingEngineEvents, EngineCallbacks, TypingEngineOptions } from "./engine.js";
export { TypingEngine, DEFAULT_FOCUS_CHECK_INTERVAL } from "./engine.js";
