// @humantype/test-utils
// Deterministic doubles and config factories for testing typing runs.

export { createScriptedRandom } from "./scripted-random.js";
export type { ScriptedRandom, ScriptedRandomOptions } from "./scripted-random.js";
export { RecordingKeyboardDriver } from "./recording-driver.js";
export type { DriverEvent } from "./recording-driver.js";
export { createInstantSleep, createManualSleep } from "./sleep.js";
export type { InstantSleep, ManualSleep } from "./sleep.js";
export { createTimingConfig, createTypoConfig, createEngineConfig } from "./factories.js";
