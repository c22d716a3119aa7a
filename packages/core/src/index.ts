// @humantype/core
// Keyboard layout, typo and timing models, and the typing engine.

export * from "./keyboard/index.js";
export * from "./random/index.js";
export * from "./typo/index.js";
export * from "./timing/index.js";
export * from "./text/index.js";
export * from "./engine/index.js";
export { TypedEventEmitter } from "./events/emitter.js";
export { TypingError, EmissionError, RunCancelledError } from "./errors.js";
