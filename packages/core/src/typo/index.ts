export { TypoModel } from "./model.js";
export type { CharOutcome, TextOutcome, TypoStats } from "./model.js";

export {
  ALL_TYPO_CLASSES,
  DEFAULT_TYPO_CONFIG,
  resolveTypoConfig,
  typoProbability,
  revisionProbability,
  enabledTypoClasses,
} from "./config.js";
export type { TypoClass, TypoConfig } from "./config.js";

export { typeAction, backspaceAction, pauseAction } from "./actions.js";
export type {
  Action,
  TypeAction,
  BackspaceAction,
  PauseAction,
  TypeLabel,
  PauseLabel,
} from "./actions.js";
