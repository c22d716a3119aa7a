export { preprocessText, DEFAULT_PREPROCESS_OPTIONS } from "./preprocess.js";
export type { PreprocessOptions, NewlineMode } from "./preprocess.js";
