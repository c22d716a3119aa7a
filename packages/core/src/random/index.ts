export {
  createRandomSource,
  createSeededRandom,
  hashStringToSeed,
} from "./source.js";
export type { RandomFn, ClockFn, RandomSource } from "./source.js";
