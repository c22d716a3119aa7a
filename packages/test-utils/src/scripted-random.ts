import type { RandomSource } from "@humantype/core";

export interface ScriptedRandomOptions {
  /** Values handed out by `next()` (and by `int`/`choice`/`uniform`), in order. */
  readonly uniforms?: readonly number[];
  /** Returned by `next()` once `uniforms` runs out. Default: 0.999. */
  readonly fallback?: number;
  /**
   * z-scores handed out by `gaussian()`, in order; each call returns
   * `mean + sd * z`. Once exhausted, gaussian returns the mean.
   */
  readonly gaussians?: readonly number[];
}

/** A RandomSource that also reports how many draws were taken. */
export interface ScriptedRandom extends RandomSource {
  readonly uniformDraws: number;
  readonly gaussianDraws: number;
}

/**
 * Deterministic random source for tests.
 *
 * The default fallback of 0.999 never triggers a probability check, so an
 * unscripted model behaves like a perfect typist; the default gaussian
 * returns the mean, so every delay equals its configured value.
 *
 * @example
 * ```ts
 * // First character: typo (0 < p), adjacent neighbor #0, then not revised.
 * const random = createScriptedRandom({ uniforms: [0, 0, 0.999] });
 * ```
 */
export function createScriptedRandom(options: ScriptedRandomOptions = {}): ScriptedRandom {
  const uniforms = [...(options.uniforms ?? [])];
  const gaussians = [...(options.gaussians ?? [])];
  const fallback = options.fallback ?? 0.999;
  let uniformDraws = 0;
  let gaussianDraws = 0;

  const next = (): number => {
    uniformDraws++;
    return uniforms.length > 0 ? (uniforms.shift() ?? fallback) : fallback;
  };

  const int = (min: number, max: number): number => {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    if (hi < lo) return lo;
    return lo + Math.min(hi - lo, Math.floor(next() * (hi - lo + 1)));
  };

  return {
    get uniformDraws() {
      return uniformDraws;
    },
    get gaussianDraws() {
      return gaussianDraws;
    },
    next,
    uniform: (min, max) => min + next() * (max - min),
    int,
    gaussian: (mean, sd) => {
      gaussianDraws++;
      const z = gaussians.length > 0 ? (gaussians.shift() ?? 0) : 0;
      return mean + sd * z;
    },
    choice: <T>(items: readonly T[]): T => {
      if (items.length === 0) {
        throw new RangeError("choice() called with an empty list");
      }
      return items[int(0, items.length - 1)];
    },
  };
}
