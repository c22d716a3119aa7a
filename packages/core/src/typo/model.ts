import { adjacentKeys } from "../keyboard/layout.js";
import type { RandomSource } from "../random/source.js";
import { createRandomSource } from "../random/source.js";
import {
  backspaceAction,
  pauseAction,
  typeAction,
  type Action,
  type PauseLabel,
} from "./actions.js";
import {
  DEFAULT_TYPO_CONFIG,
  enabledTypoClasses,
  resolveTypoConfig,
  revisionProbability,
  typoProbability,
  type TypoClass,
  type TypoConfig,
} from "./config.js";

/** Result of deciding how one character gets typed. */
export interface CharOutcome {
  readonly actions: Action[];
  /**
   * True when the outcome also covers the next source character
   * (transposition). The caller must advance its cursor by two.
   */
  readonly consumedTwo: boolean;
}

/** One entry of `processText`: the source position and what was done there. */
export interface TextOutcome {
  readonly index: number;
  readonly char: string;
  readonly actions: Action[];
}

/** Running counters for a typo model. */
export interface TypoStats {
  totalChars: number;
  typos: number;
  adjacent: number;
  transposition: number;
  doubleStrike: number;
  revised: number;
  unrevised: number;
}

/** Gaussian pause shape: mean, spread and hard floor, all in ms. */
interface PauseShape {
  readonly mean: number;
  readonly sd: number;
  readonly floor: number;
}

/** How long it takes to notice each kind of mistake. */
const RECOGNITION_PAUSE: Record<TypoClass, PauseShape> = {
  adjacent: { mean: 200, sd: 50, floor: 30 },
  // Swapped letters take longer to spot.
  transposition: { mean: 275, sd: 60, floor: 50 },
  // A doubled key is felt almost immediately.
  "double-strike": { mean: 140, sd: 40, floor: 30 },
};

/** Finger re-alignment between the backspaces and the corrected text. */
const RETYPE_PAUSE: Record<TypoClass, PauseShape> = {
  adjacent: { mean: 100, sd: 30, floor: 20 },
  transposition: { mean: 100, sd: 30, floor: 20 },
  "double-strike": { mean: 55, sd: 15, floor: 15 },
};

function emptyStats(): TypoStats {
  return {
    totalChars: 0,
    typos: 0,
    adjacent: 0,
    transposition: 0,
    doubleStrike: 0,
    revised: 0,
    unrevised: 0,
  };
}

/**
 * Decides, character by character, whether the typist slips and how the
 * slip is corrected.
 *
 * Each call returns the ordered keystroke actions for one source character
 * (or two, for a transposition). Mistakes are one of:
 *
 * - **adjacent**: a physically neighboring key is hit instead
 * - **transposition**: the current and next characters come out swapped
 * - **double-strike**: the key registers twice
 *
 * A realized mistake is corrected with the configured revision probability:
 * a recognition pause, backspaces, a retype pause, then the right text.
 *
 * Usage:
 * ```ts
 * const typos = new TypoModel({ typoProbabilityBp: 200, transpositionEnabled: true });
 * const { actions, consumedTwo } = typos.processChar("h", undefined, "e");
 * ```
 */
export class TypoModel {
  private readonly _config: TypoConfig;
  private readonly _random: RandomSource;
  private readonly _enabled: TypoClass[];
  private _stats: TypoStats;

  constructor(config: Partial<TypoConfig> = DEFAULT_TYPO_CONFIG, random?: RandomSource) {
    this._config = resolveTypoConfig(config);
    this._random = random ?? createRandomSource();
    this._enabled = enabledTypoClasses(this._config);
    this._stats = emptyStats();
  }

  get config(): TypoConfig {
    return this._config;
  }

  /** Copy of the counters accumulated since construction or the last reset. */
  get stats(): TypoStats {
    return { ...this._stats };
  }

  resetStats(): void {
    this._stats = emptyStats();
  }

  /**
   * Decide how `char` gets typed.
   *
   * @param prevChar Previous source character, undefined at the start.
   * @param nextChar Next source character, undefined at the end. A
   *   transposition needs it; without one the character is typed normally.
   */
  processChar(
    char: string,
    prevChar: string | undefined,
    nextChar: string | undefined,
  ): CharOutcome {
    this._stats.totalChars++;

    if (this._enabled.length === 0) {
      return normal(char);
    }
    if (this._random.next() >= typoProbability(this._config)) {
      return normal(char);
    }

    const cls = this._random.choice(this._enabled);
    switch (cls) {
      case "adjacent":
        return this._adjacent(char);
      case "transposition":
        return this._transposition(char, nextChar);
      case "double-strike":
        return this._doubleStrike(char);
    }
  }

  /**
   * Run `processChar` across a whole text, e.g. for dry runs and
   * diagnostics. A transposition covers two characters, so the next
   * entry starts two positions later.
   */
  processText(text: string): TextOutcome[] {
    const results: TextOutcome[] = [];
    let i = 0;
    while (i < text.length) {
      const char = text[i];
      const prevChar = i > 0 ? text[i - 1] : undefined;
      const nextChar = i + 1 < text.length ? text[i + 1] : undefined;

      const { actions, consumedTwo } = this.processChar(char, prevChar, nextChar);
      results.push({ index: i, char, actions });
      i += consumedTwo ? 2 : 1;
    }
    return results;
  }

  private _adjacent(char: string): CharOutcome {
    const neighbors = adjacentKeys(char);
    if (neighbors.length === 0) {
      return normal(char);
    }

    const wrong = this._random.choice(neighbors);
    this._stats.typos++;
    this._stats.adjacent++;

    const actions: Action[] = [typeAction(wrong, "typo", char)];
    if (this._shouldRevise()) {
      actions.push(
        this._pause(RECOGNITION_PAUSE.adjacent, "recognition"),
        backspaceAction(1),
        this._pause(RETYPE_PAUSE.adjacent, "retype-prep"),
        typeAction(char, "correction"),
      );
    }
    return { actions, consumedTwo: false };
  }

  private _transposition(char: string, nextChar: string | undefined): CharOutcome {
    if (nextChar === undefined) {
      return normal(char);
    }

    this._stats.typos++;
    this._stats.transposition++;

    const actions: Action[] = [
      typeAction(nextChar, "transposed", char),
      typeAction(char, "transposed", nextChar),
    ];
    if (this._shouldRevise()) {
      actions.push(
        this._pause(RECOGNITION_PAUSE.transposition, "recognition"),
        backspaceAction(2),
        this._pause(RETYPE_PAUSE.transposition, "retype-prep"),
        typeAction(char, "correction"),
        typeAction(nextChar, "correction"),
      );
    }
    return { actions, consumedTwo: true };
  }

  private _doubleStrike(char: string): CharOutcome {
    this._stats.typos++;
    this._stats.doubleStrike++;

    const actions: Action[] = [typeAction(char), typeAction(char, "double-strike")];
    // The duplicate is simply removed; nothing needs retyping.
    if (this._shouldRevise()) {
      actions.push(
        this._pause(RECOGNITION_PAUSE["double-strike"], "recognition"),
        backspaceAction(1),
        this._pause(RETYPE_PAUSE["double-strike"], "retype-prep"),
      );
    }
    return { actions, consumedTwo: false };
  }

  private _shouldRevise(): boolean {
    const revise = this._random.next() < revisionProbability(this._config);
    if (revise) {
      this._stats.revised++;
    } else {
      this._stats.unrevised++;
    }
    return revise;
  }

  private _pause(shape: PauseShape, label: PauseLabel): Action {
    const duration = Math.max(shape.floor, this._random.gaussian(shape.mean, shape.sd));
    return pauseAction(duration, label);
  }
}

function normal(char: string): CharOutcome {
  return { actions: [typeAction(char)], consumedTwo: false };
}
