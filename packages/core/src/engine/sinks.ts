import { baseKey, requiresShift } from "../keyboard/layout.js";
import type { RandomSource } from "../random/source.js";
import type { EmissionMode } from "./config.js";
import type { SleepFn } from "./gate.js";
import { RunCancelledError } from "../errors.js";

/**
 * Minimal keyboard surface the engine drives. Implemented by the browser
 * package over a page keyboard, and by test doubles.
 *
 * Key names follow the DOM `KeyboardEvent.key` convention: single
 * characters, plus "Shift", "Backspace", "Enter" and "Tab".
 */
export interface KeyboardDriver {
  keyDown(key: string): Promise<void>;
  keyUp(key: string): Promise<void>;
  /** Insert a character without key events for its modifiers. */
  sendCharacter(char: string): Promise<void>;
}

/** Keys that are pressed by name rather than sent as text. */
export type SpecialKey = "enter" | "tab" | "space";

/**
 * Where keystrokes go. The engine talks only to this interface; which
 * implementation it gets depends on the run's config.
 */
export interface EmissionSink {
  emitChar(char: string): Promise<void>;
  emitBackspace(count: number): Promise<void>;
  emitSpecial(key: SpecialKey): Promise<void>;
}

export const KEY_NAMES = {
  shift: "Shift",
  backspace: "Backspace",
  enter: "Enter",
  tab: "Tab",
  space: " ",
} as const;

const SPECIAL_KEY_NAMES: Record<SpecialKey, string> = {
  enter: KEY_NAMES.enter,
  tab: KEY_NAMES.tab,
  space: KEY_NAMES.space,
};

const SPECIAL_CHARS: ReadonlyMap<string, SpecialKey> = new Map([
  ["\n", "enter"],
  ["\t", "tab"],
  [" ", "space"],
]);

/** The special key a control or whitespace character maps to, if any. */
export function specialKeyFor(char: string): SpecialKey | undefined {
  return SPECIAL_CHARS.get(char);
}

export interface SinkDependencies {
  readonly driver: KeyboardDriver;
  readonly random: RandomSource;
  readonly sleep: SleepFn;
  readonly log: (message: string) => void;
}

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

// ─── Dry run ────────────────────────────────────────────────────

/** Accepts everything, emits nothing. */
export class DryRunSink implements EmissionSink {
  async emitChar(_char: string): Promise<void> {}
  async emitBackspace(_count: number): Promise<void> {}
  async emitSpecial(_key: SpecialKey): Promise<void> {}
}

// ─── Simple ─────────────────────────────────────────────────────

/**
 * Sends each character atomically. Line breaks, tabs and spaces are
 * pressed as named keys.
 */
export class SimpleSink implements EmissionSink {
  constructor(protected readonly deps: SinkDependencies) {}

  async emitChar(char: string): Promise<void> {
    const special = specialKeyFor(char);
    if (special) {
      await this.emitSpecial(special);
      return;
    }
    await this.deps.driver.sendCharacter(char);
  }

  async emitSpecial(key: SpecialKey): Promise<void> {
    await this.tap(SPECIAL_KEY_NAMES[key]);
  }

  /** Press Backspace `count` times with a short human gap between presses. */
  async emitBackspace(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await this.tap(KEY_NAMES.backspace);
      if (i < count - 1) {
        await this.deps.sleep(Math.max(15, this.deps.random.gaussian(40, 8)));
      }
    }
  }

  protected async tap(key: string): Promise<void> {
    await this.deps.driver.keyDown(key);
    await this.deps.driver.keyUp(key);
  }
}

// ─── Precise ────────────────────────────────────────────────────

/**
 * Presses Shift explicitly around shifted characters, with jittered hold
 * times, and taps the base key. A character that fails this way is sent
 * again through the simple path; the fallback is logged. Cancellation is
 * never a fallback.
 */
export class PreciseSink extends SimpleSink {
  override async emitChar(char: string): Promise<void> {
    if (specialKeyFor(char)) {
      await super.emitChar(char);
      return;
    }

    try {
      await this.emitPrecise(char);
    } catch (err) {
      if (err instanceof RunCancelledError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      this.deps.log(`[fallback] '${char}' sent as text: ${reason}`);
      await super.emitChar(char);
    }
  }

  private async emitPrecise(char: string): Promise<void> {
    if (!requiresShift(char)) {
      await this.tap(char);
      return;
    }

    const { driver, random, sleep } = this.deps;
    await driver.keyDown(KEY_NAMES.shift);
    try {
      await sleep(clamp(random.gaussian(15, 5), 5, 20));
      await this.tap(baseKey(char));
      await sleep(clamp(random.gaussian(10, 3), 3, 13));
    } finally {
      await driver.keyUp(KEY_NAMES.shift);
    }
  }
}

// ─── Selection ──────────────────────────────────────────────────

export interface SinkSelection {
  readonly dryRun: boolean;
  readonly emissionMode: EmissionMode;
}

/**
 * Pick the sink for a run. Returns `null` when the run needs a real
 * keyboard and none was supplied.
 */
export function createEmissionSink(
  selection: SinkSelection,
  deps: Omit<SinkDependencies, "driver"> & { readonly driver?: KeyboardDriver },
): EmissionSink | null {
  if (selection.dryRun) return new DryRunSink();
  const { driver } = deps;
  if (!driver) return null;
  const full: SinkDependencies = { ...deps, driver };
  return selection.emissionMode === "precise" ? new PreciseSink(full) : new SimpleSink(full);
}
