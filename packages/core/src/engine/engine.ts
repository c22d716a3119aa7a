import { RunCancelledError } from "../errors.js";
import { TypedEventEmitter } from "../events/emitter.js";
import type { ClockFn, RandomSource } from "../random/source.js";
import { createRandomSource } from "../random/source.js";
import { TimingModel, type DelayBreakdown, type TimingSample } from "../timing/model.js";
import type { Action } from "../typo/actions.js";
import { TypoModel, type TypoStats } from "../typo/model.js";
import {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from "./config.js";
import type { FocusGuard } from "./focus.js";
import { formatActionLine } from "./format.js";
import { abortableSleep, noSleep, PauseGate, type SleepFn } from "./gate.js";
import { createEmissionSink, type EmissionSink, type KeyboardDriver } from "./sinks.js";
import { ACTIVE_STATES, canTransition, EngineState } from "./state.js";
import { buildRunStats, type RunStats } from "./stats.js";

/** Events emitted by a {@link TypingEngine}, all delivered synchronously. */
export type TypingEngineEvents = {
  progress: (current: number, total: number) => void;
  log: (message: string) => void;
  stateChange: (state: EngineState, previous: EngineState) => void;
  countdown: (secondsRemaining: number) => void;
  complete: (stats: RunStats) => void;
  /** A run ended because the keyboard driver failed. */
  error: (error: Error) => void;
};

/** Callback-style subscriptions, wired to the matching events at construction. */
export interface EngineCallbacks {
  readonly onProgress?: (current: number, total: number) => void;
  readonly onLog?: (message: string) => void;
  readonly onStateChange?: (state: EngineState, previous: EngineState) => void;
  readonly onCountdown?: (secondsRemaining: number) => void;
  readonly onComplete?: (stats: RunStats) => void;
  readonly onError?: (error: Error) => void;
}

export interface TypingEngineOptions {
  readonly config?: EngineConfigInput;
  /** Required unless every run is a dry run. */
  readonly driver?: KeyboardDriver;
  readonly focusGuard?: FocusGuard;
  /** Characters between focus checks. Default: 10. */
  readonly focusCheckInterval?: number;
  readonly callbacks?: EngineCallbacks;
  /** Source of every random draw. Default: Math.random. */
  readonly random?: RandomSource;
  /** Wall clock for run statistics and log timestamps. Default: Date.now. */
  readonly clock?: ClockFn;
  /** Sleep used by real runs. Must reject once its signal aborts. */
  readonly sleep?: SleepFn;
}

export const DEFAULT_FOCUS_CHECK_INTERVAL = 10;

/** Everything one background run owns. Never shared between runs. */
interface RunContext {
  readonly text: string;
  readonly config: EngineConfig;
  readonly controller: AbortController;
  readonly sink: EmissionSink;
  readonly sleep: SleepFn;
  readonly timing: TimingModel;
  readonly typos: TypoModel;
  readonly samples: TimingSample[];
  startedAt: number;
  cursor: number;
}

/**
 * Types a text into a keyboard driver the way a person would.
 *
 * Each `start()` spawns one background run that walks the text, asks the
 * timing model how long to wait and the typo model what to press, and
 * sends the result to an emission sink. The run can be paused, resumed and
 * stopped at any time; every control call returns whether it was accepted
 * and is otherwise a no-op.
 *
 * Usage:
 * ```ts
 * const engine = new TypingEngine({
 *   driver,
 *   config: { countdownSeconds: 0, typo: { typoProbabilityBp: 100 } },
 *   callbacks: { onComplete: (stats) => console.log(stats.avgWpm) },
 * });
 *
 * engine.start("Hello, world!");
 * await engine.whenSettled();
 * ```
 */
export class TypingEngine extends TypedEventEmitter<TypingEngineEvents> {
  private readonly _driver: KeyboardDriver | undefined;
  private readonly _focusGuard: FocusGuard | undefined;
  private readonly _focusCheckInterval: number;
  private readonly _random: RandomSource;
  private readonly _clock: ClockFn;
  private readonly _sleep: SleepFn;
  private readonly _gate = new PauseGate();

  private _config: EngineConfig;
  private _state = EngineState.IDLE;
  private _run: RunContext | null = null;
  private _task: Promise<void> = Promise.resolve();
  private _logLines: string[] = [];

  constructor(options: TypingEngineOptions = {}) {
    super();
    this._config = resolveEngineConfig(options.config, DEFAULT_ENGINE_CONFIG);
    this._driver = options.driver;
    this._focusGuard = options.focusGuard;
    this._focusCheckInterval = Math.max(
      1,
      Math.floor(options.focusCheckInterval ?? DEFAULT_FOCUS_CHECK_INTERVAL),
    );
    this._random = options.random ?? createRandomSource();
    this._clock = options.clock ?? Date.now;
    this._sleep = options.sleep ?? abortableSleep;

    const cb = options.callbacks;
    if (cb?.onProgress) this.on("progress", cb.onProgress);
    if (cb?.onLog) this.on("log", cb.onLog);
    if (cb?.onStateChange) this.on("stateChange", cb.onStateChange);
    if (cb?.onCountdown) this.on("countdown", cb.onCountdown);
    if (cb?.onComplete) this.on("complete", cb.onComplete);
    if (cb?.onError) this.on("error", cb.onError);
  }

  // ─── Queries ─────────────────────────────────────────────────────

  get state(): EngineState {
    return this._state;
  }

  get config(): EngineConfig {
    return this._config;
  }

  /** True while a run is counting down, typing or paused. */
  get isActive(): boolean {
    return ACTIVE_STATES.has(this._state);
  }

  /** Timing samples of the current or last run. */
  get samples(): readonly TimingSample[] {
    return this._run ? [...this._run.samples] : [];
  }

  /** Log lines of the current or last run. */
  get logLines(): readonly string[] {
    return [...this._logLines];
  }

  /** Typo counters of the current or last run. */
  get typoStats(): TypoStats | null {
    return this._run ? this._run.typos.stats : null;
  }

  /** Index of the source character being typed, 0 before the first one. */
  get cursor(): number {
    return this._run?.cursor ?? 0;
  }

  /** Settles when the current background run has fully ended. Never rejects. */
  whenSettled(): Promise<void> {
    return this._task;
  }

  // ─── Controls ────────────────────────────────────────────────────

  /**
   * Replace parts of the config for future runs. Only accepted while idle;
   * a running text keeps the config it started with.
   */
  updateConfig(input: EngineConfigInput): boolean {
    if (this._state !== EngineState.IDLE) return false;
    this._config = resolveEngineConfig(input, this._config);
    return true;
  }

  /**
   * Begin typing `text` in the background. Only accepted while idle.
   *
   * Returns false without starting when a real run has no keyboard driver.
   */
  start(text: string): boolean {
    if (this._state !== EngineState.IDLE) return false;

    const config = this._config;
    const controller = new AbortController();
    const sleep: SleepFn = config.dryRun ? noSleep : this._sleep;
    const sink = createEmissionSink(config, {
      driver: this._driver,
      random: this._random,
      sleep: (ms) => sleep(ms, controller.signal),
      log: (message) => this._log(message),
    });
    if (!sink) {
      this._log("[error] no keyboard driver configured");
      return false;
    }

    const run: RunContext = {
      text,
      config,
      controller,
      sink,
      sleep,
      timing: new TimingModel(config.timing, this._random),
      typos: new TypoModel(config.typo, this._random),
      samples: [],
      startedAt: this._clock(),
      cursor: 0,
    };
    this._run = run;
    this._logLines = [];
    this._gate.open();

    const countdown = !config.dryRun && config.countdownSeconds > 0;
    this._setState(countdown ? EngineState.COUNTDOWN : EngineState.TYPING);

    // A stopped run may still be unwinding; it must be gone before this one emits.
    const previous = this._task;
    this._task = this._execute(run, previous);
    return true;
  }

  /** Suspend typing at the next character. Only accepted while typing. */
  pause(): boolean {
    if (this._state !== EngineState.TYPING) return false;
    this._gate.close();
    this._setState(EngineState.PAUSED);
    this._log("[paused]");
    return true;
  }

  /** Continue a paused run. Only accepted while paused. */
  resume(): boolean {
    if (this._state !== EngineState.PAUSED) return false;
    this._setState(EngineState.TYPING);
    this._gate.open();
    this._log("[resumed]");
    return true;
  }

  /** Pause when typing, resume when paused. */
  toggle(): boolean {
    if (this._state === EngineState.TYPING) return this.pause();
    if (this._state === EngineState.PAUSED) return this.resume();
    return false;
  }

  /**
   * Cancel the run and return to IDLE at once. Also accepted from DONE, so
   * a finished engine can be reset for the next text.
   */
  stop(): boolean {
    if (this._state === EngineState.IDLE) return false;
    this._run?.controller.abort();
    this._gate.open();
    this._setState(EngineState.IDLE);
    this._log("[stopped]");
    return true;
  }

  // ─── Run ─────────────────────────────────────────────────────────

  private async _execute(run: RunContext, previous: Promise<void>): Promise<void> {
    try {
      await previous;
      await this._countdown(run);
      this._throwIfCancelled(run);
      if (this._focusGuard) await this._focusGuard.capture();
      this._throwIfCancelled(run);

      if (this._state === EngineState.COUNTDOWN) {
        this._setState(EngineState.TYPING);
      }
      run.startedAt = this._clock();
      await this._typeAll(run);
    } catch (err) {
      if (err instanceof RunCancelledError || run.controller.signal.aborted) return;
      this._fail(run, err);
    }
  }

  private async _countdown(run: RunContext): Promise<void> {
    if (run.config.dryRun) return;
    for (let remaining = run.config.countdownSeconds; remaining > 0; remaining--) {
      this._throwIfCancelled(run);
      this._log(`[countdown] ${remaining}...`);
      this.emit("countdown", remaining);
      await run.sleep(1000, run.controller.signal);
    }
  }

  private async _typeAll(run: RunContext): Promise<void> {
    const { text, timing, typos, controller } = run;
    const total = text.length;
    let prev: string | undefined;
    let lastFocusCheck = -this._focusCheckInterval;
    let i = 0;

    while (i < total) {
      if (this._focusGuard && i - lastFocusCheck >= this._focusCheckInterval) {
        lastFocusCheck = i;
        const focused = await this._focusGuard.check(i);
        this._throwIfCancelled(run);
        if (!focused && this._state === EngineState.TYPING) {
          this._log(`[focus lost at ${i}]`);
          this.pause();
        }
      }

      await this._gate.wait();
      this._throwIfCancelled(run);
      run.cursor = i;

      const char = text[i];
      const next = i + 1 < total ? text[i + 1] : undefined;
      const { delayMs, breakdown } = timing.calculateDelay(char, prev, i, total);
      const { actions, consumedTwo } = typos.processChar(char, prev, next);

      await run.sleep(delayMs, controller.signal);
      for (const action of actions) {
        this._throwIfCancelled(run);
        await this._perform(run, action, delayMs, breakdown);
      }
      this._throwIfCancelled(run);

      run.samples.push({ char, delayMs, breakdown });
      this.emit("progress", i + 1, total);
      prev = char;

      if (consumedTwo && next !== undefined) {
        // The swapped follower was typed with this character; time it anyway.
        const follow = timing.calculateDelay(next, char, i + 1, total);
        run.samples.push({ char: next, delayMs: follow.delayMs, breakdown: follow.breakdown });
        prev = next;
        i += 2;
      } else {
        i += 1;
      }
    }

    this._throwIfCancelled(run);
    const elapsed = this._clock() - run.startedAt;
    const stats = buildRunStats(run.samples, typos.stats, elapsed);
    // A pause accepted during the last character has nothing left to hold.
    this._gate.open();
    this._setState(EngineState.DONE);
    this._log(`[done] ${stats.totalTimeSec}s, ${stats.totalChars} chars`);
    this.emit("complete", stats);
  }

  private async _perform(
    run: RunContext,
    action: Action,
    delayMs: number,
    breakdown: DelayBreakdown,
  ): Promise<void> {
    switch (action.kind) {
      case "type":
        await run.sink.emitChar(action.char);
        break;
      case "backspace":
        await run.sink.emitBackspace(action.count);
        break;
      case "pause":
        await run.sleep(action.durationMs, run.controller.signal);
        break;
    }
    this._throwIfCancelled(run);
    this._log(formatActionLine(action, this._clock() - run.startedAt, delayMs, breakdown));
  }

  private _fail(run: RunContext, err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this._log(`[error] ${error.message}`);
    if (!this.emit("error", error)) {
      console.error("TypingEngine: run failed", error);
    }
    if (this._run === run && this._state !== EngineState.IDLE) {
      this._gate.open();
      this._setState(EngineState.IDLE);
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────────

  private _throwIfCancelled(run: RunContext): void {
    if (run.controller.signal.aborted) throw new RunCancelledError();
  }

  private _setState(next: EngineState): void {
    const previous = this._state;
    if (previous === next || !canTransition(previous, next)) return;
    this._state = next;
    this.emit("stateChange", next, previous);
  }

  private _log(message: string): void {
    this._logLines.push(message);
    this.emit("log", message);
  }
}
