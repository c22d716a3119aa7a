import { describe, it, expect, vi, afterEach } from "vitest";
import {
  RecordingKeyboardDriver,
  createEngineConfig,
  createInstantSleep,
  createManualSleep,
  createScriptedRandom,
  type ManualSleep,
} from "@humantype/test-utils";
import { EngineState } from "../engine/state.js";
import { TypingEngine, type TypingEngineOptions } from "../engine/engine.js";
import type { EngineConfigInput } from "../engine/config.js";
import type { FocusGuard } from "../engine/focus.js";
import type { RunStats } from "../engine/stats.js";
import { createSeededRandom } from "../random/source.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Let every pending promise callback run. */
const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

/** Release sleeps until the run stops asking for more. */
async function drain(manual: ManualSleep): Promise<void> {
  await flush();
  while (manual.pending > 0) {
    manual.releaseAll();
    await flush();
  }
}

function createEngine(config: EngineConfigInput = {}, options: Partial<TypingEngineOptions> = {}) {
  const driver = new RecordingKeyboardDriver();
  const instant = createInstantSleep();
  const states: EngineState[] = [];
  const progress: Array<[number, number]> = [];
  const completed: RunStats[] = [];
  const engine = new TypingEngine({
    driver,
    sleep: instant.sleep,
    random: createScriptedRandom(),
    clock: () => 0,
    config: createEngineConfig(config),
    callbacks: {
      onStateChange: (state) => states.push(state),
      onProgress: (current, total) => progress.push([current, total]),
      onComplete: (stats) => completed.push(stats),
    },
    ...options,
  });
  return { engine, driver, sleeps: instant.calls, states, progress, completed };
}

describe("TypingEngine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ─── Full runs ───────────────────────────────────────────────────────────

  describe("a clean run", () => {
    it("types each character once and completes", async () => {
      const { engine, driver, sleeps, states, progress, completed } = createEngine();

      expect(engine.start("ab")).toBe(true);
      expect(engine.state).toBe(EngineState.TYPING);
      await engine.whenSettled();

      expect(driver.keys("char")).toEqual(["a", "b"]);
      expect(sleeps).toEqual([50, 50]);
      expect(progress).toEqual([
        [1, 2],
        [2, 2],
      ]);
      expect(states).toEqual([EngineState.TYPING, EngineState.DONE]);
      expect(engine.state).toBe(EngineState.DONE);

      expect(completed).toHaveLength(1);
      expect(completed[0].totalChars).toBe(2);
      expect(completed[0].typoStats.typos).toBe(0);
      expect(engine.samples.map((s) => s.char)).toEqual(["a", "b"]);
    });

    it("logs each keystroke with its breakdown", async () => {
      const { engine } = createEngine();
      engine.start("a ");
      await engine.whenSettled();
      expect(engine.logLines).toEqual([
        "[000.000] 'a' normal (50ms) [base:50]",
        "[000.000] '␣' normal (50ms) [base:50]",
        "[done] 0s, 2 chars",
      ]);
    });

    it("completes an empty text at once", async () => {
      const { engine, driver, completed } = createEngine();
      engine.start("");
      await engine.whenSettled();
      expect(engine.state).toBe(EngineState.DONE);
      expect(driver.events).toEqual([]);
      expect(completed[0].totalChars).toBe(0);
    });

    it("executes a revised typo through the sink", async () => {
      // typo check, class choice, neighbor w of [q, w, s, z]; revision uses the fallback
      const random = createScriptedRandom({ uniforms: [0, 0, 0.3] });
      const { engine, driver, sleeps } = createEngine(
        { typo: { typoProbabilityBp: 10_000, revisionProbabilityPct: 100 } },
        { random },
      );
      engine.start("a");
      await engine.whenSettled();

      expect(driver.keys("char")).toEqual(["w", "a"]);
      expect(driver.keys("down")).toEqual(["Backspace"]);
      expect(driver.text).toBe("a");
      expect(sleeps).toEqual([50, 200, 100]);
      expect(engine.typoStats).toMatchObject({ typos: 1, adjacent: 1, revised: 1 });
      expect(engine.logLines).toEqual([
        "[000.000] 'w' typo for 'a' (50ms)",
        "[000.000] recognition (200ms)",
        "[000.000] backspace x1",
        "[000.000] retype-prep (100ms)",
        "[000.000] 'a' correction (50ms) [base:50]",
        "[done] 0s, 1 chars",
      ]);
    });

    it("records a sample for both characters of a transposition", async () => {
      const random = createScriptedRandom({ uniforms: [0, 0] });
      const { engine, driver, progress } = createEngine(
        {
          typo: {
            typoProbabilityBp: 5_000,
            revisionProbabilityPct: 100,
            adjacentEnabled: false,
            transpositionEnabled: true,
          },
        },
        { random },
      );
      engine.start("abc");
      await engine.whenSettled();

      expect(driver.keys("char")).toEqual(["b", "a", "a", "b", "c"]);
      expect(driver.text).toBe("abc");
      expect(engine.samples.map((s) => s.char)).toEqual(["a", "b", "c"]);
      expect(progress).toEqual([
        [1, 3],
        [3, 3],
      ]);
    });
  });

  // ─── Countdown ───────────────────────────────────────────────────────────

  describe("countdown", () => {
    it("counts down before typing", async () => {
      const counts: number[] = [];
      const { engine, sleeps, states } = createEngine({ countdownSeconds: 2 });
      engine.on("countdown", (n) => counts.push(n));

      engine.start("a");
      expect(engine.state).toBe(EngineState.COUNTDOWN);
      await engine.whenSettled();

      expect(counts).toEqual([2, 1]);
      expect(sleeps).toEqual([1000, 1000, 50]);
      expect(states).toEqual([EngineState.COUNTDOWN, EngineState.TYPING, EngineState.DONE]);
      expect(engine.logLines.slice(0, 2)).toEqual(["[countdown] 2...", "[countdown] 1..."]);
    });

    it("can be stopped during the countdown", async () => {
      const manual = createManualSleep();
      const { engine, driver, states } = createEngine(
        { countdownSeconds: 3 },
        { sleep: manual.sleep },
      );
      engine.start("abc");
      await flush();
      expect(engine.stop()).toBe(true);
      await engine.whenSettled();

      expect(driver.events).toEqual([]);
      expect(states).toEqual([EngineState.COUNTDOWN, EngineState.IDLE]);
    });
  });

  // ─── Pause / resume / stop ───────────────────────────────────────────────

  describe("controls", () => {
    it("pauses at the next character and resumes where it left off", async () => {
      const manual = createManualSleep();
      const { engine, driver, states } = createEngine({}, { sleep: manual.sleep });

      engine.start("abc");
      await flush();
      expect(manual.pending).toBe(1);

      expect(engine.pause()).toBe(true);
      expect(engine.state).toBe(EngineState.PAUSED);
      manual.releaseAll();
      await flush();

      // "a" was already under way; nothing more until resume.
      expect(driver.keys("char")).toEqual(["a"]);
      expect(manual.pending).toBe(0);
      expect(engine.cursor).toBe(0);

      expect(engine.resume()).toBe(true);
      await drain(manual);

      expect(driver.text).toBe("abc");
      expect(states).toEqual([
        EngineState.TYPING,
        EngineState.PAUSED,
        EngineState.TYPING,
        EngineState.DONE,
      ]);
      expect(engine.logLines).toContain("[paused]");
      expect(engine.logLines).toContain("[resumed]");
    });

    it("toggles between typing and paused", async () => {
      const manual = createManualSleep();
      const { engine } = createEngine({}, { sleep: manual.sleep });
      expect(engine.toggle()).toBe(false);

      engine.start("ab");
      expect(engine.toggle()).toBe(true);
      expect(engine.state).toBe(EngineState.PAUSED);
      expect(engine.toggle()).toBe(true);
      expect(engine.state).toBe(EngineState.TYPING);

      await drain(manual);
      expect(engine.state).toBe(EngineState.DONE);
    });

    it("stops without further keystrokes, progress or completion", async () => {
      const manual = createManualSleep();
      const { engine, driver, progress, completed, states } = createEngine(
        {},
        { sleep: manual.sleep },
      );

      engine.start("abc");
      await flush();
      expect(engine.stop()).toBe(true);
      expect(engine.state).toBe(EngineState.IDLE);
      await engine.whenSettled();
      await flush();

      expect(driver.events).toEqual([]);
      expect(progress).toEqual([]);
      expect(completed).toEqual([]);
      expect(states).toEqual([EngineState.TYPING, EngineState.IDLE]);
      expect(engine.logLines.at(-1)).toBe("[stopped]");
    });

    it("stops a paused run", async () => {
      const manual = createManualSleep();
      const { engine, driver } = createEngine({}, { sleep: manual.sleep });
      engine.start("abc");
      engine.pause();
      expect(engine.stop()).toBe(true);
      await engine.whenSettled();
      expect(engine.state).toBe(EngineState.IDLE);
      expect(driver.events).toEqual([]);
    });

    it("lets only the newest run type after a restart", async () => {
      const manual = createManualSleep();
      const { engine, driver } = createEngine({}, { sleep: manual.sleep });

      engine.start("abc");
      await flush();
      engine.stop();
      expect(engine.start("xy")).toBe(true);
      await drain(manual);

      expect(driver.text).toBe("xy");
      expect(engine.state).toBe(EngineState.DONE);
    });

    it("finishes when paused during the last character", async () => {
      const { engine, states, completed } = createEngine({ dryRun: true });
      engine.on("progress", (current, total) => {
        if (current === total) engine.pause();
      });

      engine.start("ab");
      await engine.whenSettled();

      expect(states).toEqual([EngineState.TYPING, EngineState.PAUSED, EngineState.DONE]);
      expect(engine.state).toBe(EngineState.DONE);
      expect(engine.isActive).toBe(false);
      expect(completed).toHaveLength(1);
      expect(engine.resume()).toBe(false);
      expect(engine.start("c")).toBe(false);
      expect(engine.stop()).toBe(true);
      expect(engine.start("c")).toBe(true);
    });

    it("returns from DONE to IDLE on stop", async () => {
      const { engine, driver } = createEngine();
      engine.start("a");
      await engine.whenSettled();

      expect(engine.stop()).toBe(true);
      expect(engine.state).toBe(EngineState.IDLE);
      expect(engine.start("b")).toBe(true);
      await engine.whenSettled();
      expect(driver.text).toBe("ab");
    });

    it("ignores control calls that do not fit the state", async () => {
      const manual = createManualSleep();
      const { engine, states } = createEngine({}, { sleep: manual.sleep });

      expect(engine.pause()).toBe(false);
      expect(engine.resume()).toBe(false);
      expect(engine.stop()).toBe(false);

      engine.start("ab");
      expect(engine.start("cd")).toBe(false);
      expect(engine.resume()).toBe(false);
      expect(engine.updateConfig({ dryRun: true })).toBe(false);
      expect(engine.config.dryRun).toBe(false);

      await drain(manual);
      expect(engine.pause()).toBe(false);
      expect(states).toEqual([EngineState.TYPING, EngineState.DONE]);
    });
  });

  // ─── Configuration ───────────────────────────────────────────────────────

  describe("configuration", () => {
    it("updates the config while idle", () => {
      const { engine } = createEngine();
      expect(engine.updateConfig({ countdownSeconds: 5, timing: { baseDelayMs: 90 } })).toBe(true);
      expect(engine.config.countdownSeconds).toBe(5);
      expect(engine.config.timing.baseDelayMs).toBe(90);
      expect(engine.config.timing.wordBoundaryEnabled).toBe(false);
    });

    it("refuses a real run without a keyboard driver", () => {
      const engine = new TypingEngine({ config: createEngineConfig() });
      expect(engine.start("a")).toBe(false);
      expect(engine.state).toBe(EngineState.IDLE);
      expect(engine.logLines).toEqual(["[error] no keyboard driver configured"]);
    });

    it("normalizes invalid values instead of rejecting them", () => {
      const engine = new TypingEngine({
        config: { countdownSeconds: -3, typo: { typoProbabilityBp: 99_999 } },
      });
      expect(engine.config.countdownSeconds).toBe(0);
      expect(engine.config.typo.typoProbabilityBp).toBe(10_000);
    });
  });

  // ─── Dry run ─────────────────────────────────────────────────────────────

  describe("dry run", () => {
    it("computes every sample without emitting or sleeping", async () => {
      const text = "The quick brown fox, tired: jumps!\nOver the lazy dog. ".repeat(4).slice(0, 200);
      const { engine, driver, sleeps, completed } = createEngine(
        {
          dryRun: true,
          countdownSeconds: 3,
          typo: {
            typoProbabilityBp: 2_000,
            revisionProbabilityPct: 50,
            transpositionEnabled: true,
            doubleStrikeEnabled: true,
          },
        },
        { random: createSeededRandom(7), driver: undefined },
      );

      const startedAt = performance.now();
      expect(engine.start(text)).toBe(true);
      expect(engine.state).toBe(EngineState.TYPING);
      await engine.whenSettled();

      expect(performance.now() - startedAt).toBeLessThan(1000);
      expect(driver.events).toEqual([]);
      expect(sleeps).toEqual([]);
      expect(engine.samples).toHaveLength(200);
      expect(completed[0].totalChars).toBe(200);
      expect(engine.state).toBe(EngineState.DONE);
    });

    it("completes a long text", async () => {
      const { engine, completed } = createEngine({ dryRun: true });
      engine.start("a".repeat(200_000));
      await engine.whenSettled();

      expect(engine.state).toBe(EngineState.DONE);
      expect(completed).toHaveLength(1);
      expect(completed[0].totalChars).toBe(200_000);
    }, 30_000);
  });

  // ─── Emission failures ───────────────────────────────────────────────────

  describe("emission failures", () => {
    it("falls back to simple emission in precise mode and logs it", async () => {
      const { engine, driver } = createEngine({ emissionMode: "precise" });
      driver.failOn = (e) => e.type === "down" && e.key === "Shift";

      engine.start("Hi");
      await engine.whenSettled();

      expect(driver.text).toBe("Hi");
      expect(driver.keys("char")).toEqual(["H"]);
      expect(engine.state).toBe(EngineState.DONE);
      expect(
        engine.logLines.filter((line) => line.startsWith("[fallback]")),
      ).toEqual([`[fallback] 'H' sent as text: Failed to emit key "Shift"`]);
    });

    it("stops during a Shift hold without falling back", async () => {
      const manual = createManualSleep();
      const { engine, driver, progress } = createEngine(
        { emissionMode: "precise" },
        { sleep: manual.sleep },
      );

      engine.start("A");
      await flush();
      manual.releaseAll(); // keystroke delay
      await flush();
      expect(driver.events).toEqual([{ type: "down", key: "Shift" }]);
      expect(manual.pending).toBe(1);

      engine.stop();
      await engine.whenSettled();

      expect(driver.events).toEqual([
        { type: "down", key: "Shift" },
        { type: "up", key: "Shift" },
      ]);
      expect(progress).toEqual([]);
      expect(engine.logLines).toEqual(["[stopped]"]);
      expect(engine.state).toBe(EngineState.IDLE);
    });

    it("ends the run when the driver fails in simple mode", async () => {
      const errors: Error[] = [];
      const { engine, driver, progress, completed } = createEngine();
      engine.on("error", (err) => errors.push(err));
      driver.failOn = (e) => e.key === "b";

      engine.start("abc");
      await engine.whenSettled();

      expect(engine.state).toBe(EngineState.IDLE);
      expect(driver.text).toBe("a");
      expect(errors.map((e) => e.message)).toEqual(['Failed to emit key "b"']);
      expect(engine.logLines.at(-1)).toBe('[error] Failed to emit key "b"');
      expect(progress).toEqual([[1, 3]]);
      expect(completed).toEqual([]);
    });

    it("keeps typing when a listener throws", async () => {
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const { engine, driver } = createEngine();
      engine.on("progress", () => {
        throw new Error("listener bug");
      });

      engine.start("ab");
      await engine.whenSettled();

      expect(driver.text).toBe("ab");
      expect(engine.state).toBe(EngineState.DONE);
      expect(errorSpy).toHaveBeenCalledTimes(2);
    });
  });

  // ─── Focus guard ─────────────────────────────────────────────────────────

  describe("focus guard", () => {
    it("pauses itself when focus is lost and continues after resume", async () => {
      const guard = {
        capture: vi.fn(),
        check: vi.fn((index: number) => index < 10),
      } satisfies FocusGuard;
      const { engine, driver } = createEngine({}, { focusGuard: guard, focusCheckInterval: 10 });

      engine.start("abcdefghijklmno");
      await flush();

      expect(guard.capture).toHaveBeenCalledTimes(1);
      expect(guard.check.mock.calls.map(([i]) => i)).toEqual([0, 10]);
      expect(engine.state).toBe(EngineState.PAUSED);
      expect(driver.text).toBe("abcdefghij");
      expect(engine.logLines).toContain("[focus lost at 10]");

      engine.resume();
      await engine.whenSettled();
      expect(driver.text).toBe("abcdefghijklmno");
      expect(engine.state).toBe(EngineState.DONE);
      expect(guard.check).toHaveBeenCalledTimes(2);
    });

    it("captures after the countdown", async () => {
      const order: string[] = [];
      const guard: FocusGuard = {
        capture: () => {
          order.push("capture");
        },
        check: () => true,
      };
      const { engine } = createEngine(
        { countdownSeconds: 1 },
        { focusGuard: guard },
      );
      engine.on("countdown", (n) => order.push(`countdown ${n}`));
      engine.start("a");
      await engine.whenSettled();
      expect(order).toEqual(["countdown 1", "capture"]);
    });
  });
});
