import { RunCancelledError, type SleepFn } from "@humantype/core";

/** A sleep that returns immediately and remembers what it was asked for. */
export interface InstantSleep {
  readonly sleep: SleepFn;
  /** Every requested duration, in call order. */
  readonly calls: number[];
}

/**
 * Instant replacement for the engine's sleep. Still honors the abort
 * signal, so `stop()` behaves as it would with real timers.
 */
export function createInstantSleep(): InstantSleep {
  const calls: number[] = [];
  const sleep: SleepFn = async (ms, signal) => {
    calls.push(ms);
    if (signal?.aborted) throw new RunCancelledError();
  };
  return { sleep, calls };
}

/**
 * A sleep that blocks until the test releases it, for observing an engine
 * mid-run. `pending` counts sleeps currently waiting.
 */
export interface ManualSleep {
  readonly sleep: SleepFn;
  readonly pending: number;
  /** Let every waiting sleep finish. */
  releaseAll(): void;
}

export function createManualSleep(): ManualSleep {
  let waiting: Array<() => void> = [];

  const sleep: SleepFn = (_ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new RunCancelledError());
        return;
      }
      const onAbort = () => reject(new RunCancelledError());
      signal?.addEventListener("abort", onAbort, { once: true });
      waiting.push(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      });
    });

  return {
    sleep,
    get pending() {
      return waiting.length;
    },
    releaseAll() {
      const release = waiting;
      waiting = [];
      for (const fn of release) fn();
    },
  };
}
