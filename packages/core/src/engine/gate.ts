import { RunCancelledError } from "../errors.js";

/** Sleep function signature. Rejects with RunCancelledError once `signal` aborts. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-backed sleep that can be cut short.
 *
 * An already-aborted signal rejects immediately; an abort during the wait
 * clears the timer and rejects.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Sleep used by dry runs: returns at once, unless the run was stopped. */
export const noSleep: SleepFn = async (_ms, signal) => {
  if (signal?.aborted) throw new RunCancelledError();
};

/**
 * Pause gate for the typing loop.
 *
 * While open, `wait()` settles straight away. `close()` makes every later
 * `wait()` block until `open()` is called. Opening an open gate, or closing
 * a closed one, does nothing.
 */
export class PauseGate {
  private _pending: Promise<void> | null = null;
  private _release: (() => void) | null = null;

  get isOpen(): boolean {
    return this._pending === null;
  }

  close(): void {
    if (this._pending) return;
    this._pending = new Promise<void>((resolve) => {
      this._release = () => resolve();
    });
  }

  open(): void {
    const release = this._release;
    this._pending = null;
    this._release = null;
    release?.();
  }

  wait(): Promise<void> {
    return this._pending ?? Promise.resolve();
  }
}
