/**
 * Base error for all typing-related failures.
 */
export class TypingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TypingError";
  }
}

/**
 * Thrown by a keyboard driver or emission sink when a key could not be sent.
 */
export class EmissionError extends TypingError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super(
      `Failed to emit key ${JSON.stringify(key)}`,
      cause instanceof Error ? { cause } : undefined,
    );
    this.name = "EmissionError";
    this.key = key;
  }
}

/**
 * Raised inside a run when `stop()` aborts a sleep. The engine treats it
 * as a normal end of the run, never as a failure.
 */
export class RunCancelledError extends TypingError {
  constructor() {
    super("Typing run cancelled");
    this.name = "RunCancelledError";
  }
}
