/** Why a character is being typed. */
export type TypeLabel =
  | "normal"
  | "typo"
  | "transposed"
  | "double-strike"
  | "correction";

/** Why the typist stops for a moment inside a correction. */
export type PauseLabel = "recognition" | "retype-prep";

/** Press the key(s) that produce `char`. */
export interface TypeAction {
  readonly kind: "type";
  readonly char: string;
  readonly label: TypeLabel;
  /** The character that should have been typed, for mistaken keystrokes. */
  readonly intended?: string;
}

/** Delete `count` characters before the caret. */
export interface BackspaceAction {
  readonly kind: "backspace";
  readonly count: number;
}

/** Hold still for `durationMs`. */
export interface PauseAction {
  readonly kind: "pause";
  readonly durationMs: number;
  readonly label: PauseLabel;
}

/** A single step the engine executes, in the order the typo model produced it. */
export type Action = TypeAction | BackspaceAction | PauseAction;

export function typeAction(
  char: string,
  label: TypeLabel = "normal",
  intended?: string,
): TypeAction {
  return intended === undefined
    ? { kind: "type", char, label }
    : { kind: "type", char, label, intended };
}

export function backspaceAction(count: number): BackspaceAction {
  return { kind: "backspace", count };
}

export function pauseAction(durationMs: number, label: PauseLabel): PauseAction {
  return { kind: "pause", durationMs, label };
}
