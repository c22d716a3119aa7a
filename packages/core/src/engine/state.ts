/**
 * Lifecycle of a typing engine.
 *
 * ```
 * IDLE → COUNTDOWN → TYPING ⇄ PAUSED
 *                      TYPING | PAUSED → DONE
 * COUNTDOWN | TYPING | PAUSED | DONE → IDLE   (stop)
 * ```
 */
export enum EngineState {
  IDLE = "IDLE",
  COUNTDOWN = "COUNTDOWN",
  TYPING = "TYPING",
  PAUSED = "PAUSED",
  DONE = "DONE",
}

/** Allowed edges of the engine state machine. */
export const ENGINE_TRANSITIONS: Record<EngineState, readonly EngineState[]> = {
  [EngineState.IDLE]: [EngineState.COUNTDOWN, EngineState.TYPING],
  [EngineState.COUNTDOWN]: [EngineState.TYPING, EngineState.IDLE],
  [EngineState.TYPING]: [EngineState.PAUSED, EngineState.DONE, EngineState.IDLE],
  [EngineState.PAUSED]: [EngineState.TYPING, EngineState.DONE, EngineState.IDLE],
  [EngineState.DONE]: [EngineState.IDLE],
};

/** States in which a run is in progress. */
export const ACTIVE_STATES: ReadonlySet<EngineState> = new Set([
  EngineState.COUNTDOWN,
  EngineState.TYPING,
  EngineState.PAUSED,
]);

export function canTransition(from: EngineState, to: EngineState): boolean {
  return ENGINE_TRANSITIONS[from].includes(to);
}
