import { EmissionError, KEY_NAMES, SHIFT_MAP, type KeyboardDriver } from "@humantype/core";

/** One call received by a {@link RecordingKeyboardDriver}. */
export type DriverEvent =
  | { readonly type: "down"; readonly key: string }
  | { readonly type: "up"; readonly key: string }
  | { readonly type: "char"; readonly key: string };

/** Base key → the character it produces with Shift held. */
const SHIFTED: ReadonlyMap<string, string> = new Map(
  [...SHIFT_MAP].map(([shifted, base]): [string, string] => [base, shifted]),
);

/**
 * Keyboard driver that records every call and can replay them into the
 * text a real input field would end up holding.
 *
 * Usage:
 * ```ts
 * const driver = new RecordingKeyboardDriver();
 * driver.failOn = (e) => e.type === "down" && e.key === "Shift";
 * ```
 */
export class RecordingKeyboardDriver implements KeyboardDriver {
  readonly events: DriverEvent[] = [];

  /** Calls for which this returns true throw an EmissionError instead. */
  failOn: ((event: DriverEvent) => boolean) | null = null;

  async keyDown(key: string): Promise<void> {
    this.record({ type: "down", key });
  }

  async keyUp(key: string): Promise<void> {
    this.record({ type: "up", key });
  }

  async sendCharacter(char: string): Promise<void> {
    this.record({ type: "char", key: char });
  }

  /** The resulting text, applying Shift, Backspace, Enter and Tab. */
  get text(): string {
    const out: string[] = [];
    let shift = false;
    for (const event of this.events) {
      if (event.type === "char") {
        out.push(event.key);
      } else if (event.key === KEY_NAMES.shift) {
        shift = event.type === "down";
      } else if (event.type === "down") {
        switch (event.key) {
          case KEY_NAMES.backspace:
            out.pop();
            break;
          case KEY_NAMES.enter:
            out.push("\n");
            break;
          case KEY_NAMES.tab:
            out.push("\t");
            break;
          default:
            out.push(shift ? (SHIFTED.get(event.key) ?? event.key) : event.key);
        }
      }
    }
    return out.join("");
  }

  /** Only the calls of one type, as their key strings. */
  keys(type: DriverEvent["type"]): string[] {
    return this.events.filter((e) => e.type === type).map((e) => e.key);
  }

  clear(): void {
    this.events.length = 0;
  }

  private record(event: DriverEvent): void {
    if (this.failOn?.(event)) {
      throw new EmissionError(event.key);
    }
    this.events.push(event);
  }
}
