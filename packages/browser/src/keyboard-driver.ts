import type { KeyInput, Keyboard } from 'puppeteer-core';
import { EmissionError, KEY_NAMES, type KeyboardDriver } from '@humantype/core';

/** The part of a puppeteer keyboard the driver needs. */
export type PageKeyboard = Pick<Keyboard, 'down' | 'up' | 'sendCharacter'>;

const PRINTABLE =
  'abcdefghijklmnopqrstuvwxyz' +
  'ABCDEFGHIJKLMNOPQRSTUVWXYZ' +
  '0123456789' +
  '`~!@#$%^&*()-_=+[{]}\\|;:\'",<.>/? ';

const NAMED_KEYS = [
  KEY_NAMES.shift,
  KEY_NAMES.backspace,
  KEY_NAMES.enter,
  KEY_NAMES.tab,
] as const satisfies readonly KeyInput[];

/** Keys the US layout of puppeteer can press by name. */
const PRESSABLE: ReadonlySet<string> = new Set<string>([...PRINTABLE, ...NAMED_KEYS]);

export function isPressableKey(key: string): key is KeyInput {
  return PRESSABLE.has(key);
}

/**
 * KeyboardDriver over a puppeteer page keyboard.
 *
 * Key presses go through `down`/`up`, which only know the US layout; any
 * other key is refused with an EmissionError so precise emission can fall
 * back to `sendCharacter`. Protocol failures are wrapped the same way.
 */
export class PageKeyboardDriver implements KeyboardDriver {
  constructor(private readonly keyboard: PageKeyboard) {}

  /** Driver for `page.keyboard`. */
  static fromPage(page: { readonly keyboard: PageKeyboard }): PageKeyboardDriver {
    return new PageKeyboardDriver(page.keyboard);
  }

  async keyDown(key: string): Promise<void> {
    const input = this.pressable(key);
    await this.send(key, () => this.keyboard.down(input));
  }

  async keyUp(key: string): Promise<void> {
    const input = this.pressable(key);
    await this.send(key, () => this.keyboard.up(input));
  }

  async sendCharacter(char: string): Promise<void> {
    await this.send(char, () => this.keyboard.sendCharacter(char));
  }

  private pressable(key: string): KeyInput {
    if (!isPressableKey(key)) {
      throw new EmissionError(key);
    }
    return key;
  }

  private async send(key: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      throw new EmissionError(key, err);
    }
  }
}
