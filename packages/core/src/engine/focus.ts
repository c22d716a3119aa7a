/**
 * Decides whether the target window still has focus. The engine calls
 * `capture()` once the countdown ends and `check()` every few characters;
 * a `false` from `check()` makes the engine pause itself.
 */
export interface FocusGuard {
  capture(): void | Promise<void>;
  check(index: number): boolean | Promise<boolean>;
}

/** Reports an opaque identity for whatever window currently has focus. */
export interface WindowIdentityProvider {
  currentIdentity(): string | Promise<string>;
}

/**
 * Focus guard that compares window identities.
 *
 * The identity seen at `capture()` is the reference. An empty identity on
 * either side means "unknown", which counts as focus kept; so does a
 * provider failure, which is logged.
 */
export class IntervalFocusGuard implements FocusGuard {
  private _captured = "";

  constructor(private readonly provider: WindowIdentityProvider) {}

  /** Identity recorded by the last `capture()`, empty if none. */
  get capturedIdentity(): string {
    return this._captured;
  }

  async capture(): Promise<void> {
    this._captured = (await this.read()) ?? "";
  }

  async check(_index: number): Promise<boolean> {
    if (!this._captured) return true;
    const current = await this.read();
    if (!current) return true;
    return current === this._captured;
  }

  private async read(): Promise<string | undefined> {
    try {
      return await this.provider.currentIdentity();
    } catch (err) {
      console.error("IntervalFocusGuard: window identity unavailable", err);
      return undefined;
    }
  }
}
