/**
 * Generic, strictly-typed event emitter.
 *
 * Unlike Node's built-in EventEmitter, this provides compile-time safety
 * for event names and handler signatures. Handlers run synchronously in
 * registration order. A handler that throws is reported and skipped, so a
 * faulty listener can never break the component that emits.
 *
 * @typeParam EventMap - An interface mapping event names to handler signatures.
 *
 * @example
 * ```typescript
 * interface EngineEvents {
 *   progress: (current: number, total: number) => void;
 * }
 *
 * class Engine extends TypedEventEmitter<EngineEvents> {
 *   step(i: number, n: number) {
 *     this.emit("progress", i, n);
 *   }
 * }
 *
 * new Engine().on("progress", (i, n) => console.log(`${i}/${n}`)); // fully typed
 * ```
 */

// Handlers are stored untyped; the public generics keep call sites safe.
type AnyHandler = (...args: unknown[]) => void;

export class TypedEventEmitter<
  EventMap extends Record<string, (...args: never[]) => void>,
> {
  private readonly listeners = new Map<keyof EventMap, AnyHandler[]>();

  /**
   * Register a handler for an event. Returns an unsubscribe function.
   */
  on<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): () => void {
    const list = this.listeners.get(event) ?? [];
    list.push(handler as unknown as AnyHandler);
    this.listeners.set(event, list);
    return () => this.off(event, handler);
  }

  /**
   * Remove a previously registered handler. Unknown handlers are ignored.
   */
  off<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): void {
    const list = this.listeners.get(event);
    if (!list) return;
    const idx = list.indexOf(handler as unknown as AnyHandler);
    if (idx >= 0) list.splice(idx, 1);
  }

  /** Return the number of listeners registered for `event`. */
  listenerCount<E extends keyof EventMap & string>(event: E): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  /** Remove all listeners, optionally for a specific event only. */
  removeAllListeners<E extends keyof EventMap & string>(event?: E): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Call every handler for `event` with `args`.
   *
   * @returns `true` if any handlers were registered.
   */
  protected emit<E extends keyof EventMap & string>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): boolean {
    const list = this.listeners.get(event);
    if (!list || list.length === 0) return false;

    // Snapshot so handlers may unsubscribe while we iterate.
    for (const handler of [...list]) {
      try {
        handler(...(args as unknown[]));
      } catch (err) {
        console.error(`${this.constructor.name}: "${event}" listener threw`, err);
      }
    }
    return true;
  }
}
