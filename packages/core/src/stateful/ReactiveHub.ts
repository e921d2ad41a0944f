import type { HubOptions } from "../options/schemas.js";
import { RetainingHub } from "./RetainingHub.js";

/**
 * Hub whose broadcast value is computed by `produce` at notify time.
 */
export class ReactiveHub<T> extends RetainingHub<T> {
  #produce: () => T;
  #last: { value: T } | null = null;

  constructor(produce: () => T, options: HubOptions = {}) {
    super("reactive-hub", options);
    this.#produce = produce;
  }

  /**
   * The last broadcast value. Before the first `notify`, the initial value: `produce()` runs on
   * the first read and its result is kept, without being broadcast, until something is notified.
   */
  state(): T {
    this.assertOpen("read state");
    this.#last ??= { value: this.#produce() };
    return this.#last.value;
  }

  /**
   * Broadcasts `produce()`, or the given value, and returns what was broadcast.
   */
  notify(...args: [] | [value: T]): T {
    this.assertOpen("notify");
    const value = args.length === 0 ? this.#produce() : args[0];
    this.#last = { value };
    this.hub.notify(value);
    return value;
  }

  protected release(): void {
    this.#last = null;
  }
}

export const createReactiveHub = <T>(produce: () => T, options?: HubOptions): ReactiveHub<T> =>
  new ReactiveHub<T>(produce, options);
