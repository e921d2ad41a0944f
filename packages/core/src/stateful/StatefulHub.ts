import { closedHubError } from "../hub/errors.js";
import type { HubOptions } from "../options/schemas.js";
import { RetainingHub } from "./RetainingHub.js";

/**
 * Hub that remembers the last notified value, starting from `initial`.
 */
export class StatefulHub<T> extends RetainingHub<T> {
  #current: { value: T } | null;

  constructor(initial: T, options: HubOptions = {}) {
    super("stateful-hub", options);
    this.#current = { value: initial };
  }

  state(): T {
    if (!this.#current) throw closedHubError(this.name, "read state");
    return this.#current.value;
  }

  notify(value: T): void {
    this.assertOpen("notify");
    this.#current = { value };
    this.hub.notify(value);
  }

  protected release(): void {
    this.#current = null;
  }
}

export const createStatefulHub = <T>(initial: T, options?: HubOptions): StatefulHub<T> =>
  new StatefulHub<T>(initial, options);
