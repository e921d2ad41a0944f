import { closedHubError, resolveCallbackErrorHandler } from "../hub/errors.js";
import { Hub } from "../hub/Hub.js";
import { HubFacade } from "../hub/HubFacade.js";
import type { Callback, CallbackErrorHandler, Unsubscribe } from "../hub/types.js";
import type { HubOptions } from "../options/schemas.js";
import { invokeIsolated } from "../utils/invokeIsolated.js";
import { createLogger } from "../utils/logger.js";
import type { StateSubscribeOptions } from "./types.js";

/**
 * A stateless hub plus a current value. Subclasses define where the value comes from.
 */
export abstract class RetainingHub<T> extends HubFacade {
  protected readonly hub: Hub<T>;
  #report: CallbackErrorHandler;

  protected constructor(kind: string, options: HubOptions = {}) {
    const hub = new Hub<T>({ ...options, name: options.name ?? kind });
    super(hub);
    this.hub = hub;
    this.#report = resolveCallbackErrorHandler(createLogger(hub.name), options.onCallbackError);
    hub.events.once("closed", () => this.release());
  }

  abstract state(): T;

  /**
   * With `notifyCurrentState`, `callback` first receives `state()`, synchronously and before
   * it is registered, so a notification racing the subscribe cannot deliver twice.
   */
  subscribe(callback: Callback<T>, options: StateSubscribeOptions = {}): Unsubscribe {
    const { notifyCurrentState = false, ...subscribeOptions } = options;
    this.assertOpen("subscribe");
    if (subscribeOptions.signal?.aborted) return () => {};

    if (notifyCurrentState) {
      const current = this.state();
      invokeIsolated(() => callback(current), (error) => this.#report({ hub: this.name, id: null, error }));
    }

    return this.hub.subscribe(callback, subscribeOptions);
  }

  /**
   * Drops the retained value once the underlying hub closed.
   */
  protected abstract release(): void;

  protected assertOpen(operation: string): void {
    if (this.hub.closed) throw closedHubError(this.name, operation);
  }
}
