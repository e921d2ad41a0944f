import type { HubOptions } from "../options/schemas.js";
import { HubCore } from "./HubCore.js";
import { HubFacade } from "./HubFacade.js";
import type { Callback, SubscribeOptions, Unsubscribe } from "./types.js";

/**
 * Stateless hub: every notification reaches every current subscriber.
 *
 * The stateful, reactive and filtered hubs are built on this class through
 * its public surface only.
 */
export class Hub<T> extends HubFacade {
  #core: HubCore<T>;

  constructor(options: HubOptions = {}) {
    const core = new HubCore<T>({ kind: "hub", options });
    super(core);
    this.#core = core;
  }

  subscribe(callback: Callback<T>, options: SubscribeOptions = {}): Unsubscribe {
    return this.#core.subscribe(callback, options);
  }

  /**
   * Calls every subscriber registered when the call starts, then returns.
   * A throwing subscriber is reported through `onCallbackError` and does not stop the others.
   */
  notify(value: T): void {
    this.#core.dispatch(this.#core.ids(), value);
  }
}

export const createHub = <T>(options?: HubOptions): Hub<T> => new Hub<T>(options);
