import type { Callback, SubscriptionId } from "../hub/types.js";
import { invokeIsolated } from "../utils/invokeIsolated.js";

export type RegistryErrorHandler = (info: { id: SubscriptionId; error: unknown }) => void;

export type CallbackRegistryOptions = {
  onCallbackError?: RegistryErrorHandler;
};

/**
 * Id -> callback table behind every hub.
 *
 * Ids start at 1 and grow by one per `add`; they are never handed out twice,
 * not even after `clear()`.
 */
export class CallbackRegistry<T> {
  #callbacks = new Map<SubscriptionId, Callback<T>>();
  #lastId = 0;
  #onCallbackError: RegistryErrorHandler;

  constructor({ onCallbackError }: CallbackRegistryOptions = {}) {
    this.#onCallbackError = onCallbackError ?? (() => {});
  }

  get size(): number {
    return this.#callbacks.size;
  }

  add(callback: Callback<T>): SubscriptionId {
    this.#lastId += 1;
    this.#callbacks.set(this.#lastId, callback);
    return this.#lastId;
  }

  remove(id: SubscriptionId): boolean {
    return this.#callbacks.delete(id);
  }

  has(id: SubscriptionId): boolean {
    return this.#callbacks.has(id);
  }

  /**
   * Live ids in allocation order.
   */
  ids(): SubscriptionId[] {
    return Array.from(this.#callbacks.keys());
  }

  /**
   * Calls every callback still registered under one of `ids`, returning how many ran.
   *
   * `ids` is copied first, so callbacks may add or remove entries while this runs:
   * an id removed before it is reached is skipped, an id added meanwhile is not called.
   * A callback that returns a rejecting promise is reported once the rejection lands.
   */
  invokeAll(ids: Iterable<SubscriptionId>, value: T): number {
    const snapshot = Array.from(ids);
    let invoked = 0;

    for (const id of snapshot) {
      const callback = this.#callbacks.get(id);
      if (!callback) continue;

      invoked += 1;
      invokeIsolated(() => callback(value), (error) => this.#onCallbackError({ id, error }));
    }

    return invoked;
  }

  clear(): void {
    this.#callbacks.clear();
  }
}
