import type { Debugger } from "debug";
import { EventEmitter } from "eventemitter3";
import { type HubOptions, parseHubOptions } from "../options/schemas.js";
import { CallbackRegistry } from "../registry/CallbackRegistry.js";
import { createLogger } from "../utils/logger.js";
import { closedHubError, resolveCallbackErrorHandler } from "./errors.js";
import type {
  Callback,
  HubEventName,
  HubEvents,
  HubEventSource,
  HubHandle,
  SubscribeOptions,
  SubscriptionId,
  Unsubscribe,
} from "./types.js";

export type HubCoreOptions = {
  /**
   * Default name, used when `options.name` is absent.
   */
  kind: string;
  options?: HubOptions | undefined;
  /**
   * Runs after `id` left the registry.
   */
  onDetach?: (id: SubscriptionId) => void;
  /**
   * Runs once from `close()`, after the registry was cleared.
   */
  onClose?: () => void;
};

/**
 * Subscription bookkeeping shared by the stateless and the topic hub: id allocation,
 * unsubscribe closures, abort signals, lifecycle events and teardown.
 */
export class HubCore<T> implements HubHandle {
  readonly name: string;
  readonly events: HubEventSource;
  readonly logger: Debugger;
  #registry: CallbackRegistry<T>;
  #emitter = new EventEmitter<HubEventName>();
  #closed = false;
  #signalDetachers = new Set<() => void>();
  #onDetach: (id: SubscriptionId) => void;
  #onClose: () => void;

  constructor({ kind, options = {}, onDetach = () => {}, onClose = () => {} }: HubCoreOptions) {
    const { name, onCallbackError } = parseHubOptions(options);
    this.name = name ?? kind;
    this.logger = createLogger(this.name);
    this.#onDetach = onDetach;
    this.#onClose = onClose;

    const report = resolveCallbackErrorHandler(this.logger, onCallbackError);
    this.#registry = new CallbackRegistry<T>({
      onCallbackError: ({ id, error }) => report({ hub: this.name, id, error }),
    });

    const emitter = this.#emitter;
    this.events = {
      on: (event, listener) => {
        emitter.on(event, listener);
      },
      once: (event, listener) => {
        emitter.once(event, listener);
      },
      off: (event, listener) => {
        emitter.off(event, listener);
      },
    };
  }

  get closed(): boolean {
    return this.#closed;
  }

  get size(): number {
    return this.#registry.size;
  }

  ids(): SubscriptionId[] {
    return this.#registry.ids();
  }

  /**
   * Registers `callback` and returns its unsubscribe closure.
   * `attach` runs with the new id before the subscription is announced.
   */
  subscribe(callback: Callback<T>, options: SubscribeOptions = {}, attach?: (id: SubscriptionId) => void): Unsubscribe {
    this.assertOpen("subscribe");

    const { signal } = options;
    if (signal?.aborted) return () => {};

    const id = this.#registry.add(callback);
    attach?.(id);
    this.logger("subscribed #%d", id);
    this.#emit("subscribed", { id });

    let active = true;
    const detachSignal = () => {
      signal?.removeEventListener("abort", unsubscribe);
      this.#signalDetachers.delete(detachSignal);
    };
    const unsubscribe = () => {
      if (!active) return;
      active = false;
      detachSignal();
      if (this.#closed) return;
      this.#remove(id);
    };

    if (signal) {
      signal.addEventListener("abort", unsubscribe, { once: true });
      this.#signalDetachers.add(detachSignal);
    }
    return unsubscribe;
  }

  /**
   * Removes a subscription by id. Unknown ids are ignored; returns whether something was removed.
   */
  unsubscribe(id: SubscriptionId): boolean {
    this.assertOpen("unsubscribe");
    return this.#remove(id);
  }

  dispatch(ids: Iterable<SubscriptionId>, value: T): number {
    this.assertOpen("notify");
    const invoked = this.#registry.invokeAll(ids, value);
    this.logger("notified %d subscriber(s)", invoked);
    return invoked;
  }

  /**
   * Drops every subscription. Idempotent; unsubscribe closures handed out earlier become no-ops.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    const dropped = this.#registry.size;
    this.#registry.clear();
    // Closures stay callable after close, but no longer hang off the callers' signals.
    for (const detach of Array.from(this.#signalDetachers)) detach();
    this.#onClose();
    this.logger("closed, dropped %d subscription(s)", dropped);

    this.#emit("closed");
    this.#emitter.removeAllListeners();
  }

  assertOpen(operation: string): void {
    if (this.#closed) throw closedHubError(this.name, operation);
  }

  #remove(id: SubscriptionId): boolean {
    if (!this.#registry.remove(id)) return false;
    this.#onDetach(id);
    this.logger("unsubscribed #%d", id);
    this.#emit("unsubscribed", { id });
    return true;
  }

  #emit<E extends HubEventName>(event: E, ...args: HubEvents[E]): void {
    this.#emitter.emit(event, ...args);
  }
}
