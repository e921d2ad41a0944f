import type { HubEventSource, HubHandle, SubscriptionId } from "./types.js";

/**
 * Forwards the lifecycle surface of a hub to the handle it wraps, leaving
 * `subscribe`/`notify` to the concrete variant.
 */
export abstract class HubFacade implements HubHandle {
  #handle: HubHandle;

  protected constructor(handle: HubHandle) {
    this.#handle = handle;
  }

  get name(): string {
    return this.#handle.name;
  }

  get events(): HubEventSource {
    return this.#handle.events;
  }

  get closed(): boolean {
    return this.#handle.closed;
  }

  get size(): number {
    return this.#handle.size;
  }

  unsubscribe(id: SubscriptionId): boolean {
    return this.#handle.unsubscribe(id);
  }

  close(): void {
    this.#handle.close();
  }
}
