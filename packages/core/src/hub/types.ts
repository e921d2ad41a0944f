export type SubscriptionId = number;

/**
 * Subscriber. An async callback may be passed; a rejection of its promise is reported
 * through `onCallbackError` like a throw.
 */
export type Callback<T> = (value: T) => void;

export type Unsubscribe = () => void;

export type SubscribeOptions = {
  /**
   * Unsubscribes automatically when the signal aborts.
   * An already-aborted signal registers nothing.
   */
  signal?: AbortSignal;
};

export type CallbackErrorInfo = {
  hub: string;
  /**
   * `null` when the failing call was the current-state replay of a subscribe,
   * which runs before an id is allocated.
   */
  id: SubscriptionId | null;
  error: unknown;
};

export type CallbackErrorHandler = (info: CallbackErrorInfo) => void;

export type SubscriptionEvent = { id: SubscriptionId };

export type HubEvents = {
  subscribed: [event: SubscriptionEvent];
  unsubscribed: [event: SubscriptionEvent];
  closed: [];
};

export type HubEventName = keyof HubEvents;

export type HubEventListener<E extends HubEventName> = (...args: HubEvents[E]) => void;

export type HubEventSource = {
  on<E extends HubEventName>(event: E, listener: HubEventListener<E>): void;
  once<E extends HubEventName>(event: E, listener: HubEventListener<E>): void;
  off<E extends HubEventName>(event: E, listener: HubEventListener<E>): void;
};

/**
 * Surface shared by every hub variant, whatever its subscribe/notify signature.
 */
export type HubHandle = {
  readonly name: string;
  readonly events: HubEventSource;
  readonly closed: boolean;
  readonly size: number;
  unsubscribe(id: SubscriptionId): boolean;
  close(): void;
};
