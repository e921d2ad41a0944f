import { Hub } from "../hub/Hub.js";
import { HubFacade } from "../hub/HubFacade.js";
import type { Callback, SubscribeOptions, Unsubscribe } from "../hub/types.js";
import type { HubOptions } from "../options/schemas.js";

/**
 * What a filtered layer passes to the hub below it: the topics of one dimension
 * together with the value, or with the envelope of the next dimension.
 */
export type Envelope<K, T> = readonly [topics: readonly K[], value: T];

const filterBy = <K, T>(topics: readonly K[], callback: Callback<T>): Callback<Envelope<K, T>> => {
  const wanted = new Set(topics);
  return ([notified, value]) => {
    if (notified.some((topic) => wanted.has(topic))) callback(value);
  };
};

/**
 * Topic filtering for topics of any type, compared with SameValueZero (objects,
 * functions and hubs by identity). There is no wildcard and no index: every
 * subscriber tests every notification, so notify is linear in the subscriber count.
 */
export class FilteredHub<T, K> extends HubFacade {
  #hub: Hub<Envelope<K, T>>;

  constructor(hub: Hub<Envelope<K, T>>) {
    super(hub);
    this.#hub = hub;
  }

  subscribe(topics: readonly K[], callback: Callback<T>, options?: SubscribeOptions): Unsubscribe {
    return this.#hub.subscribe(filterBy(topics, callback), options);
  }

  notify(topics: readonly K[], value: T): void {
    this.#hub.notify([topics, value]);
  }
}

export class FilteredHub2<T, K1, K2> extends HubFacade {
  #inner: FilteredHub<Envelope<K2, T>, K1>;

  constructor(inner: FilteredHub<Envelope<K2, T>, K1>) {
    super(inner);
    this.#inner = inner;
  }

  subscribe(
    topics1: readonly K1[],
    topics2: readonly K2[],
    callback: Callback<T>,
    options?: SubscribeOptions,
  ): Unsubscribe {
    return this.#inner.subscribe(topics1, filterBy(topics2, callback), options);
  }

  notify(topics1: readonly K1[], topics2: readonly K2[], value: T): void {
    this.#inner.notify(topics1, [topics2, value]);
  }
}

export class FilteredHub3<T, K1, K2, K3> extends HubFacade {
  #inner: FilteredHub2<Envelope<K3, T>, K1, K2>;

  constructor(inner: FilteredHub2<Envelope<K3, T>, K1, K2>) {
    super(inner);
    this.#inner = inner;
  }

  subscribe(
    topics1: readonly K1[],
    topics2: readonly K2[],
    topics3: readonly K3[],
    callback: Callback<T>,
    options?: SubscribeOptions,
  ): Unsubscribe {
    return this.#inner.subscribe(topics1, topics2, filterBy(topics3, callback), options);
  }

  notify(topics1: readonly K1[], topics2: readonly K2[], topics3: readonly K3[], value: T): void {
    this.#inner.notify(topics1, topics2, [topics3, value]);
  }
}

export class FilteredHub4<T, K1, K2, K3, K4> extends HubFacade {
  #inner: FilteredHub3<Envelope<K4, T>, K1, K2, K3>;

  constructor(inner: FilteredHub3<Envelope<K4, T>, K1, K2, K3>) {
    super(inner);
    this.#inner = inner;
  }

  subscribe(
    topics1: readonly K1[],
    topics2: readonly K2[],
    topics3: readonly K3[],
    topics4: readonly K4[],
    callback: Callback<T>,
    options?: SubscribeOptions,
  ): Unsubscribe {
    return this.#inner.subscribe(topics1, topics2, topics3, filterBy(topics4, callback), options);
  }

  notify(topics1: readonly K1[], topics2: readonly K2[], topics3: readonly K3[], topics4: readonly K4[], value: T): void {
    this.#inner.notify(topics1, topics2, topics3, [topics4, value]);
  }
}

const withKind = (options: HubOptions = {}): HubOptions => ({ ...options, name: options.name ?? "filtered-hub" });

export const createFilteredHub = <T, K>(options?: HubOptions): FilteredHub<T, K> =>
  new FilteredHub<T, K>(new Hub<Envelope<K, T>>(withKind(options)));

export const createFilteredHub2 = <T, K1, K2>(options?: HubOptions): FilteredHub2<T, K1, K2> =>
  new FilteredHub2<T, K1, K2>(createFilteredHub<Envelope<K2, T>, K1>(options));

export const createFilteredHub3 = <T, K1, K2, K3>(options?: HubOptions): FilteredHub3<T, K1, K2, K3> =>
  new FilteredHub3<T, K1, K2, K3>(createFilteredHub2<Envelope<K3, T>, K1, K2>(options));

export const createFilteredHub4 = <T, K1, K2, K3, K4>(options?: HubOptions): FilteredHub4<T, K1, K2, K3, K4> =>
  new FilteredHub4<T, K1, K2, K3, K4>(createFilteredHub3<Envelope<K4, T>, K1, K2, K3>(options));
