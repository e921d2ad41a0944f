import { HubFacade } from "../hub/HubFacade.js";
import type { Callback, SubscribeOptions, Unsubscribe } from "../hub/types.js";
import type { HubOptions } from "../options/schemas.js";
import { TopicHub } from "./TopicHub.js";
import type { TopicList, TopicSetsOf } from "./types.js";

// Positional signatures over TopicHub for one to four dimensions; no matching happens here.

export class TopicHub1<T> extends HubFacade {
  readonly hub: TopicHub<T, TopicSetsOf<1>>;

  constructor(options?: HubOptions) {
    const hub = new TopicHub<T, TopicSetsOf<1>>(1, options);
    super(hub);
    this.hub = hub;
  }

  subscribe(topics: TopicList, callback: Callback<T>, options?: SubscribeOptions): Unsubscribe {
    return this.hub.subscribe([topics], callback, options);
  }

  notify(topics: TopicList, value: T): void {
    this.hub.notify([topics], value);
  }
}

export class TopicHub2<T> extends HubFacade {
  readonly hub: TopicHub<T, TopicSetsOf<2>>;

  constructor(options?: HubOptions) {
    const hub = new TopicHub<T, TopicSetsOf<2>>(2, options);
    super(hub);
    this.hub = hub;
  }

  subscribe(topics1: TopicList, topics2: TopicList, callback: Callback<T>, options?: SubscribeOptions): Unsubscribe {
    return this.hub.subscribe([topics1, topics2], callback, options);
  }

  notify(topics1: TopicList, topics2: TopicList, value: T): void {
    this.hub.notify([topics1, topics2], value);
  }
}

export class TopicHub3<T> extends HubFacade {
  readonly hub: TopicHub<T, TopicSetsOf<3>>;

  constructor(options?: HubOptions) {
    const hub = new TopicHub<T, TopicSetsOf<3>>(3, options);
    super(hub);
    this.hub = hub;
  }

  subscribe(
    topics1: TopicList,
    topics2: TopicList,
    topics3: TopicList,
    callback: Callback<T>,
    options?: SubscribeOptions,
  ): Unsubscribe {
    return this.hub.subscribe([topics1, topics2, topics3], callback, options);
  }

  notify(topics1: TopicList, topics2: TopicList, topics3: TopicList, value: T): void {
    this.hub.notify([topics1, topics2, topics3], value);
  }
}

export class TopicHub4<T> extends HubFacade {
  readonly hub: TopicHub<T, TopicSetsOf<4>>;

  constructor(options?: HubOptions) {
    const hub = new TopicHub<T, TopicSetsOf<4>>(4, options);
    super(hub);
    this.hub = hub;
  }

  subscribe(
    topics1: TopicList,
    topics2: TopicList,
    topics3: TopicList,
    topics4: TopicList,
    callback: Callback<T>,
    options?: SubscribeOptions,
  ): Unsubscribe {
    return this.hub.subscribe([topics1, topics2, topics3, topics4], callback, options);
  }

  notify(topics1: TopicList, topics2: TopicList, topics3: TopicList, topics4: TopicList, value: T): void {
    this.hub.notify([topics1, topics2, topics3, topics4], value);
  }
}

export const createTopicHub1 = <T>(options?: HubOptions): TopicHub1<T> => new TopicHub1<T>(options);
export const createTopicHub2 = <T>(options?: HubOptions): TopicHub2<T> => new TopicHub2<T>(options);
export const createTopicHub3 = <T>(options?: HubOptions): TopicHub3<T> => new TopicHub3<T>(options);
export const createTopicHub4 = <T>(options?: HubOptions): TopicHub4<T> => new TopicHub4<T>(options);
