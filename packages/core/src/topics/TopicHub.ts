import type { Debugger } from "debug";
import { HubCore } from "../hub/HubCore.js";
import { HubFacade } from "../hub/HubFacade.js";
import type { Callback, SubscribeOptions, SubscriptionId, Unsubscribe } from "../hub/types.js";
import type { HubOptions } from "../options/schemas.js";
import { extendLogger } from "../utils/logger.js";
import { TopicIndex } from "./TopicIndex.js";
import type { Topic, TopicSets } from "./types.js";

/**
 * Hub that routes each notification to the subscriptions whose topic lists intersect
 * the notification's in every dimension.
 *
 * `S` only narrows the call signatures (e.g. `TopicSetsOf<2>`); the dimension count
 * checked at run time is the `dimensions` argument.
 */
export class TopicHub<T, S extends TopicSets = TopicSets> extends HubFacade {
  #core: HubCore<T>;
  #index: TopicIndex;
  #topicsById: Map<SubscriptionId, Topic[][]>;
  #matchLogger: Debugger;

  constructor(dimensions: number, options: HubOptions = {}) {
    const index = new TopicIndex(dimensions);
    const topicsById = new Map<SubscriptionId, Topic[][]>();
    const core = new HubCore<T>({
      kind: "topic-hub",
      options,
      onDetach: (id) => {
        const topicSets = topicsById.get(id);
        if (!topicSets) return;
        topicsById.delete(id);
        index.remove(topicSets, id);
      },
      onClose: () => {
        topicsById.clear();
        index.clear();
      },
    });
    super(core);
    this.#core = core;
    this.#index = index;
    this.#topicsById = topicsById;
    this.#matchLogger = extendLogger(core.logger, "match");
  }

  get dimensions(): number {
    return this.#index.dimensions;
  }

  subscribe(topics: S, callback: Callback<T>, options: SubscribeOptions = {}): Unsubscribe {
    this.#core.assertOpen("subscribe");
    const topicSets = this.#index.validate(topics);

    return this.#core.subscribe(callback, options, (id) => {
      this.#topicsById.set(id, topicSets);
      this.#index.insert(topicSets, id);
    });
  }

  notify(topics: S, value: T): void {
    this.#core.assertOpen("notify");
    const matched = [...this.#index.match(topics)].sort((a, b) => a - b);
    this.#matchLogger("%d subscription(s) for %o", matched.length, topics);
    this.#core.dispatch(matched, value);
  }
}

export const createTopicHub = <T, S extends TopicSets = TopicSets>(
  dimensions: number,
  options?: HubOptions,
): TopicHub<T, S> => new TopicHub<T, S>(dimensions, options);
