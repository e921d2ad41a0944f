import {
  createFilteredHub,
  createFilteredHub2,
  createFilteredHub3,
  createFilteredHub4,
  type FilteredHub,
  type FilteredHub2,
  type FilteredHub3,
  type FilteredHub4,
} from "../filtered/FilteredHub.js";
import { Hub } from "../hub/Hub.js";
import type { HubOptions } from "../options/schemas.js";
import { ReactiveHub } from "../stateful/ReactiveHub.js";
import { StatefulHub } from "../stateful/StatefulHub.js";
import { TopicHub1, TopicHub2, TopicHub3, TopicHub4 } from "../topics/arity.js";
import { TopicHub } from "../topics/TopicHub.js";
import type { TopicSets } from "../topics/types.js";
import { scoped } from "./scoped.js";

// Each helper creates a hub, runs `body` with it and closes it on every exit path.
// An async `body` keeps the hub open until its promise settles.

export const withHub = <T, R>(body: (hub: Hub<T>) => R, options?: HubOptions): R =>
  scoped(new Hub<T>(options), body);

export const withStatefulHub = <T, R>(initial: T, body: (hub: StatefulHub<T>) => R, options?: HubOptions): R =>
  scoped(new StatefulHub<T>(initial, options), body);

export const withReactiveHub = <T, R>(produce: () => T, body: (hub: ReactiveHub<T>) => R, options?: HubOptions): R =>
  scoped(new ReactiveHub<T>(produce, options), body);

export const withTopicHub = <T, R, S extends TopicSets = TopicSets>(
  dimensions: number,
  body: (hub: TopicHub<T, S>) => R,
  options?: HubOptions,
): R => scoped(new TopicHub<T, S>(dimensions, options), body);

export const withTopicHub1 = <T, R>(body: (hub: TopicHub1<T>) => R, options?: HubOptions): R =>
  scoped(new TopicHub1<T>(options), body);

export const withTopicHub2 = <T, R>(body: (hub: TopicHub2<T>) => R, options?: HubOptions): R =>
  scoped(new TopicHub2<T>(options), body);

export const withTopicHub3 = <T, R>(body: (hub: TopicHub3<T>) => R, options?: HubOptions): R =>
  scoped(new TopicHub3<T>(options), body);

export const withTopicHub4 = <T, R>(body: (hub: TopicHub4<T>) => R, options?: HubOptions): R =>
  scoped(new TopicHub4<T>(options), body);

export const withFilteredHub = <T, K, R>(body: (hub: FilteredHub<T, K>) => R, options?: HubOptions): R =>
  scoped(createFilteredHub<T, K>(options), body);

export const withFilteredHub2 = <T, K1, K2, R>(body: (hub: FilteredHub2<T, K1, K2>) => R, options?: HubOptions): R =>
  scoped(createFilteredHub2<T, K1, K2>(options), body);

export const withFilteredHub3 = <T, K1, K2, K3, R>(
  body: (hub: FilteredHub3<T, K1, K2, K3>) => R,
  options?: HubOptions,
): R => scoped(createFilteredHub3<T, K1, K2, K3>(options), body);

export const withFilteredHub4 = <T, K1, K2, K3, K4, R>(
  body: (hub: FilteredHub4<T, K1, K2, K3, K4>) => R,
  options?: HubOptions,
): R => scoped(createFilteredHub4<T, K1, K2, K3, K4>(options), body);
