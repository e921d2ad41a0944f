export {
  createTopicHub1,
  createTopicHub2,
  createTopicHub3,
  createTopicHub4,
  TopicHub1,
  TopicHub2,
  TopicHub3,
  TopicHub4,
} from "./arity.js";
export { WILDCARD } from "./constants.js";
export { createTopicHub, TopicHub } from "./TopicHub.js";
export { TopicIndex } from "./TopicIndex.js";
export type { Topic, TopicList, TopicSets, TopicSetsOf } from "./types.js";
