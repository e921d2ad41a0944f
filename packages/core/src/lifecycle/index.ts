export type { Closable } from "./scoped.js";
export { scoped } from "./scoped.js";
export {
  withFilteredHub,
  withFilteredHub2,
  withFilteredHub3,
  withFilteredHub4,
  withHub,
  withReactiveHub,
  withStatefulHub,
  withTopicHub,
  withTopicHub1,
  withTopicHub2,
  withTopicHub3,
  withTopicHub4,
} from "./withHub.js";
