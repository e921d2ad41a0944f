export type { HubOptions } from "./schemas.js";
export {
  DimensionsSchema,
  HubNameSchema,
  HubOptionsSchema,
  MAX_DIMENSIONS,
  parseDimensions,
  parseHubOptions,
  TopicListSchema,
  toHubIssues,
} from "./schemas.js";
