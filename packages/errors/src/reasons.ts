export const HubReasons = {
  HubClosed: "hub/closed",

  TopicsDimensionMismatch: "topics/dimension_mismatch",
  TopicsInvalid: "topics/invalid",

  OptionsInvalid: "options/invalid",
} as const;

export type HubReason = (typeof HubReasons)[keyof typeof HubReasons];
