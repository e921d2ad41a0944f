export type { HubErrorData, HubErrorInput, HubIssue, HubReason } from "@switchboard/errors";
export { HubError, HubReasons, hubError, isHubError } from "@switchboard/errors";
export * from "./filtered/index.js";
export * from "./hub/index.js";
export * from "./lifecycle/index.js";
export * from "./options/index.js";
export * from "./registry/index.js";
export * from "./stateful/index.js";
export * from "./topics/index.js";
export * from "./utils/logger.js";
