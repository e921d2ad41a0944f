export type { HubErrorData, HubErrorInput, HubIssue } from "./HubError.js";
export { HubError, hubError, isHubError } from "./HubError.js";
export type { HubReason } from "./reasons.js";
export { HubReasons } from "./reasons.js";
