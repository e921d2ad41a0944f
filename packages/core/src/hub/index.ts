export { closedHubError } from "./errors.js";
export { createHub, Hub } from "./Hub.js";
export type { HubCoreOptions } from "./HubCore.js";
export { HubCore } from "./HubCore.js";
export { HubFacade } from "./HubFacade.js";
export type {
  Callback,
  CallbackErrorHandler,
  CallbackErrorInfo,
  HubEventListener,
  HubEventName,
  HubEvents,
  HubEventSource,
  HubHandle,
  SubscribeOptions,
  SubscriptionEvent,
  SubscriptionId,
  Unsubscribe,
} from "./types.js";
