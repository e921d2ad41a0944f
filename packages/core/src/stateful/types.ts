import type { SubscribeOptions } from "../hub/types.js";

export type StateSubscribeOptions = SubscribeOptions & {
  /**
   * Call the new subscriber once with the current state before registering it.
   */
  notifyCurrentState?: boolean;
};
