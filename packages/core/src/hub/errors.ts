import { type HubError, HubReasons, hubError } from "@switchboard/errors";
import type { Debugger } from "debug";
import type { CallbackErrorHandler } from "./types.js";

export const closedHubError = (hub: string, operation: string): HubError<typeof HubReasons.HubClosed> =>
  hubError({
    reason: HubReasons.HubClosed,
    message: `Cannot ${operation}: hub "${hub}" is closed`,
    data: { hub, operation },
  });

export const resolveCallbackErrorHandler = (logger: Debugger, handler?: CallbackErrorHandler): CallbackErrorHandler =>
  handler ??
  (({ id, error }) => {
    logger("callback %s threw: %O", id === null ? "(replay)" : `#${id}`, error);
  });
