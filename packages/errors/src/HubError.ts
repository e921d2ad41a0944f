import type { HubReason } from "./reasons.js";

/**
 * One validation failure, reduced to where it happened and what was wrong.
 */
export type HubIssue = {
  path: readonly PropertyKey[];
  message: string;
};

/**
 * Payload attached to each reason.
 */
export type HubErrorData = {
  "hub/closed": { hub: string; operation: string };
  "topics/dimension_mismatch": { expected: number; received: number | null };
  "topics/invalid": { dimension: number; issues: readonly HubIssue[] };
  "options/invalid": { subject: string; issues: readonly HubIssue[] };
};

export type HubErrorInput<R extends HubReason> = {
  reason: R;
  message: string;
  data: HubErrorData[R];
  cause?: unknown;
};

export class HubError<R extends HubReason = HubReason> extends Error {
  readonly reason: R;
  readonly data: HubErrorData[R];

  constructor({ reason, message, data, cause }: HubErrorInput<R>) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HubError";
    this.reason = reason;
    this.data = data;
  }
}

export const hubError = <R extends HubReason>(input: HubErrorInput<R>): HubError<R> => new HubError(input);

/**
 * Narrows `value` to a `HubError`, optionally one raised for `reason`, so its `data` is typed.
 */
export const isHubError = <R extends HubReason>(value: unknown, reason?: R): value is HubError<R> =>
  value instanceof HubError && (reason === undefined || value.reason === reason);
