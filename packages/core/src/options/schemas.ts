import { type HubIssue, HubReasons, hubError } from "@switchboard/errors";
import { z } from "zod";
import type { CallbackErrorHandler } from "../hub/types.js";

export const MAX_DIMENSIONS = 32;

export const HubNameSchema = z.string().min(1);

export const HubOptionsSchema = z.strictObject({
  name: HubNameSchema.optional(),
  onCallbackError: z
    .custom<CallbackErrorHandler>((value) => typeof value === "function", { message: "Expected a function" })
    .optional(),
});

export type HubOptions = z.input<typeof HubOptionsSchema>;

export const DimensionsSchema = z.number().int().min(1).max(MAX_DIMENSIONS);

export const TopicListSchema = z.array(z.string());

/**
 * Keeps only the location and message of each zod issue.
 */
export const toHubIssues = ({ issues }: { issues: readonly HubIssue[] }): HubIssue[] =>
  issues.map(({ path, message }) => ({ path, message }));

const parseOrThrow = <S extends z.ZodType>(schema: S, input: unknown, label: string): z.output<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw hubError({
      reason: HubReasons.OptionsInvalid,
      message: `Invalid ${label}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      data: { subject: label, issues: toHubIssues(parsed.error) },
      cause: parsed.error,
    });
  }
  return parsed.data;
};

export const parseHubOptions = (input: unknown = {}): z.output<typeof HubOptionsSchema> =>
  parseOrThrow(HubOptionsSchema, input, "hub options");

export const parseDimensions = (input: unknown): number => parseOrThrow(DimensionsSchema, input, "dimension count");
