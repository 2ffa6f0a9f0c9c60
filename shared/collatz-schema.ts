import { z } from "zod";

const POSITIVE_INTEGER_MESSAGE = "number must be a positive integer";

// Accept "27" as well as 27; anything else is left for z.number() to reject.
const coerceDigits = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : value;
};

export const CollatzRequest = z.object({
  number: z.preprocess(
    coerceDigits,
    z
      .number({ required_error: "number is required", invalid_type_error: POSITIVE_INTEGER_MESSAGE })
      .int(POSITIVE_INTEGER_MESSAGE)
      .min(1, POSITIVE_INTEGER_MESSAGE)
      .max(Number.MAX_SAFE_INTEGER, "number exceeds the supported range"),
  ),
  maxSteps: z
    .number({ invalid_type_error: "maxSteps must be a positive integer" })
    .int("maxSteps must be a positive integer")
    .positive("maxSteps must be a positive integer")
    .optional(),
});
export type CollatzRequest = z.infer<typeof CollatzRequest>;

export const CollatzStepRecord = z.object({
  step: z.number().int().nonnegative(),
  value: z.number().int().positive(),
  operation: z.enum(["", "divide", "multiply-add"]),
});
export type CollatzStepRecord = z.infer<typeof CollatzStepRecord>;

export const CollatzResponse = z.object({
  steps: z.array(CollatzStepRecord).min(1),
  truncated: z.boolean(),
  maxSteps: z.number().int().nonnegative(),
});
export type CollatzResponse = z.infer<typeof CollatzResponse>;

export const CollatzErrorResponse = z.object({
  error: z.string(),
});
export type CollatzErrorResponse = z.infer<typeof CollatzErrorResponse>;

export const CollatzConfig = z.object({
  maxSteps: z.number().int().positive(),
});
export type CollatzConfig = z.infer<typeof CollatzConfig>;
