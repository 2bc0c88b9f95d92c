import { z } from "zod";
import { InvalidInputError } from "./errors";

/**
 * Zod validation schemas for route comparison inputs.
 * Every rate and the budget must be strictly positive and finite.
 */

const positiveAmount = z
  .number({ required_error: "is required", invalid_type_error: "must be a number" })
  .finite({ message: "must be finite" })
  .positive({ message: "must be greater than 0" });

/**
 * Schema for the intermediate→foreign rate interval. Bounds are positive and ordered.
 */
export const RateRangeSchema = z
  .object({
    min: positiveAmount,
    max: positiveAmount,
  })
  .refine((range) => range.min <= range.max, {
    message: "min must not exceed max",
    path: ["min"],
  });

/**
 * Schema for the fields shared by every operation.
 */
export const ConversionInputsSchema = z.object({
  budget: positiveAmount,
  directRate: positiveAmount,
  homeToIntermediateRate: positiveAmount,
});

/**
 * Schema for a single comparison. The representative intermediate→foreign
 * rate only has to be finite: a zero or negative rate is a degenerate state
 * that leaves the break-even direct rate undefined.
 */
export const ComparisonInputsSchema = ConversionInputsSchema.extend({
  intermediateToForeignRate: z
    .number({ required_error: "is required", invalid_type_error: "must be a number" })
    .finite({ message: "must be finite" }),
});

/**
 * Schema for curve generation and full simulations.
 */
export const CurveInputsSchema = ConversionInputsSchema.extend({
  rateRange: RateRangeSchema,
});

/**
 * True for non-null, non-array objects such as a parsed JSON body.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssue(issue: z.ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join(".") : "input";
  return `${field}: ${issue.message}`;
}

/**
 * Parses `input` with `schema`, raising InvalidInputError with every issue found.
 */
export function parseInputs<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
