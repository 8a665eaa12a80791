/**
 * Zod schemas for SPC records and call parameters.
 * Persisted records failing these are skipped with a warning on load.
 */

import { z } from "zod";

const IsoTimestampSchema = z
  .string()
  .min(1)
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: "must be an ISO-8601 timestamp" });

export const TimeWindowSchema = z
  .object({
    fromISO: IsoTimestampSchema.optional(),
    toISO: IsoTimestampSchema.optional(),
  })
  .refine((w) => w.fromISO == null || w.toISO == null || Date.parse(w.fromISO) <= Date.parse(w.toISO), {
    message: "fromISO must not be after toISO",
  });

export const MeasurementSchema = z.object({
  scopeKey: z.string().min(1),
  value: z.number().finite(),
  timestampISO: IsoTimestampSchema,
});

export const BaselineSchema = z.object({
  scopeKey: z.string().min(1),
  mean: z.number().finite(),
  sigma: z.number().finite().nonnegative(),
  sampleCount: z.number().int().positive(),
  version: z.number().int().positive(),
  committedAtISO: IsoTimestampSchema,
  window: TimeWindowSchema.optional(),
});

export const DeriveLimitsOptionsSchema = z
  .object({
    sigmaMultiplier: z.number().finite().positive({ message: "sigmaMultiplier must be > 0" }),
    warningMultiplier: z
      .number()
      .finite()
      .positive({ message: "warningMultiplier must be > 0" })
      .nullable(),
  })
  .refine((o) => o.warningMultiplier == null || o.warningMultiplier < o.sigmaMultiplier, {
    message: "warningMultiplier must be smaller than sigmaMultiplier",
  });

/** First issue of a failed parse, for log lines and error messages. */
export function firstIssueMessage(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}
