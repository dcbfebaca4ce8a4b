import { z } from "zod";

// Keeps `now + 2 * duration` inside the range a Date can hold (8.64e15 ms).
export const MAX_DURATION_MS = 1_000_000_000_000_000;

// Node clamps larger timer delays to 1 ms.
export const MAX_TIMER_MS = 2_147_483_647;

export const limitSchema = z.number().int().positive().safe();
export const durationSchema = z.number().int().positive().max(MAX_DURATION_MS);

export const tierSchema = z.object({
  limit: limitSchema,
  duration: durationSchema
});

export type Tier = z.infer<typeof tierSchema>;

export const policySchema = z.array(tierSchema).nonempty();

/** Ordered escalation tiers; the first one is the baseline. */
export type Policy = readonly [Tier, ...Tier[]];

export const backendResultSchema = z.object({
  remaining: z.number().int().min(-1),
  total: z.number().int().positive(),
  duration: z.number().int().positive(),
  expireAt: z.number().int().nonnegative()
});

export type BackendResult = z.infer<typeof backendResultSchema>;

export type LimitResult = {
  total: number;
  remaining: number;
  duration: number;
  resetAt: Date;
};

export function isLimited(result: Pick<LimitResult, "remaining">): boolean {
  return result.remaining < 0;
}

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
