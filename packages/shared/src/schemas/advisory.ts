import { z } from "zod";

import { TimeframeSchema } from "./market";

export const RecommendationSchema = z.enum(["APPROVE", "REJECT", "NEUTRAL"]);
export type Recommendation = z.infer<typeof RecommendationSchema>;

export const FallbackReasonSchema = z.enum(["WEAK_SIGNAL", "ADVISOR_DISABLED", "QUOTA_EXHAUSTED", "ADVISOR_FAILED"]);
export type FallbackReason = z.infer<typeof FallbackReasonSchema>;

const VerdictBaseSchema = z.object({
  confidence: z.number().min(0).max(100),
  recommendation: RecommendationSchema,
  reasoning: z.string(),
  producedAt: z.string().min(1)
});

export const LiveVerdictSchema = VerdictBaseSchema.extend({
  source: z.literal("LIVE")
});

export const CachedVerdictSchema = VerdictBaseSchema.extend({
  source: z.literal("CACHED"),
  cachedAt: z.string().min(1)
});

export const FallbackVerdictSchema = VerdictBaseSchema.extend({
  source: z.literal("FALLBACK"),
  reason: FallbackReasonSchema
});

export const AdvisoryVerdictSchema = z.discriminatedUnion("source", [LiveVerdictSchema, CachedVerdictSchema, FallbackVerdictSchema]);
export type LiveVerdict = Readonly<z.infer<typeof LiveVerdictSchema>>;
export type CachedVerdict = Readonly<z.infer<typeof CachedVerdictSchema>>;
export type FallbackVerdict = Readonly<z.infer<typeof FallbackVerdictSchema>>;
export type AdvisoryVerdict = LiveVerdict | CachedVerdict | FallbackVerdict;
export type VerdictSource = AdvisoryVerdict["source"];

export const FingerprintNamespaceSchema = z.enum(["PRIMARY", "VALIDATION"]);
export type FingerprintNamespace = z.infer<typeof FingerprintNamespaceSchema>;

export const MarketFingerprintSchema = z.object({
  namespace: FingerprintNamespaceSchema,
  symbol: z.string().min(1),
  timeframe: TimeframeSchema,
  bucketStart: z.number().int().nonnegative()
});
export type MarketFingerprint = Readonly<z.infer<typeof MarketFingerprintSchema>>;

export function fingerprintKey(fp: MarketFingerprint): string {
  return `${fp.namespace}:${fp.symbol}:${fp.timeframe}:${fp.bucketStart}`;
}

export const QuotaStateSchema = z.object({
  callsToday: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  windowStartDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/)
});
export type QuotaState = z.infer<typeof QuotaStateSchema>;

/**
 * Response contract for the external advisor. Anything not matching this shape is treated as malformed.
 */
export const AdvisorResponseSchema = z.object({
  recommendation: z.preprocess((v) => (typeof v === "string" ? v.trim().toUpperCase() : v), RecommendationSchema),
  confidence: z.coerce.number().min(0).max(100),
  reasoning: z.string().default("")
});
export type AdvisorResponse = z.infer<typeof AdvisorResponseSchema>;
