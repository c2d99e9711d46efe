import { z } from "zod";

import { TimeframeSchema } from "./market";

export const DirectionSchema = z.enum(["LONG", "SHORT", "NONE"]);
export type Direction = z.infer<typeof DirectionSchema>;

export type TradeDirection = Exclude<Direction, "NONE">;

export function directionSign(direction: TradeDirection): 1 | -1 {
  return direction === "LONG" ? 1 : -1;
}

export const IndicatorSnapshotSchema = z.object({
  symbol: z.string().min(1),
  timeframe: TimeframeSchema,
  barTime: z.number().int().nonnegative(),
  close: z.number().positive(),
  fastAvg: z.number(),
  slowAvg: z.number(),
  trendStrength: z.number().min(0).max(100),
  momentum: z.number().min(0).max(100),
  volatility: z.number().nonnegative(),
  volatilityPct: z.number().nonnegative(),
  volumeRatio: z.number().nonnegative()
});
export type IndicatorSnapshot = Readonly<z.infer<typeof IndicatorSnapshotSchema>>;

export const SignalScoresSchema = z.object({
  trend: z.number().min(0).max(1),
  strength: z.number().min(0).max(1),
  momentum: z.number().min(0).max(1)
});
export type SignalScores = z.infer<typeof SignalScoresSchema>;

export const SignalSchema = z.object({
  symbol: z.string().min(1),
  direction: DirectionSchema,
  strength: z.number().min(0).max(1),
  scores: SignalScoresSchema,
  reasons: z.array(z.string()),
  snapshot: IndicatorSnapshotSchema,
  timestamp: z.number().int().nonnegative()
});
export type Signal = Readonly<z.infer<typeof SignalSchema>>;
