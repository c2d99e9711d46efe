import { z } from "zod";

import { StrategySettingsSchema, TradingConfigSchema } from "./app-config";
import { BarSequenceSchema, TimeframeSchema } from "./market";
import { TradeSchema } from "./trade";

export const BacktestConfigSchema = z.object({
  initialBalance: z.number().positive().default(10_000),
  /** Charged on entry and exit notional. */
  feePercent: z.number().min(0).max(5).default(0),
  windowSize: z.number().int().min(10).max(1_000).default(100),
  reversalStrength: z.number().min(0).max(1).default(0.7),
  trading: TradingConfigSchema.default({}),
  strategy: StrategySettingsSchema.default({})
});
export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

/** Partial settings layered over the running configuration. */
export const BacktestOverridesSchema = z.object({
  initialBalance: z.number().positive().optional(),
  feePercent: z.number().min(0).max(5).optional(),
  windowSize: z.number().int().min(10).max(1_000).optional(),
  reversalStrength: z.number().min(0).max(1).optional(),
  trading: TradingConfigSchema.partial().optional(),
  strategy: StrategySettingsSchema.partial().optional()
});
export type BacktestOverrides = z.infer<typeof BacktestOverridesSchema>;

export const BacktestRequestSchema = z
  .object({
    symbol: z
      .string()
      .trim()
      .min(1)
      .transform((s) => s.toUpperCase()),
    timeframe: TimeframeSchema.optional(),
    bars: BarSequenceSchema.optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    overrides: BacktestOverridesSchema.default({})
  })
  .refine((req) => req.bars !== undefined || (req.from !== undefined && req.to !== undefined), {
    message: "Provide either bars or a from/to range"
  })
  .refine((req) => req.bars === undefined || req.bars.every((bar) => bar.symbol === req.symbol), {
    message: "Every bar must belong to the requested symbol",
    path: ["bars"]
  });
export type BacktestRequest = z.infer<typeof BacktestRequestSchema>;

export const EquityPointSchema = z.object({
  time: z.number().int().nonnegative(),
  equity: z.number(),
  balance: z.number()
});
export type EquityPoint = z.infer<typeof EquityPointSchema>;

export const BacktestStatsSchema = z.object({
  totalTrades: z.number().int().nonnegative(),
  winningTrades: z.number().int().nonnegative(),
  losingTrades: z.number().int().nonnegative(),
  grossProfit: z.number().nonnegative(),
  grossLoss: z.number().nonnegative(),
  totalPnl: z.number(),
  averagePnl: z.number(),
  bestTrade: z.number(),
  worstTrade: z.number(),
  rejectedSignals: z.number().int().nonnegative()
});
export type BacktestStats = z.infer<typeof BacktestStatsSchema>;

export const BacktestResultSchema = z.object({
  symbol: z.string().min(1),
  timeframe: TimeframeSchema,
  initialBalance: z.number().positive(),
  finalBalance: z.number(),
  totalReturnPercent: z.number(),
  trades: z.array(TradeSchema),
  winRate: z.number().min(0).max(1),
  profitFactor: z.number().nonnegative(),
  sharpeRatio: z.number(),
  maxDrawdownPercent: z.number().min(0).max(100),
  equityCurve: z.array(EquityPointSchema),
  stats: BacktestStatsSchema
});
export type BacktestResult = Readonly<z.infer<typeof BacktestResultSchema>>;
