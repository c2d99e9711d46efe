import { z } from "zod";

export const TimeframeSchema = z.enum(["1m", "3m", "5m", "15m", "30m", "1h", "2h", "4h", "1d"]);
export type Timeframe = z.infer<typeof TimeframeSchema>;

const TIMEFRAME_MS: Record<Timeframe, number> = {
  "1m": 60_000,
  "3m": 180_000,
  "5m": 300_000,
  "15m": 900_000,
  "30m": 1_800_000,
  "1h": 3_600_000,
  "2h": 7_200_000,
  "4h": 14_400_000,
  "1d": 86_400_000
};

export function timeframeToMs(timeframe: Timeframe): number {
  return TIMEFRAME_MS[timeframe];
}

export const BarSchema = z
  .object({
    symbol: z.string().min(1),
    timeframe: TimeframeSchema,
    openTime: z.number().int().nonnegative(),
    open: z.number().positive(),
    high: z.number().positive(),
    low: z.number().positive(),
    close: z.number().positive(),
    volume: z.number().nonnegative()
  })
  .refine((bar) => bar.high >= bar.low && bar.high >= Math.max(bar.open, bar.close) && bar.low <= Math.min(bar.open, bar.close), {
    message: "high/low must bound open and close"
  });
export type Bar = Readonly<z.infer<typeof BarSchema>>;

export const BarSequenceSchema = z.array(BarSchema);

/**
 * Throws when bars are not strictly ascending by openTime or mix symbols/timeframes.
 * Returns the same array so it can be used inline.
 */
export function assertOrderedBars(bars: readonly Bar[]): readonly Bar[] {
  for (let i = 1; i < bars.length; i += 1) {
    const prev = bars[i - 1];
    const cur = bars[i];
    if (cur.symbol !== prev.symbol || cur.timeframe !== prev.timeframe) {
      throw new Error(`Bar ${i} belongs to ${cur.symbol}/${cur.timeframe}, expected ${prev.symbol}/${prev.timeframe}`);
    }
    if (cur.openTime <= prev.openTime) {
      throw new Error(`Bar ${i} openTime ${cur.openTime} is not after ${prev.openTime}`);
    }
  }
  return bars;
}

export function utcDateKey(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}
