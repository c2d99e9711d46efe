import type { Bar, Timeframe } from "@tradewarden/shared";

export const MARKET_DATA = Symbol("MARKET_DATA");

export interface MarketDataPort {
  /** The most recent `limit` closed bars, oldest first. */
  fetchWindow(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]>;
  /** Every closed bar with `startTime <= openTime <= endTime`, oldest first and without duplicates. */
  fetchHistory(symbol: string, timeframe: Timeframe, startTime: number, endTime: number): Promise<Bar[]>;
}
