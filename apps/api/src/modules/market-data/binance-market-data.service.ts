import type { Bar, Timeframe } from "@tradewarden/shared";
import { BarSchema, timeframeToMs } from "@tradewarden/shared";
import { z } from "zod";

import { type Clock, systemClock } from "../runtime/clock";
import type { BinanceClient } from "./binance-client";
import type { MarketDataPort } from "./market-data.port";

/** Largest page the futures klines endpoint serves. */
const MAX_PAGE = 1500;

const KlineRowSchema = z
  .tuple([z.number(), z.string(), z.string(), z.string(), z.string(), z.string(), z.number()])
  .rest(z.unknown());

const KlinePayloadSchema = z.array(KlineRowSchema);

type ParsedKline = { bar: Bar; closeTime: number };

export function parseKlines(symbol: string, timeframe: Timeframe, payload: unknown): ParsedKline[] {
  const rows = KlinePayloadSchema.safeParse(payload);
  if (!rows.success) {
    throw new Error(`Unexpected klines payload for ${symbol}: ${rows.error.issues[0]?.message ?? "unknown"}`);
  }
  return rows.data.map(([openTime, open, high, low, close, volume, closeTime]) => {
    const bar = BarSchema.safeParse({
      symbol,
      timeframe,
      openTime,
      open: Number(open),
      high: Number(high),
      low: Number(low),
      close: Number(close),
      volume: Number(volume)
    });
    if (!bar.success) {
      throw new Error(`Invalid kline for ${symbol} at ${openTime}: ${bar.error.issues[0]?.message ?? "unknown"}`);
    }
    return { bar: bar.data, closeTime };
  });
}

export class BinanceMarketDataService implements MarketDataPort {
  private readonly pageLimit: number;
  private readonly clock: Clock;

  constructor(
    private readonly client: BinanceClient,
    options: { clock?: Clock; pageLimit?: number } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.pageLimit = Math.min(options.pageLimit ?? MAX_PAGE, MAX_PAGE);
  }

  async fetchWindow(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]> {
    const sym = symbol.trim().toUpperCase();
    // The newest row is usually the bar still forming, so ask for one more than needed.
    const payload = await this.client.klines({ symbol: sym, interval: timeframe, limit: Math.min(limit + 1, this.pageLimit) });
    const bars = this.closedBars(parseKlines(sym, timeframe, payload));
    return bars.slice(-limit);
  }

  async fetchHistory(symbol: string, timeframe: Timeframe, startTime: number, endTime: number): Promise<Bar[]> {
    if (endTime < startTime) {
      throw new Error(`History range ends before it starts (${startTime} > ${endTime})`);
    }
    const sym = symbol.trim().toUpperCase();
    const step = timeframeToMs(timeframe);
    const byOpenTime = new Map<number, Bar>();

    let cursor = startTime;
    while (cursor <= endTime) {
      const payload = await this.client.klines({ symbol: sym, interval: timeframe, limit: this.pageLimit, startTime: cursor, endTime });
      const page = parseKlines(sym, timeframe, payload);
      for (const bar of this.closedBars(page)) {
        if (bar.openTime >= startTime && bar.openTime <= endTime) {
          byOpenTime.set(bar.openTime, bar);
        }
      }
      const last = page.at(-1);
      if (page.length < this.pageLimit || !last) break;
      cursor = last.bar.openTime + step;
    }

    return [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
  }

  private closedBars(rows: ParsedKline[]): Bar[] {
    const now = this.clock();
    return rows.filter((row) => row.closeTime < now).map((row) => row.bar);
  }
}
