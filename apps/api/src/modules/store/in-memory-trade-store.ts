import type { Trade } from "@tradewarden/shared";

import type { NewTrade, TradePatch, TradeQuery, TradeStore } from "./trade-store";
import { filterTrades } from "./trade-store";

/**
 * Process-local store with sequential ids (`<prefix>-1`, `<prefix>-2`, ...). Used by backtests and tests.
 */
export class InMemoryTradeStore implements TradeStore {
  private readonly trades: Trade[] = [];
  private nextId = 1;

  constructor(private readonly idPrefix = "trade") {}

  async createTrade(trade: NewTrade): Promise<Trade> {
    const created: Trade = { ...trade, id: `${this.idPrefix}-${this.nextId}` };
    this.nextId += 1;
    this.trades.push(created);
    return { ...created };
  }

  async updateTrade(id: string, patch: TradePatch): Promise<Trade> {
    const index = this.trades.findIndex((t) => t.id === id);
    const current = this.trades[index];
    if (!current) {
      throw new Error(`Unknown trade ${id}`);
    }
    const updated: Trade = { ...current, ...patch };
    this.trades[index] = updated;
    return { ...updated };
  }

  async getOpenTrades(symbol?: string): Promise<Trade[]> {
    return this.trades.filter((t) => t.status === "OPEN" && (!symbol || t.symbol === symbol)).map((t) => ({ ...t }));
  }

  async listTrades(query?: TradeQuery): Promise<Trade[]> {
    return filterTrades(this.trades, query).map((t) => ({ ...t }));
  }

  /** Oldest first, as recorded. */
  snapshot(): Trade[] {
    return this.trades.map((t) => ({ ...t }));
  }
}
