import type { Trade } from "@tradewarden/shared";

export type NewTrade = Omit<Trade, "id">;
export type TradePatch = Partial<Omit<Trade, "id" | "symbol" | "direction" | "openedAt">>;

export type TradeQuery = {
  symbol?: string;
  status?: Trade["status"];
  limit?: number;
};

export const TRADE_STORE = Symbol("TRADE_STORE");

export interface TradeStore {
  createTrade(trade: NewTrade): Promise<Trade>;
  updateTrade(id: string, patch: TradePatch): Promise<Trade>;
  getOpenTrades(symbol?: string): Promise<Trade[]>;
  /** Newest first. */
  listTrades(query?: TradeQuery): Promise<Trade[]>;
}

export function filterTrades(trades: readonly Trade[], query: TradeQuery = {}): Trade[] {
  const matching = trades.filter((t) => (!query.symbol || t.symbol === query.symbol) && (!query.status || t.status === query.status));
  const newestFirst = matching.slice().reverse();
  return query.limit !== undefined ? newestFirst.slice(0, query.limit) : newestFirst;
}
