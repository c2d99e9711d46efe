import { describe, expect, it, vi } from "vitest";

import { CloseFailedError, FillFailedError } from "@tradewarden/shared";

import type { CcxtFuturesExchange } from "./ccxt-futures-execution.adapter";
import { CcxtFuturesExecutionAdapter } from "./ccxt-futures-execution.adapter";

const intent = { symbol: "BTCUSDT", direction: "SHORT", sizeUSD: 200, entryPrice: 40_000, stopLossPrice: 40_800, takeProfitPrice: 38_800 } as const;
const ctx = { time: 1_700_000_000_000, signal: new AbortController().signal };

function fakeExchange(overrides: Partial<CcxtFuturesExchange> = {}) {
  const createOrder = vi.fn(async (): Promise<unknown> => ({
    id: "9001",
    average: 39_990,
    timestamp: 1_700_000_000_500,
    fee: { currency: "USDT", cost: 0.08 }
  }));
  const exchange: CcxtFuturesExchange = {
    loadMarkets: vi.fn(async () => ({})),
    fetchBalance: async () => ({ free: { USDT: "1234.5" } }),
    amountToPrecision: (_symbol, amount) => amount.toFixed(3),
    createOrder,
    markets_by_id: { BTCUSDT: [{ symbol: "BTC/USDT:USDT", swap: true }] },
    ...overrides
  };
  return { exchange, createOrder };
}

const options = { environment: "TESTNET", apiKey: "test-key", apiSecret: "test-secret" } as const;

describe("CcxtFuturesExecutionAdapter", () => {
  it("opens with a market order sized in base units", async () => {
    const { exchange, createOrder } = fakeExchange();
    const adapter = new CcxtFuturesExecutionAdapter(options, exchange);

    const fill = await adapter.placeOrder(intent, ctx);

    expect(createOrder).toHaveBeenCalledWith("BTC/USDT:USDT", "market", "sell", 0.005);
    expect(fill).toEqual({ orderId: "9001", fillPrice: 39_990, filledAt: 1_700_000_000_500, fees: 0.08, quantity: 0.005 });
  });

  it("reports the executed amount when the exchange returns one", async () => {
    const { exchange } = fakeExchange({
      createOrder: async () => ({ id: "9002", average: 40_400, filled: 0.0049, timestamp: 1_700_000_000_500 })
    });
    const adapter = new CcxtFuturesExecutionAdapter(options, exchange);

    const fill = await adapter.placeOrder(intent, ctx);

    expect(fill.quantity).toBe(0.0049);
  });

  it("closes the quantity recorded at entry even after slippage", async () => {
    const { exchange, createOrder } = fakeExchange({ amountToPrecision: (_symbol, amount) => amount.toFixed(6) });
    const adapter = new CcxtFuturesExecutionAdapter(options, exchange);
    const fill = await adapter.placeOrder(intent, ctx);
    const trade = {
      ...intent,
      id: "t-1",
      entryPrice: 40_400,
      quantity: fill.quantity,
      openedAt: "2023-11-14T22:13:20.000Z",
      fees: 0,
      status: "OPEN" as const
    };

    await adapter.closePosition(trade, { reason: "MANUAL", price: 40_000, time: 1_700_003_600_000 });

    expect(createOrder).toHaveBeenNthCalledWith(1, "BTC/USDT:USDT", "market", "sell", 0.005);
    expect(createOrder).toHaveBeenNthCalledWith(2, "BTC/USDT:USDT", "market", "buy", 0.005, undefined, { reduceOnly: true });
  });

  it("closes with a reduce-only order on the opposite side", async () => {
    const { exchange, createOrder } = fakeExchange();
    const adapter = new CcxtFuturesExecutionAdapter(options, exchange);
    const trade = { ...intent, id: "t-1", openedAt: "2023-11-14T22:13:20.000Z", fees: 0.08, status: "OPEN" as const };

    const close = await adapter.closePosition(trade, { reason: "TAKE_PROFIT", price: 38_800, time: 1_700_003_600_000 });

    expect(createOrder).toHaveBeenCalledWith("BTC/USDT:USDT", "market", "buy", 0.005, undefined, { reduceOnly: true });
    expect(close.exitPrice).toBe(39_990);
  });

  it("reads the free settlement balance", async () => {
    const adapter = new CcxtFuturesExecutionAdapter(options, fakeExchange().exchange);
    await expect(adapter.getBalance()).resolves.toBe(1234.5);
  });

  it("wraps exchange failures in fill and close errors", async () => {
    const { exchange } = fakeExchange({
      createOrder: async () => {
        throw new Error("Margin is insufficient");
      }
    });
    const adapter = new CcxtFuturesExecutionAdapter(options, exchange);
    const trade = { ...intent, id: "t-1", openedAt: "2023-11-14T22:13:20.000Z", fees: 0, status: "OPEN" as const };

    await expect(adapter.placeOrder(intent, ctx)).rejects.toThrow(FillFailedError);
    await expect(adapter.placeOrder(intent, ctx)).rejects.toThrow("BTCUSDT SHORT entry failed: Margin is insufficient");
    await expect(adapter.closePosition(trade, { reason: "MANUAL", price: 40_000, time: 0 })).rejects.toThrow(CloseFailedError);
  });

  it("rejects symbols without a perpetual market", async () => {
    const adapter = new CcxtFuturesExecutionAdapter(options, fakeExchange({ markets_by_id: {} }).exchange);
    await expect(adapter.placeOrder(intent, ctx)).rejects.toThrow("Unknown futures symbol (ccxt): BTCUSDT");
  });
});
