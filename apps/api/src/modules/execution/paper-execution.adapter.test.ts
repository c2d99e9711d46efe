import type { OrderIntent, Trade } from "@tradewarden/shared";
import { FillFailedError } from "@tradewarden/shared";
import { describe, expect, it } from "vitest";

import { T0 } from "../../testing/bars";
import { PaperExecutionAdapter } from "./paper-execution.adapter";

const intent: OrderIntent = {
  symbol: "BTCUSDT",
  direction: "LONG",
  sizeUSD: 200,
  entryPrice: 100,
  stopLossPrice: 98,
  takeProfitPrice: 103
};

const openTrade = (fees: number): Trade => ({
  id: "trade-1",
  symbol: "BTCUSDT",
  direction: "LONG",
  entryPrice: 100,
  sizeUSD: 200,
  stopLossPrice: 98,
  takeProfitPrice: 103,
  openedAt: "2024-01-01T00:00:00.000Z",
  fees,
  status: "OPEN"
});

describe("PaperExecutionAdapter", () => {
  it("fills at the intent price and charges the entry fee", async () => {
    const paper = new PaperExecutionAdapter({ initialBalance: 1_000, feePercent: 0.5, idPrefix: "sim" });

    const fill = await paper.placeOrder(intent, { time: T0, signal: new AbortController().signal });

    expect(fill).toEqual({ orderId: "sim-1", fillPrice: 100, filledAt: T0, fees: 1 });
  });

  it("books realized pnl net of both fees on close", async () => {
    const paper = new PaperExecutionAdapter({ initialBalance: 1_000, feePercent: 0.5 });

    const close = await paper.closePosition(openTrade(1), { reason: "TAKE_PROFIT", price: 103, time: T0 + 3_600_000 });

    expect(close).toMatchObject({ exitPrice: 103, closedAt: T0 + 3_600_000 });
    expect(close.fees).toBeCloseTo(1.03, 10);
    expect(await paper.getBalance()).toBeCloseTo(1_000 + 6 - 1 - 1.03, 10);
  });

  it("refuses orders larger than the balance", async () => {
    const paper = new PaperExecutionAdapter({ initialBalance: 150 });

    await expect(paper.placeOrder(intent, { time: T0, signal: new AbortController().signal })).rejects.toBeInstanceOf(FillFailedError);
  });
});
