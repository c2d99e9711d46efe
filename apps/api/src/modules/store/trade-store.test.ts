import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { InMemoryTradeStore } from "./in-memory-trade-store";
import { JsonFileTradeStore } from "./json-file-trade-store";
import type { NewTrade } from "./trade-store";

function openTrade(symbol: string): NewTrade {
  return {
    symbol,
    direction: "LONG",
    entryPrice: 100,
    sizeUSD: 100,
    stopLossPrice: 98,
    takeProfitPrice: 103,
    openedAt: "2024-01-01T00:00:00.000Z",
    fees: 0,
    status: "OPEN"
  };
}

describe("InMemoryTradeStore", () => {
  it("assigns sequential ids and tracks open trades per symbol", async () => {
    const store = new InMemoryTradeStore("bt");
    const a = await store.createTrade(openTrade("BTCUSDT"));
    const b = await store.createTrade(openTrade("ETHUSDT"));

    expect([a.id, b.id]).toEqual(["bt-1", "bt-2"]);

    await store.updateTrade(a.id, { status: "CLOSED", exitPrice: 103, pnl: 3, exitReason: "TAKE_PROFIT" });

    expect(await store.getOpenTrades("BTCUSDT")).toEqual([]);
    expect((await store.getOpenTrades()).map((t) => t.id)).toEqual(["bt-2"]);
    expect((await store.listTrades({ status: "CLOSED" }))[0]).toMatchObject({ id: "bt-1", pnl: 3 });
  });

  it("lists newest first and honours the limit", async () => {
    const store = new InMemoryTradeStore();
    await store.createTrade(openTrade("BTCUSDT"));
    await store.createTrade(openTrade("BTCUSDT"));
    await store.createTrade(openTrade("BTCUSDT"));

    expect((await store.listTrades({ limit: 2 })).map((t) => t.id)).toEqual(["trade-3", "trade-2"]);
  });

  it("fails loudly on unknown ids", async () => {
    await expect(new InMemoryTradeStore().updateTrade("nope", { pnl: 1 })).rejects.toThrow("Unknown trade nope");
  });
});

describe("JsonFileTradeStore", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("persists trades across instances", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "trades-"));
    dirs.push(dir);
    const filePath = path.join(dir, "nested", "trades.json");

    const first = new JsonFileTradeStore(filePath);
    const created = await first.createTrade(openTrade("BTCUSDT"));
    await first.updateTrade(created.id, { status: "CLOSED", exitPrice: 98, pnl: -2, exitReason: "STOP_LOSS", closedAt: "2024-01-01T05:00:00.000Z" });

    const reopened = new JsonFileTradeStore(filePath);
    const trades = await reopened.listTrades();

    expect(trades).toHaveLength(1);
    expect(trades[0]).toMatchObject({ id: created.id, status: "CLOSED", pnl: -2, exitReason: "STOP_LOSS" });
    expect(await reopened.getOpenTrades("BTCUSDT")).toEqual([]);
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });
});
