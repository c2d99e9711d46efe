import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import type { Trade } from "@tradewarden/shared";
import { TradeListSchema } from "@tradewarden/shared";

import type { NewTrade, TradePatch, TradeQuery, TradeStore } from "./trade-store";
import { filterTrades } from "./trade-store";

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

/**
 * Trade journal persisted as a JSON array. The file is read once and rewritten atomically after every
 * mutation, so a crash leaves either the previous or the next version on disk.
 */
export class JsonFileTradeStore implements TradeStore {
  private trades: Trade[] | null = null;

  constructor(private readonly filePath: string) {}

  async createTrade(trade: NewTrade): Promise<Trade> {
    const trades = this.load();
    const created: Trade = { ...trade, id: crypto.randomUUID() };
    trades.push(created);
    this.persist(trades);
    return { ...created };
  }

  async updateTrade(id: string, patch: TradePatch): Promise<Trade> {
    const trades = this.load();
    const index = trades.findIndex((t) => t.id === id);
    const current = trades[index];
    if (!current) {
      throw new Error(`Unknown trade ${id}`);
    }
    const updated: Trade = { ...current, ...patch };
    trades[index] = updated;
    this.persist(trades);
    return { ...updated };
  }

  async getOpenTrades(symbol?: string): Promise<Trade[]> {
    return this.load().filter((t) => t.status === "OPEN" && (!symbol || t.symbol === symbol));
  }

  async listTrades(query?: TradeQuery): Promise<Trade[]> {
    return filterTrades(this.load(), query);
  }

  private load(): Trade[] {
    if (this.trades) return this.trades;
    if (!fs.existsSync(this.filePath)) {
      this.trades = [];
      return this.trades;
    }
    const raw = fs.readFileSync(this.filePath, "utf-8");
    this.trades = TradeListSchema.parse(JSON.parse(raw));
    return this.trades;
  }

  private persist(trades: Trade[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    atomicWriteFile(this.filePath, JSON.stringify(trades, null, 2));
  }
}
