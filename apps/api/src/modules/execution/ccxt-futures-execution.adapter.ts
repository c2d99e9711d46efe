import ccxt from "ccxt";

import type { ExchangeEnvironment, OrderIntent, Trade } from "@tradewarden/shared";
import { CloseFailedError, FillFailedError, errorMessage } from "@tradewarden/shared";

import type { CloseConfirmation, ExecutionPort, ExitRequest, FillConfirmation, OrderContext } from "./execution.port";

export type CcxtFuturesOptions = {
  environment: ExchangeEnvironment;
  apiKey: string;
  apiSecret: string;
  timeoutMs?: number;
  settleAsset?: string;
};

export type CcxtFuturesExchange = {
  loadMarkets: () => Promise<unknown>;
  fetchBalance: () => Promise<unknown>;
  amountToPrecision: (symbol: string, amount: number) => string;
  createOrder: (symbol: string, type: string, side: string, amount: number, price?: number, params?: Record<string, unknown>) => Promise<unknown>;
  markets_by_id?: Record<string, unknown>;
  enableDemoTrading?: (enable: boolean) => void;
};

function asNumber(v: unknown): number | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string") {
    const n = Number.parseFloat(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object") return null;
  return v as Record<string, unknown>;
}

function asString(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function pickSwapMarket(entry: unknown): string | null {
  const candidates = Array.isArray(entry) ? entry : [entry];
  for (const candidate of candidates) {
    const market = asRecord(candidate);
    if (!market) continue;
    const isSwap = market.swap === true || market.type === "swap" || market.linear === true;
    const symbol = asString(market.symbol);
    if (isSwap && symbol) return symbol;
  }
  return null;
}

type ParsedOrder = {
  id: string | null;
  average: number | null;
  filled: number | null;
  timestamp: number | null;
  fee: number;
};

function parseOrder(raw: unknown, settleAsset: string): ParsedOrder {
  const order = asRecord(raw) ?? {};
  const info = asRecord(order.info) ?? {};
  const fee = asRecord(order.fee);
  const feeCost = fee && asString(fee.currency) === settleAsset ? asNumber(fee.cost) ?? 0 : 0;
  return {
    id: asString(order.id) ?? (asNumber(info.orderId) !== null ? String(info.orderId) : null),
    average: asNumber(order.average) ?? asNumber(info.avgPrice),
    filled: asNumber(order.filled) ?? asNumber(info.executedQty),
    timestamp: asNumber(order.timestamp) ?? asNumber(info.updateTime),
    fee: feeCost
  };
}

/**
 * Binance USDⓈ-M futures through ccxt. Positions are opened with market orders and closed with
 * reduce-only market orders for the executed quantity recorded on the trade.
 */
export class CcxtFuturesExecutionAdapter implements ExecutionPort {
  readonly name = "binance-usdm";
  private readonly exchange: CcxtFuturesExchange;
  private readonly settleAsset: string;
  private marketsLoaded = false;

  constructor(options: CcxtFuturesOptions, exchange?: CcxtFuturesExchange) {
    this.settleAsset = options.settleAsset ?? "USDT";
    this.exchange = exchange ?? CcxtFuturesExecutionAdapter.createExchange(options);
  }

  private static createExchange(options: CcxtFuturesOptions): CcxtFuturesExchange {
    const UsdmCtor = (ccxt as unknown as { binanceusdm: new (opts: Record<string, unknown>) => CcxtFuturesExchange }).binanceusdm;
    const ex = new UsdmCtor({
      apiKey: options.apiKey,
      secret: options.apiSecret,
      enableRateLimit: true,
      timeout: options.timeoutMs ?? 12_000,
      options: { adjustForTimeDifference: true }
    });
    // TESTNET maps to Binance demo trading; ccxt no longer supports sandbox mode for futures.
    if (options.environment === "TESTNET") {
      ex.enableDemoTrading?.(true);
    }
    return ex;
  }

  async getBalance(): Promise<number> {
    const balance = asRecord(await this.exchange.fetchBalance()) ?? {};
    const free = asRecord(balance.free) ?? {};
    return asNumber(free[this.settleAsset]) ?? 0;
  }

  async placeOrder(intent: OrderIntent, context: OrderContext): Promise<FillConfirmation> {
    try {
      const symbol = await this.toUnifiedSymbol(intent.symbol);
      const amount = this.quantity(symbol, intent.sizeUSD, intent.entryPrice);
      const side = intent.direction === "LONG" ? "buy" : "sell";
      const order = parseOrder(await this.exchange.createOrder(symbol, "market", side, amount), this.settleAsset);
      if (!order.id) {
        throw new Error("exchange returned no order id");
      }
      return {
        orderId: order.id,
        fillPrice: order.average ?? intent.entryPrice,
        filledAt: order.timestamp ?? context.time,
        fees: order.fee,
        quantity: order.filled !== null && order.filled > 0 ? order.filled : amount
      };
    } catch (err) {
      throw new FillFailedError(`${intent.symbol} ${intent.direction} entry failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async closePosition(trade: Trade, request: ExitRequest): Promise<CloseConfirmation> {
    try {
      const symbol = await this.toUnifiedSymbol(trade.symbol);
      const amount = trade.quantity ?? this.quantity(symbol, trade.sizeUSD, trade.entryPrice);
      const side = trade.direction === "LONG" ? "sell" : "buy";
      const order = parseOrder(await this.exchange.createOrder(symbol, "market", side, amount, undefined, { reduceOnly: true }), this.settleAsset);
      return {
        exitPrice: order.average ?? request.price,
        closedAt: order.timestamp ?? request.time,
        fees: order.fee
      };
    } catch (err) {
      throw new CloseFailedError(`${trade.symbol} close (${request.reason}) failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private quantity(symbol: string, sizeUSD: number, price: number): number {
    const amount = Number.parseFloat(this.exchange.amountToPrecision(symbol, sizeUSD / price));
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new Error(`Order size ${sizeUSD} USD rounds to zero quantity at ${price}`);
    }
    return amount;
  }

  private async toUnifiedSymbol(symbolId: string): Promise<string> {
    const id = symbolId.trim().toUpperCase();
    if (id.includes("/")) return id;
    if (!this.marketsLoaded) {
      await this.exchange.loadMarkets();
      this.marketsLoaded = true;
    }
    const symbol = pickSwapMarket(this.exchange.markets_by_id?.[id]);
    if (!symbol) {
      throw new Error(`Unknown futures symbol (ccxt): ${id}`);
    }
    return symbol;
  }
}
