import type { OrderIntent, Trade } from "@tradewarden/shared";
import { FillFailedError, computePnl } from "@tradewarden/shared";

import type { CloseConfirmation, ExecutionPort, ExitRequest, FillConfirmation, OrderContext } from "./execution.port";

export type PaperExecutionOptions = {
  name?: string;
  initialBalance: number;
  /** Charged on entry and exit notional. */
  feePercent?: number;
  idPrefix?: string;
};

/**
 * Fills every order at its reference price and keeps a realized-balance ledger. Used for paper
 * trading and, with bar-close prices, by the backtest.
 */
export class PaperExecutionAdapter implements ExecutionPort {
  readonly name: string;
  private balance: number;
  private readonly feeRate: number;
  private nextOrderId = 1;

  constructor(private readonly options: PaperExecutionOptions) {
    this.name = options.name ?? "paper";
    this.balance = options.initialBalance;
    this.feeRate = (options.feePercent ?? 0) / 100;
  }

  async getBalance(): Promise<number> {
    return this.balance;
  }

  async placeOrder(intent: OrderIntent, context: OrderContext): Promise<FillConfirmation> {
    if (intent.sizeUSD > this.balance) {
      throw new FillFailedError(`${intent.symbol}: ${intent.sizeUSD} USD exceeds paper balance ${this.balance}`);
    }
    const orderId = `${this.options.idPrefix ?? this.name}-${this.nextOrderId}`;
    this.nextOrderId += 1;
    return {
      orderId,
      fillPrice: intent.entryPrice,
      filledAt: context.time,
      fees: intent.sizeUSD * this.feeRate
    };
  }

  async closePosition(trade: Trade, request: ExitRequest): Promise<CloseConfirmation> {
    const exitNotional = (trade.sizeUSD * request.price) / trade.entryPrice;
    const fees = exitNotional * this.feeRate;
    const gross = computePnl({ direction: trade.direction, entryPrice: trade.entryPrice, exitPrice: request.price, sizeUSD: trade.sizeUSD });
    this.balance += gross - trade.fees - fees;
    return { exitPrice: request.price, closedAt: request.time, fees };
  }
}
