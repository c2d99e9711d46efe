import type { ExitReason, OrderIntent, Trade } from "@tradewarden/shared";

export type FillConfirmation = {
  orderId: string;
  fillPrice: number;
  filledAt: number;
  fees: number;
  /** Executed base-asset amount, where the venue reports one. */
  quantity?: number;
};

export type ExitRequest = {
  reason: ExitReason;
  /** Trigger level for stop and target exits, the bar close otherwise. */
  price: number;
  time: number;
};

export type CloseConfirmation = {
  exitPrice: number;
  closedAt: number;
  fees: number;
};

export type OrderContext = {
  /** Bar time the decision was made on. */
  time: number;
  signal: AbortSignal;
};

export const EXECUTION_PORT = Symbol("EXECUTION_PORT");

export interface ExecutionPort {
  readonly name: string;
  getBalance(signal: AbortSignal): Promise<number>;
  placeOrder(intent: OrderIntent, context: OrderContext): Promise<FillConfirmation>;
  closePosition(trade: Trade, request: ExitRequest, signal: AbortSignal): Promise<CloseConfirmation>;
}
