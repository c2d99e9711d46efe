import { z } from "zod";

const TradeDirectionSchema = z.enum(["LONG", "SHORT"]);

export const OrderIntentSchema = z
  .object({
    symbol: z.string().min(1),
    direction: TradeDirectionSchema,
    sizeUSD: z.number().positive(),
    entryPrice: z.number().positive(),
    stopLossPrice: z.number().positive(),
    takeProfitPrice: z.number().positive()
  })
  .refine(
    (o) =>
      o.direction === "LONG"
        ? o.stopLossPrice < o.entryPrice && o.entryPrice < o.takeProfitPrice
        : o.takeProfitPrice < o.entryPrice && o.entryPrice < o.stopLossPrice,
    { message: "stop-loss and take-profit must bracket the entry price on the correct sides" }
  );
export type OrderIntent = Readonly<z.infer<typeof OrderIntentSchema>>;

export const TradeStatusSchema = z.enum(["OPEN", "CLOSED"]);
export type TradeStatus = z.infer<typeof TradeStatusSchema>;

export const ExitReasonSchema = z.enum(["STOP_LOSS", "TAKE_PROFIT", "SIGNAL_REVERSAL", "MANUAL", "END_OF_DATA", "SHUTDOWN"]);
export type ExitReason = z.infer<typeof ExitReasonSchema>;

export const TradeSchema = z.object({
  id: z.string().min(1),
  symbol: z.string().min(1),
  direction: TradeDirectionSchema,
  entryPrice: z.number().positive(),
  exitPrice: z.number().positive().optional(),
  sizeUSD: z.number().positive(),
  /** Executed base-asset amount, where the venue reports one. */
  quantity: z.number().positive().optional(),
  stopLossPrice: z.number().positive(),
  takeProfitPrice: z.number().positive(),
  openedAt: z.string().min(1),
  closedAt: z.string().min(1).optional(),
  pnl: z.number().optional(),
  fees: z.number().nonnegative().default(0),
  exitReason: ExitReasonSchema.optional(),
  status: TradeStatusSchema,
  externalOrderId: z.string().min(1).optional()
});
export type Trade = z.infer<typeof TradeSchema>;

export const TradeListSchema = z.array(TradeSchema);

/**
 * Realized profit of a position expressed in quote currency, before fees. Uses the executed quantity
 * when there is one, otherwise the notional at the entry price.
 */
export function computePnl(params: {
  direction: "LONG" | "SHORT";
  entryPrice: number;
  exitPrice: number;
  sizeUSD: number;
  quantity?: number;
}): number {
  const sign = params.direction === "LONG" ? 1 : -1;
  if (params.quantity !== undefined) {
    return (params.exitPrice - params.entryPrice) * sign * params.quantity;
  }
  return ((params.exitPrice - params.entryPrice) * sign * params.sizeUSD) / params.entryPrice;
}
