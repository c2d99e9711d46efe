import type { AdvisoryVerdict, AppConfig, OrderIntent, RiskRejectionReason, Signal } from "@tradewarden/shared";
import { OrderIntentSchema, RejectedByRiskError, directionSign } from "@tradewarden/shared";

export type RiskParameters = {
  positionSizeUSD: number;
  maxPositionSizeUSD: number;
  riskPercentPerTrade: number;
  stopLossPercent: number;
  takeProfitPercent: number;
  stopAtrMultiplier: number;
  takeProfitAtrMultiplier: number;
};

export function riskParametersFrom(config: Pick<AppConfig, "trading" | "strategy">): RiskParameters {
  return {
    positionSizeUSD: config.trading.positionSizeUSD,
    maxPositionSizeUSD: config.trading.maxPositionSizeUSD,
    riskPercentPerTrade: config.trading.riskPerTradePercent,
    stopLossPercent: config.trading.stopLossPercent,
    takeProfitPercent: config.trading.takeProfitPercent,
    stopAtrMultiplier: config.strategy.stopAtrMultiplier,
    takeProfitAtrMultiplier: config.strategy.takeProfitAtrMultiplier
  };
}

function reject(reason: RiskRejectionReason, message: string): never {
  throw new RejectedByRiskError(reason, message);
}

/** Picks the nearer of the percentage and volatility based distances. */
function levelDistance(entry: number, percent: number, atr: number, multiplier: number): number {
  const byPercent = (entry * percent) / 100;
  return atr > 0 ? Math.min(byPercent, multiplier * atr) : byPercent;
}

export class RiskManager {
  constructor(private readonly params: RiskParameters) {}

  /**
   * Turns an actionable signal into a sized order with protective levels, or throws
   * `RejectedByRiskError`. A NEUTRAL verdict does not block; only an explicit REJECT does.
   */
  size(signal: Signal, verdict: AdvisoryVerdict, accountBalance: number): OrderIntent {
    const p = this.params;
    const { symbol, snapshot } = signal;

    if (signal.direction === "NONE") {
      return reject("NO_DIRECTION", `${symbol}: signal has no direction`);
    }
    if (verdict.recommendation === "REJECT") {
      return reject("ADVISOR_REJECTED", `${symbol}: advisor rejected the trade (${verdict.source}, confidence ${verdict.confidence})`);
    }
    if (p.positionSizeUSD > p.maxPositionSizeUSD) {
      return reject("BASE_SIZE_ABOVE_MAX", `Base position ${p.positionSizeUSD} USD exceeds max ${p.maxPositionSizeUSD} USD`);
    }
    if (!(accountBalance > 0)) {
      return reject("INSUFFICIENT_BALANCE", `${symbol}: account balance ${accountBalance} USD`);
    }

    const entryPrice = snapshot.close;
    if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
      return reject("INVALID_PRICE", `${symbol}: invalid entry price ${entryPrice}`);
    }

    const stopDistance = levelDistance(entryPrice, p.stopLossPercent, snapshot.volatility, p.stopAtrMultiplier);
    const takeProfitDistance = levelDistance(entryPrice, p.takeProfitPercent, snapshot.volatility, p.takeProfitAtrMultiplier);
    if (!(stopDistance > 0) || !(takeProfitDistance > 0)) {
      return reject("INVALID_PRICE", `${symbol}: degenerate protective levels`);
    }

    const riskBudget = (accountBalance * p.riskPercentPerTrade) / 100;
    const sizeUSD = Math.min(p.positionSizeUSD, riskBudget / (stopDistance / entryPrice), p.maxPositionSizeUSD);
    if (sizeUSD > accountBalance) {
      return reject("INSUFFICIENT_BALANCE", `${symbol}: position ${sizeUSD} USD exceeds balance ${accountBalance} USD`);
    }

    const sign = directionSign(signal.direction);
    const parsed = OrderIntentSchema.safeParse({
      symbol,
      direction: signal.direction,
      sizeUSD,
      entryPrice,
      stopLossPrice: entryPrice - sign * stopDistance,
      takeProfitPrice: entryPrice + sign * takeProfitDistance
    });
    if (!parsed.success) {
      return reject("INVALID_PRICE", `${symbol}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return Object.freeze(parsed.data);
  }
}
